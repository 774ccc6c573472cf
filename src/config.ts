import { readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { z } from 'zod';
import type { Address } from 'viem';
import type { AppConfig, ChainConfig, RejectedChain } from './types.js';
import { ConfigError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { isValidAddress } from './utils/address.js';

/** 1,000 USDC in base units */
export const DEMO_THRESHOLD = 1_000_000_000n;

const ENDPOINT_PROTOCOLS = ['http:', 'https:', 'ws:', 'wss:'];
const EXPLORER_PROTOCOLS = ['http:', 'https:'];

const digitsSchema = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((value) => /^\d+$/.test(value), { message: 'Expected a non-negative integer' });

const millisSchema = (fallback: string) =>
  digitsSchema(fallback).transform(Number).pipe(z.number().int().positive());

// Validation schemas
const envSchema = z.object({
  WHALE_THRESHOLD: digitsSchema('1000000000000')
    .transform((value) => BigInt(value))
    .refine((value) => value > 0n, { message: 'Threshold must be positive' }),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  RECONNECT_BASE_DELAY_MS: millisSchema('1000'),
  RECONNECT_MAX_DELAY_MS: millisSchema('60000'),
  POLLING_INTERVAL_MS: millisSchema('3000'),
  REQUEST_TIMEOUT_MS: millisSchema('10000'),
  LOG_DECODE_ERRORS: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  CHAINS_FILE: z.string().default('config/chains.json'),
  LABELS_FILE: z.string().default('config/labels.json'),
});

const hexAddressSchema = z.custom<Address>(
  (value) => typeof value === 'string' && /^0x[0-9a-fA-F]*$/.test(value),
  { message: 'Expected a 0x-prefixed hex address' }
);

// Shape of one entry; semantic checks run per chain in validateChainConfig
const chainSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  endpoint: z.string(),
  contractAddress: hexAddressSchema,
  decimals: z.number(),
  symbol: z.string().default('USDC'),
  explorerUrl: z.string().optional(),
});

// Top level only: every entry needs an id, and ids are unique
const chainsFileSchema = z
  .array(z.object({ id: z.string().min(1) }).passthrough())
  .min(1)
  .superRefine((chains, ctx) => {
    const seen = new Set<string>();
    for (const chain of chains) {
      if (seen.has(chain.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate chain id "${chain.id}"` });
      }
      seen.add(chain.id);
    }
  });

const labelsSchema = z.record(z.string());

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('\n');
}

function resolvePath(path: string, cwd: string): string {
  return isAbsolute(path) ? path : join(cwd, path);
}

export interface ParsedChains {
  chains: ChainConfig[];
  rejected: RejectedChain[];
}

/**
 * Validate chain file contents; `<ID>_RPC_URL` env vars override endpoints.
 * A malformed entry is rejected on its own and does not affect the others.
 */
export function parseChains(data: unknown, env: NodeJS.ProcessEnv = process.env): ParsedChains {
  const result = chainsFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid chains config:\n${formatIssues(result.error)}`);
  }

  const parsed: ParsedChains = { chains: [], rejected: [] };

  for (const entry of result.data) {
    const chain = chainSchema.safeParse(entry);
    if (!chain.success) {
      const issues = chain.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
      parsed.rejected.push({
        id: entry.id,
        error: new ConfigError(`${entry.id}: invalid chain entry (${issues})`),
      });
      continue;
    }

    parsed.chains.push({
      ...chain.data,
      endpoint: env[`${chain.data.id.toUpperCase()}_RPC_URL`] ?? chain.data.endpoint,
    });
  }

  return parsed;
}

/**
 * Validate label file contents, skipping entries whose key is not an address
 */
export function parseLabels(data: unknown): Record<string, string> {
  const result = labelsSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid labels file:\n${formatIssues(result.error)}`);
  }

  const labels: Record<string, string> = {};
  for (const [address, label] of Object.entries(result.data)) {
    if (!isValidAddress(address)) {
      logger.warn({ address, label }, 'config: skipping label with invalid address');
      continue;
    }
    labels[address] = label;
  }
  return labels;
}

function hasProtocol(url: string, protocols: readonly string[]): boolean {
  try {
    return protocols.includes(new URL(url).protocol);
  } catch {
    return false;
  }
}

/**
 * Semantic checks for a single chain. An invalid chain is reported and
 * skipped without affecting the others.
 */
export function validateChainConfig(chain: ChainConfig): ConfigError | null {
  if (!isValidAddress(chain.contractAddress)) {
    return new ConfigError(`${chain.id}: invalid contract address ${chain.contractAddress}`);
  }

  let protocol: string;
  try {
    protocol = new URL(chain.endpoint).protocol;
  } catch {
    return new ConfigError(`${chain.id}: endpoint is not a URL: ${chain.endpoint}`);
  }
  if (!ENDPOINT_PROTOCOLS.includes(protocol)) {
    return new ConfigError(`${chain.id}: unsupported endpoint protocol ${protocol}`);
  }

  if (!Number.isInteger(chain.decimals) || chain.decimals < 0 || chain.decimals > 255) {
    return new ConfigError(
      `${chain.id}: decimals must be an integer between 0 and 255, got ${chain.decimals}`
    );
  }

  if (chain.explorerUrl !== undefined && !hasProtocol(chain.explorerUrl, EXPLORER_PROTOCOLS)) {
    return new ConfigError(`${chain.id}: explorer URL must be an http(s) URL, got ${chain.explorerUrl}`);
  }

  return null;
}

function readJsonFile(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

function loadChains(path: string, env: NodeJS.ProcessEnv): ParsedChains {
  let data: unknown;
  try {
    data = readJsonFile(path);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Chains config file not found at: ${path}`);
    }
    throw new ConfigError(`Failed to load chains config: ${errorMessage(error)}`);
  }
  return parseChains(data, env);
}

function loadLabels(path: string): Record<string, string> {
  let data: unknown;
  try {
    data = readJsonFile(path);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.warn({ path }, 'config: labels file not found, continuing without labels');
      return {};
    }
    throw new ConfigError(`Failed to load labels file: ${errorMessage(error)}`);
  }
  return parseLabels(data);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  // Validate environment variables
  const envResult = envSchema.safeParse({
    WHALE_THRESHOLD: env.WHALE_THRESHOLD,
    LOG_LEVEL: env.LOG_LEVEL,
    RECONNECT_BASE_DELAY_MS: env.RECONNECT_BASE_DELAY_MS,
    RECONNECT_MAX_DELAY_MS: env.RECONNECT_MAX_DELAY_MS,
    POLLING_INTERVAL_MS: env.POLLING_INTERVAL_MS,
    REQUEST_TIMEOUT_MS: env.REQUEST_TIMEOUT_MS,
    LOG_DECODE_ERRORS: env.LOG_DECODE_ERRORS,
    CHAINS_FILE: env.CHAINS_FILE,
    LABELS_FILE: env.LABELS_FILE,
  });

  if (!envResult.success) {
    throw new ConfigError(`Environment validation failed:\n${formatIssues(envResult.error)}`);
  }

  const parsed = envResult.data;

  if (parsed.RECONNECT_MAX_DELAY_MS < parsed.RECONNECT_BASE_DELAY_MS) {
    throw new ConfigError('RECONNECT_MAX_DELAY_MS must not be lower than RECONNECT_BASE_DELAY_MS');
  }

  const { chains, rejected } = loadChains(resolvePath(parsed.CHAINS_FILE, cwd), env);

  return {
    chains,
    rejectedChains: rejected,
    threshold: parsed.WHALE_THRESHOLD,
    logLevel: parsed.LOG_LEVEL,
    labels: loadLabels(resolvePath(parsed.LABELS_FILE, cwd)),
    backoff: {
      baseDelayMs: parsed.RECONNECT_BASE_DELAY_MS,
      maxDelayMs: parsed.RECONNECT_MAX_DELAY_MS,
    },
    pollingIntervalMs: parsed.POLLING_INTERVAL_MS,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    logDecodeErrors: parsed.LOG_DECODE_ERRORS,
  };
}

export interface ConfigOptions {
  thresholdOverride?: bigint;
  demoMode?: boolean;
  chainIds?: string[];
}

/**
 * Load config with optional CLI overrides
 */
export function initConfig(
  options?: ConfigOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const baseConfig = loadConfig(env, cwd);

  // Apply CLI overrides
  let threshold = baseConfig.threshold;

  if (options?.demoMode) {
    threshold = DEMO_THRESHOLD;
  } else if (options?.thresholdOverride !== undefined) {
    threshold = options.thresholdOverride;
  }

  let { chains, rejectedChains } = baseConfig;
  if (options?.chainIds && options.chainIds.length > 0) {
    const known = new Set([...chains, ...rejectedChains].map((chain) => chain.id));
    const unknown = options.chainIds.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new ConfigError(`Unknown chain id(s): ${unknown.join(', ')}`);
    }
    const wanted = new Set(options.chainIds);
    chains = chains.filter((chain) => wanted.has(chain.id));
    rejectedChains = rejectedChains.filter((chain) => wanted.has(chain.id));
  }

  logger.level = baseConfig.logLevel;

  return {
    ...baseConfig,
    chains,
    rejectedChains,
    threshold,
  };
}
