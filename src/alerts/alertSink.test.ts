import { describe, it, expect, vi } from 'vitest';
import { AlertSink } from './alertSink.js';
import { WhaleFilter } from './whaleFilter.js';
import { LabelResolver } from '../labels.js';
import type { WhaleAlert } from '../types.js';
import { testChain, transferEvent } from '../testing/fixtures.js';

function alertFor(chainId: string): WhaleAlert {
  const filter = new WhaleFilter(testChain({ id: chainId, name: chainId }), new LabelResolver());
  const alert = filter.evaluate(transferEvent({ chainId }), 1n);
  if (!alert) throw new Error('expected an alert');
  return alert;
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

describe('AlertSink', () => {
  it('should write alerts in emit order', async () => {
    const written: string[] = [];
    const sink = new AlertSink((alert) => {
      written.push(alert.chainId);
    });

    sink.emit(alertFor('ethereum'));
    sink.emit(alertFor('arbitrum'));
    sink.emit(alertFor('base'));
    await sink.flush();

    expect(written).toEqual(['ethereum', 'arbitrum', 'base']);
    expect(sink.deliveredCount).toBe(3);
  });

  it('should never run two writes at once', async () => {
    let active = 0;
    let maxActive = 0;
    const sink = new AlertSink(async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active--;
    });

    for (const chainId of ['ethereum', 'arbitrum', 'base', 'ethereum', 'base']) {
      sink.emit(alertFor(chainId));
    }
    await sink.flush();

    expect(maxActive).toBe(1);
    expect(sink.deliveredCount).toBe(5);
  });

  it('should hold later alerts until the current write finishes', async () => {
    const gate = deferred();
    const written: string[] = [];
    const sink = new AlertSink(async (alert) => {
      if (alert.chainId === 'ethereum') await gate.promise;
      written.push(alert.chainId);
    });

    sink.emit(alertFor('ethereum'));
    sink.emit(alertFor('base'));
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(written).toEqual([]);

    gate.resolve();
    await sink.flush();
    expect(written).toEqual(['ethereum', 'base']);
  });

  it('should keep writing after a failed write', async () => {
    const writer = vi
      .fn<(alert: WhaleAlert) => void>()
      .mockImplementationOnce(() => {
        throw new Error('stdout closed');
      });
    const sink = new AlertSink(writer);

    sink.emit(alertFor('ethereum'));
    sink.emit(alertFor('base'));
    await sink.flush();

    expect(writer).toHaveBeenCalledTimes(2);
    expect(sink.deliveredCount).toBe(1);
  });

  it('should drain pending alerts on close and drop later ones', async () => {
    const writer = vi.fn<(alert: WhaleAlert) => void>();
    const sink = new AlertSink(writer);

    sink.emit(alertFor('ethereum'));
    await sink.close();
    sink.emit(alertFor('base'));
    await sink.flush();

    expect(writer).toHaveBeenCalledTimes(1);
    expect(writer.mock.calls[0]?.[0].chainId).toBe('ethereum');
  });
});
