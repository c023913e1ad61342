import { describe, it, expect } from 'vitest';
import { OperationAbortedError, TimeoutError, withTimeout } from '../src/utils/timeout.js';

describe('withTimeout', () => {
  it('resolves with the work result', async () => {
    await expect(withTimeout('quick', 1000, async () => 42)).resolves.toBe(42);
  });

  it('rejects with TimeoutError and aborts the work signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = withTimeout('slow call', 10, (signal) => {
      seen.signal = signal;
      return new Promise<number>(() => undefined);
    });

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('slow call timed out after 10ms');
    expect(seen.signal?.aborted).toBe(true);
  });

  it('rejects when the caller aborts, ignoring a late result', async () => {
    const controller = new AbortController();
    const pending = withTimeout(
      'cancellable',
      1000,
      async () => {
        controller.abort();
        return 'late';
      },
      controller.signal
    );

    await expect(pending).rejects.toBeInstanceOf(OperationAbortedError);
  });

  it('rejects at once for a signal that is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let started = false;

    await expect(
      withTimeout(
        'never',
        1000,
        async () => {
          started = true;
          return 1;
        },
        controller.signal
      )
    ).rejects.toThrow('never aborted by caller');
    expect(started).toBe(false);
  });

  it('passes through errors from the work', async () => {
    await expect(
      withTimeout('failing', 1000, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
  });
});
