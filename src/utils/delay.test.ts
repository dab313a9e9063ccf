import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { delay } from './delay';

describe('delay', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the given time', async () => {
    let done = false;
    const pending = delay(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('resolves at once for zero', async () => {
    await expect(delay(0)).resolves.toBeUndefined();
  });

  it('rejects with a cancellation when aborted mid-wait', async () => {
    const controller = new AbortController();
    const pending = delay(5000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: 'CANCELLED' });
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(delay(10, controller.signal)).rejects.toMatchObject({ code: 'CANCELLED' });
  });
});
