import { sleep } from '../patterns/sleep';
import { createResilientExecutor } from '../index';

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
  });

  it('should reject at once when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stopped'));

    await expect(sleep(60000, controller.signal)).rejects.toThrow('stopped');
  });

  it('should reject when aborted mid-sleep', async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);

    controller.abort(new Error('cancelled'));

    await expect(pending).rejects.toThrow('cancelled');
  });
});

describe('createResilientExecutor', () => {
  it('should retry around the limiter without holding a slot during backoff', async () => {
    const slots: number[] = [];
    let calls = 0;
    const backoffSleep = jest.fn(async (): Promise<void> => {
      slots.push(executor.limiter.getStats().inFlight);
    });
    const executor = createResilientExecutor({
      limiter: { maxConcurrent: 1 },
      retry: { sleep: backoffSleep, maxAttempts: 3 },
    });

    const result = await executor.execute(async () => {
      calls++;
      if (calls === 1) {
        throw new Error('rate limit');
      }
      return 'loaded';
    });

    expect(result).toBe('loaded');
    expect(slots).toEqual([0]);
  });
});
