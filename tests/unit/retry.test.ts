import { describe, expect, it } from 'vitest';
import { sleep, withRetry } from '../../src/utils/retry';

describe('withRetry', () => {
  it('retries until the call succeeds', async () => {
    let calls = 0;
    const result = await withRetry(async () => {
      calls++;
      if (calls < 3) throw new Error('flaky');
      return 'ok';
    }, { attempts: 3, delay: 0 });

    expect(result).toBe('ok');
    expect(calls).toBe(3);
  });

  it('rethrows the last error once attempts run out', async () => {
    let calls = 0;
    await expect(withRetry(async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    }, { attempts: 2, delay: 0 })).rejects.toThrow('failure 2');
    expect(calls).toBe(2);
  });

  it('stops at the first error the condition rejects', async () => {
    let calls = 0;
    await expect(withRetry(async () => {
      calls++;
      throw new Error('fatal');
    }, { attempts: 5, delay: 0, retryCondition: () => false })).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });

  it('does not start a wait that would overrun the time limit', async () => {
    let calls = 0;
    await expect(withRetry(async () => {
      calls++;
      throw new Error('slow');
    }, { attempts: 5, delay: 1000, maxElapsedMs: 500 })).rejects.toThrow('slow');
    expect(calls).toBe(1);
  });
});

describe('sleep', () => {
  it('rejects when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow('Aborted');
  });
});
