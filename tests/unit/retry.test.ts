import { describe, expect, it, vi } from 'vitest';
import { backoffDelay, withRetry } from '../../src/utils/retry';

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    let calls = 0;
    const result = await withRetry(async () => {
      calls++;
      if (calls < 3) throw new Error('flaky');
      return 'ok';
    }, { attempts: 3, delayMs: 0 });

    expect(result).toBe('ok');
    expect(calls).toBe(3);
  });

  it('rethrows the last error once attempts are exhausted', async () => {
    let calls = 0;
    await expect(withRetry(async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    }, { attempts: 4, delayMs: 0 })).rejects.toThrow('failure 4');
    expect(calls).toBe(4);
  });

  it('does not retry errors rejected by retryCondition', async () => {
    let calls = 0;
    await expect(withRetry(async () => {
      calls++;
      throw new Error('fatal');
    }, { attempts: 5, delayMs: 0, retryCondition: () => false })).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });

  it('reports each retry with an exponential wait', async () => {
    const onRetry = vi.fn();
    await expect(withRetry(async () => {
      throw new Error('down');
    }, { attempts: 3, delayMs: 5, backoff: 'exponential', onRetry })).rejects.toThrow('down');

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][1]).toBe(1);
    expect(onRetry.mock.calls[0][2]).toBe(5);
    expect(onRetry.mock.calls[1][1]).toBe(2);
    expect(onRetry.mock.calls[1][2]).toBe(10);
  });

  it('passes the attempt number to the callback', async () => {
    const seen: number[] = [];
    await withRetry(async (attempt) => {
      seen.push(attempt);
      if (attempt < 2) throw new Error('again');
      return attempt;
    }, { attempts: 3, delayMs: 0 });
    expect(seen).toEqual([1, 2]);
  });
});

describe('backoffDelay', () => {
  it('doubles by default and stays flat for fixed backoff', () => {
    expect(backoffDelay({ attempts: 3, delayMs: 100 }, 2)).toBe(400);
    expect(backoffDelay({ attempts: 3, delayMs: 100, factor: 3 }, 2)).toBe(900);
    expect(backoffDelay({ attempts: 3, delayMs: 100, backoff: 'fixed' }, 2)).toBe(100);
  });
});
