import { describe, expect, it } from 'vitest';

import { ConcurrencyAbortedError, ConcurrencyLimiter } from '../../headends/concurrency.js';

describe('ConcurrencyLimiter', () => {
  it('rejects a limit that is not positive', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow('Concurrency limit must be a positive finite number; received 0');
  });

  it('queues callers beyond the limit and serves them in order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const granted: string[] = [];

    const releaseFirst = await limiter.acquire();
    const second = limiter.acquire().then((release) => { granted.push('second'); return release; });
    const third = limiter.acquire().then((release) => { granted.push('third'); return release; });
    expect(limiter.stats()).toEqual({ limit: 1, inUse: 1, waiting: 2 });

    releaseFirst();
    const releaseSecond = await second;
    expect(granted).toEqual(['second']);
    releaseSecond();
    const releaseThird = await third;
    expect(granted).toEqual(['second', 'third']);
    releaseThird();

    expect(limiter.stats()).toEqual({ limit: 1, inUse: 0, waiting: 0 });
  });

  it('ignores a second release of the same slot', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const release = await limiter.acquire();
    await limiter.acquire();

    release();
    release();

    expect(limiter.stats().inUse).toBe(1);
  });

  it('drops a waiter whose signal aborts', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const release = await limiter.acquire();
    const controller = new AbortController();

    const waiting = limiter.acquire({ signal: controller.signal });
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(ConcurrencyAbortedError);
    expect(limiter.stats().waiting).toBe(0);
    release();
    expect(limiter.stats().inUse).toBe(0);
  });

  it('refuses an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(new ConcurrencyLimiter(1).acquire({ signal: controller.signal })).rejects.toThrow('acquire aborted');
  });
});
