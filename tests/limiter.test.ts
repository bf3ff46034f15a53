import { describe, it, expect } from '@jest/globals';
import { LaneLimiter, type LimiterClock } from '../src/utils/limiter';

class FrozenClock implements LimiterClock {
  readonly sleeps: number[] = [];

  now(): number {
    return 0;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
  }
}

describe('LaneLimiter', () => {
  it('enforces max concurrency per lane', async () => {
    const limiter = new LaneLimiter({ gemini_llm: { concurrency: 2 } });
    const running = new Set<number>();
    let maxConcurrent = 0;

    const results = await Promise.all(
      Array.from({ length: 5 }, (_, i) =>
        limiter.limit('gemini_llm', async () => {
          running.add(i);
          maxConcurrent = Math.max(maxConcurrent, running.size);
          await new Promise((resolve) => setTimeout(resolve, 10));
          running.delete(i);
          return i;
        })
      )
    );

    expect(results).toEqual([0, 1, 2, 3, 4]);
    expect(maxConcurrent).toBe(2);
  });

  it('spaces task starts by the lane interval', async () => {
    const clock = new FrozenClock();
    const limiter = new LaneLimiter({ crossref: { concurrency: 3, minIntervalMs: 100 } }, clock);

    await Promise.all([1, 2, 3].map((n) => limiter.limit('crossref', async () => n)));

    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('keeps lanes independent', async () => {
    const clock = new FrozenClock();
    const limiter = new LaneLimiter({ crossref: { minIntervalMs: 100 }, openalex: { minIntervalMs: 100 } }, clock);

    await limiter.limit('crossref', async () => 'a');
    await limiter.limit('openalex', async () => 'b');

    expect(clock.sleeps).toEqual([]);
  });

  it('releases the slot when a task throws', async () => {
    const limiter = new LaneLimiter({ grobid: { concurrency: 1 } });

    await expect(
      limiter.limit('grobid', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(limiter.limit('grobid', async () => 'next')).resolves.toBe('next');
  });

  it('clamps reconfigured values', () => {
    const limiter = new LaneLimiter();
    limiter.configure('documents', { concurrency: 0, minIntervalMs: -5 });

    expect(limiter.configFor('documents')).toEqual({ concurrency: 1, minIntervalMs: 0 });
  });
});
