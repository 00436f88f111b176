import { describe, expect, it } from 'vitest';
import { createLimiter, runWithConcurrency } from '@/utils/concurrency';

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 1));
}

describe('runWithConcurrency', () => {
  it('visits every item once with its index', async () => {
    const seen: string[] = [];
    await runWithConcurrency(
      ['a', 'b', 'c', 'd'],
      async (item, index) => {
        await tick();
        seen.push(`${index}:${item}`);
      },
      2
    );
    expect([...seen].sort()).toEqual(['0:a', '1:b', '2:c', '3:d']);
  });

  it('never runs more workers than the limit', async () => {
    let active = 0;
    let peak = 0;
    await runWithConcurrency(
      Array.from({ length: 8 }, (_, i) => i),
      async () => {
        active += 1;
        peak = Math.max(peak, active);
        await tick();
        active -= 1;
      },
      3
    );
    expect(peak).toBe(3);
  });

  it('treats a non-positive limit as one', async () => {
    let active = 0;
    let peak = 0;
    await runWithConcurrency(
      [1, 2, 3],
      async () => {
        active += 1;
        peak = Math.max(peak, active);
        await tick();
        active -= 1;
      },
      0
    );
    expect(peak).toBe(1);
  });

  it('propagates a worker failure', async () => {
    await expect(
      runWithConcurrency(
        [1],
        async () => {
          throw new Error('worker failed');
        },
        2
      )
    ).rejects.toThrow('worker failed');
  });
});

describe('createLimiter', () => {
  it('shares its slots between separate callers', async () => {
    const limiter = createLimiter(2);
    let active = 0;
    let peak = 0;
    const work = async () => {
      active += 1;
      peak = Math.max(peak, active);
      await tick();
      active -= 1;
    };
    await Promise.all([
      runWithConcurrency([1, 2, 3], work, limiter),
      runWithConcurrency([4, 5, 6], work, limiter),
    ]);
    expect(peak).toBe(2);
    expect(limiter.active).toBe(0);
  });

  it('starts queued tasks in arrival order', async () => {
    const limiter = createLimiter(1);
    const order: number[] = [];
    await Promise.all(
      [1, 2, 3].map((n) =>
        limiter.run(async () => {
          await tick();
          order.push(n);
        })
      )
    );
    expect(order).toEqual([1, 2, 3]);
  });

  it('passes results through and frees the slot after a failure', async () => {
    const limiter = createLimiter(1);
    await expect(
      limiter.run(async () => {
        throw new Error('task failed');
      })
    ).rejects.toThrow('task failed');
    await expect(limiter.run(async () => 7)).resolves.toBe(7);
    expect(limiter.limit).toBe(1);
  });
});
