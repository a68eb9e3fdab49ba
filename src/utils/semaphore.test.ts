import { describe, it, expect } from 'vitest';
import { Semaphore } from './semaphore.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

const flush = () => new Promise<void>(resolve => setTimeout(resolve, 0));

describe('Semaphore', () => {
  it('should reject a permit count below one', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  it('should admit up to the permit count immediately', async () => {
    const semaphore = new Semaphore(2);

    await semaphore.acquire();
    await semaphore.acquire();

    expect(semaphore.inUse).toBe(2);
    expect(semaphore.pending).toBe(0);
  });

  it('should queue waiters and admit them in order on release', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));

    expect(semaphore.pending).toBe(2);

    semaphore.release();
    await first;
    expect(order).toEqual(['first']);
    expect(semaphore.inUse).toBe(1);

    semaphore.release();
    await second;
    expect(order).toEqual(['first', 'second']);
  });

  it('should release the permit when a task rejects', async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.run(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(semaphore.inUse).toBe(0);
  });

  it('should never run more tasks than permits', async () => {
    const semaphore = new Semaphore(3);
    const gates = Array.from({ length: 8 }, () => deferred());
    let active = 0;
    let peak = 0;

    const runs = gates.map(gate =>
      semaphore.run(async () => {
        active++;
        peak = Math.max(peak, active);
        await gate.promise;
        active--;
      })
    );

    await flush();
    expect(active).toBe(3);

    for (const gate of gates) {
      gate.resolve();
      await flush();
      expect(active).toBeLessThanOrEqual(3);
    }
    await Promise.all(runs);

    expect(peak).toBe(3);
    expect(semaphore.inUse).toBe(0);
  });

  it('should throw when released without a matching acquire', () => {
    const semaphore = new Semaphore(1);
    expect(() => semaphore.release()).toThrow('released more times than acquired');
  });
});
