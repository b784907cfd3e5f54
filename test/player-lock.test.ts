import { describe, it, expect } from 'vitest';
import { PlayerLocks } from '../lib/game/player-lock';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('PlayerLocks', () => {
  it('runs operations for one player in arrival order', async () => {
    const locks = new PlayerLocks();
    const gate = deferred();
    const order: string[] = [];

    const first = locks.withLock('p1', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = locks.withLock('p1', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual([]);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
  });

  it('does not make different players wait on each other', async () => {
    const locks = new PlayerLocks();
    const gate = deferred();

    const blocked = locks.withLock('p1', () => gate.promise);
    const other = await locks.withLock('p2', async () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await blocked;
  });

  it('releases the lock when an operation throws', async () => {
    const locks = new PlayerLocks();

    await expect(
      locks.withLock('p1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(await locks.withLock('p1', async () => 42)).toBe(42);
    expect(locks.size).toBe(0);
  });
});
