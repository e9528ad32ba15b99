import { describe, it, expect } from 'vitest';
import { MutexManager } from './mutexManager.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('MutexManager', () => {
  it('serializes work on the same project', async () => {
    const manager = new MutexManager();
    const order: string[] = [];
    const gate = deferred();

    const first = manager.withProjectLock('p1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = manager.withProjectLock('p1', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(manager.isProjectLocked('p1')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('lets different projects run concurrently', async () => {
    const manager = new MutexManager();
    const order: string[] = [];
    const gate = deferred();

    const blocked = manager.withProjectLock('p1', async () => {
      await gate.promise;
      order.push('p1');
    });
    await manager.withProjectLock('p2', async () => {
      order.push('p2');
    });
    gate.resolve();
    await blocked;

    expect(order).toEqual(['p2', 'p1']);
  });

  it('releases the lock when the function throws', async () => {
    const manager = new MutexManager();
    await expect(
      manager.withProjectLock('p1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(manager.isProjectLocked('p1')).toBe(false);
    await expect(manager.withProjectLock('p1', async () => 'next')).resolves.toBe('next');
  });

  it('tracks and cleans up mutexes', () => {
    const manager = new MutexManager();
    manager.getProjectMutex('p1');
    manager.getProjectMutex('p2');
    expect(manager.getStats()).toEqual({ projectMutexes: 2 });

    manager.cleanupProjectMutex('p1');
    expect(manager.getStats()).toEqual({ projectMutexes: 1 });
    expect(manager.isProjectLocked('p1')).toBe(false);
  });
});
