import { describe, it, expect } from 'vitest';
import { KeyedLock } from './keyedLock';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs tasks for the same key one after the other', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run('a', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.run('a', async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('runs tasks for different keys concurrently', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run('a', async () => {
      events.push('a:start');
      await gate.promise;
      events.push('a:end');
    });
    const second = lock.run('b', async () => {
      events.push('b:start');
    });

    await second;
    expect(events).toEqual(['a:start', 'b:start']);

    gate.resolve();
    await first;
  });

  it('releases the key when a task rejects', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('a', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(await lock.run('a', async () => 'after')).toBe('after');
    expect(lock.size).toBe(0);
  });

  it('forgets keys once their queue drains', async () => {
    const lock = new KeyedLock();
    await Promise.all([
      lock.run('a', async () => undefined),
      lock.run('a', async () => undefined),
      lock.run('b', async () => undefined),
    ]);
    expect(lock.size).toBe(0);
  });
});
