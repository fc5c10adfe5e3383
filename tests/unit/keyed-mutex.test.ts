import { describe, it, expect } from '@jest/globals';
import { KeyedMutex } from '../../src/utils/keyed-mutex';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('should run work for one key one at a time, in arrival order', async () => {
    const locks = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const first = locks.runExclusive('a', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = locks.runExclusive('a', async () => {
      events.push('second');
    });

    await new Promise((r) => setImmediate(r));
    expect(events).toEqual(['first:start']);
    expect(locks.isLocked('a')).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not hold up other keys', async () => {
    const locks = new KeyedMutex();
    const gate = deferred();

    const blocked = locks.runExclusive('a', () => gate.promise);
    await expect(locks.runExclusive('b', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await blocked;
  });

  it('should release the key when work throws', async () => {
    const locks = new KeyedMutex();

    await expect(
      locks.runExclusive('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(locks.isLocked('a')).toBe(false);
    expect(locks.size).toBe(0);
    await expect(locks.runExclusive('a', async () => 1)).resolves.toBe(1);
  });

  it('should forget keys nobody holds', async () => {
    const locks = new KeyedMutex();
    await Promise.all([locks.runExclusive('a', async () => 1), locks.runExclusive('b', async () => 2)]);
    expect(locks.size).toBe(0);
  });
});
