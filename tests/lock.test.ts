import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../src/pipeline/lock';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('serializes work on the same key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();
    const first = mutex.runExclusive('a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('a', async () => {
      order.push('second');
    });
    await Promise.resolve();
    expect(mutex.isLocked('a')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('a')).toBe(false);
  });

  it('lets different keys run concurrently', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];
    const a = mutex.runExclusive('a', async () => {
      await gate.promise;
      order.push('a');
    });
    await mutex.runExclusive('b', async () => {
      order.push('b');
    });
    gate.resolve();
    await a;
    expect(order).toEqual(['b', 'a']);
  });

  it('releases the key when the work throws', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive('a', async () => {
        throw new Error('fail');
      })
    ).rejects.toThrow('fail');
    expect(mutex.isLocked('a')).toBe(false);
    expect(await mutex.runExclusive('a', async () => 7)).toBe(7);
  });
});
