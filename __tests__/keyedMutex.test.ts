/// <reference types="jest" />
import { KeyedMutex } from '../src/utils/keyedMutex';

const tick = () => new Promise<void>((resolve) => setImmediate(() => resolve()));

describe('KeyedMutex', () => {
  it('runs tasks under the same key one at a time, in call order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseFirst = () => resolve();
    });

    const first = mutex.runExclusive('k', async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive('k', async () => {
      order.push('second');
      return 2;
    });

    await tick();
    expect(order).toEqual(['first:start']);
    releaseFirst();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.size).toBe(0);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    let release: () => void = () => undefined;
    const held = mutex.runExclusive('a', () => new Promise<void>((resolve) => {
      release = () => resolve();
    }));
    await expect(mutex.runExclusive('b', async () => 'b done')).resolves.toBe('b done');
    release();
    await held;
  });

  it('releases the key when a task throws', async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive('k', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(mutex.runExclusive('k', async () => 'next')).resolves.toBe('next');
    expect(mutex.size).toBe(0);
  });
});
