import { describe, expect, it } from 'vitest';

import { KeyedMutex } from '../../../src/core/keyed-mutex';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('should run sections for the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('pool', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive('pool', async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    expect(mutex.isLocked('pool')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(mutex.isLocked('pool')).toBe(false);
  });

  it('should not block sections for other keys', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const blocked = mutex.runExclusive('user:alice', async () => {
      await gate.promise;
      events.push('alice');
    });
    await mutex.runExclusive('user:bob', async () => {
      events.push('bob');
    });
    gate.resolve();
    await blocked;

    expect(events).toEqual(['bob', 'alice']);
  });

  it('should release the key when a section throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('pool', () => Promise.reject(new Error('boom'))),
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('pool', () => Promise.resolve(42))).resolves.toBe(42);
    expect(mutex.isLocked('pool')).toBe(false);
  });
});
