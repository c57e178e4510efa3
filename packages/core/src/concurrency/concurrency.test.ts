import { describe, expect, it } from 'vitest';
import { Mutex } from './mutex.js';
import { ReadWriteLock } from './read-write-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Mutex', () => {
  it('should run tasks one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive(() => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);
    expect(mutex.isLocked).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked).toBe(false);
  });

  it('should release the lock when the task throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked).toBe(false);
    await expect(mutex.runExclusive(() => 'ok')).resolves.toBe('ok');
  });
});

describe('ReadWriteLock', () => {
  it('should let readers overlap', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    let active = 0;
    let peak = 0;

    const reader = () =>
      lock.read(async () => {
        active++;
        peak = Math.max(peak, active);
        await gate.promise;
        active--;
      });

    const readers = Promise.all([reader(), reader(), reader()]);
    await Promise.resolve();
    gate.resolve();
    await readers;

    expect(peak).toBe(3);
  });

  it('should give a writer exclusive access', async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];
    const gate = deferred();

    const read1 = lock.read(async () => {
      order.push('read1:start');
      await gate.promise;
      order.push('read1:end');
    });
    const write = lock.write(() => {
      order.push('write');
    });
    const read2 = lock.read(() => {
      order.push('read2');
    });

    await Promise.resolve();
    expect(order).toEqual(['read1:start']);

    gate.resolve();
    await Promise.all([read1, write, read2]);

    expect(order).toEqual(['read1:start', 'read1:end', 'write', 'read2']);
  });
});
