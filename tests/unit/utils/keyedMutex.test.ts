/**
 * Unit tests for KeyedMutex
 */

import { KeyedMutex } from '../../../src/utils/keyedMutex';

const flushMacrotasks = () => new Promise<void>((resolve) => setImmediate(resolve));

const createGate = () => {
  let open: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { gate, open: () => open() };
};

describe('KeyedMutex', () => {
  it('should run work for the same key one at a time, in arrival order', async () => {
    const mutex = new KeyedMutex<number>();
    const events: string[] = [];
    const { gate, open } = createGate();

    const first = mutex.runExclusive(1, async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
    });
    const second = mutex.runExclusive(1, async () => {
      events.push('second:start');
    });

    await flushMacrotasks();
    expect(events).toEqual(['first:start']);

    open();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should not make different keys wait on each other', async () => {
    const mutex = new KeyedMutex<number>();
    const events: string[] = [];
    const { gate, open } = createGate();

    const blocked = mutex.runExclusive(1, async () => {
      await gate;
      events.push('client-1');
    });
    await mutex.runExclusive(2, async () => {
      events.push('client-2');
    });

    expect(events).toEqual(['client-2']);

    open();
    await blocked;
    expect(events).toEqual(['client-2', 'client-1']);
  });

  it('should return the value produced by the work', async () => {
    const mutex = new KeyedMutex<string>();

    await expect(mutex.runExclusive('a', () => 42)).resolves.toBe(42);
  });

  it('should release the key when the work throws', async () => {
    const mutex = new KeyedMutex<number>();

    await expect(
      mutex.runExclusive(1, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive(1, async () => 'next')).resolves.toBe('next');
  });

  it('should report a key as locked only while work is queued', async () => {
    const mutex = new KeyedMutex<number>();
    const { gate, open } = createGate();

    const running = mutex.runExclusive(7, () => gate);

    expect(mutex.isLocked(7)).toBe(true);
    expect(mutex.isLocked(8)).toBe(false);

    open();
    await running;

    expect(mutex.isLocked(7)).toBe(false);
    expect(mutex.size).toBe(0);
  });

  it('should serialize many concurrent read-modify-write cycles', async () => {
    const mutex = new KeyedMutex<number>();
    let counter = 0;

    await Promise.all(
      Array.from({ length: 50 }, () =>
        mutex.runExclusive(1, async () => {
          const read = counter;
          await flushMacrotasks();
          counter = read + 1;
        })
      )
    );

    expect(counter).toBe(50);
    expect(mutex.size).toBe(0);
  });
});
