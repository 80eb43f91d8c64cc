import { Waiter } from '@icewrite/core';
import { settle } from './src/scriptedAgent.js';

describe('Waiter', () => {
  test('wait() resolves on the next writability notification', async () => {
    const waiter = new Waiter(2);
    let woke = false;
    const pending = waiter.wait().then(() => {
      woke = true;
    });

    await settle();
    expect(woke).toBe(false);

    waiter.markWritable();
    await pending;
    expect(woke).toBe(true);
    expect(waiter.writable).toBe(true);
  });

  test('a notification that arrived before wait() is not lost until reset()', async () => {
    const waiter = new Waiter(1);
    waiter.markWritable();
    await expect(waiter.wait()).resolves.toBeUndefined();

    waiter.reset();
    expect(waiter.writable).toBe(false);
  });

  test('fail() wakes sleepers and keeps only the first error', async () => {
    const waiter = new Waiter(2);
    const first = new Error('first');
    const pending = waiter.wait();

    waiter.fail(first);
    waiter.fail(new Error('second'));

    await expect(pending).resolves.toBeUndefined();
    expect(waiter.error).toBe(first);
    expect(waiter.writable).toBe(false);
  });

  test('is disposed by the last release and ignores later notifications', () => {
    const waiter = new Waiter(3);
    expect(waiter.release()).toBe(false);
    expect(waiter.release()).toBe(false);
    expect(waiter.disposed).toBe(false);
    expect(waiter.release()).toBe(true);
    expect(waiter.disposed).toBe(true);

    waiter.markWritable();
    waiter.fail(new Error('late'));
    expect(waiter.writable).toBe(false);
    expect(waiter.error).toBeUndefined();
  });

  test('the last release wakes anything still waiting', async () => {
    const waiter = new Waiter(1);
    const pending = waiter.wait();
    waiter.release();
    await expect(pending).resolves.toBeUndefined();
  });

  test('throws when released more often than it has owners', () => {
    const waiter = new Waiter(1);
    waiter.release();
    expect(() => waiter.release()).toThrow('Waiter released more times than it has owners');
  });

  test('needs at least one owner', () => {
    expect(() => new Waiter(0)).toThrow(RangeError);
  });
});
