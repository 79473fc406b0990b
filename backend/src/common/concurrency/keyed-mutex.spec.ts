import { describe, expect, it } from '@jest/globals';

import { KeyedMutex } from './keyed-mutex.js';

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('KeyedMutex', () => {
  it('runs tasks for the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive('doc', task('first', 20)),
      mutex.runExclusive('doc', task('second', 1)),
    ]);

    expect(results).toEqual(['first', 'second']);
    expect(events).toEqual([
      'first:start',
      'first:end',
      'second:start',
      'second:end',
    ]);
  });

  it('lets different keys run concurrently', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('a', async () => {
        events.push('a:start');
        await delay(20);
        events.push('a:end');
      }),
      mutex.runExclusive('b', async () => {
        events.push('b:start');
        await delay(1);
        events.push('b:end');
      }),
    ]);

    expect(events).toEqual(['a:start', 'b:start', 'b:end', 'a:end']);
  });

  it('keeps going after a failed task and forgets idle keys', async () => {
    const mutex = new KeyedMutex();

    const failed = mutex.runExclusive('doc', async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('doc', async () => 'recovered');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('recovered');
    expect(mutex.isLocked('doc')).toBe(false);
  });
});
