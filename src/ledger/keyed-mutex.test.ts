import { describe, it, expect } from 'vitest';
import { KeyedMutex } from './keyed-mutex.js';

const tick = () => new Promise((resolve) => setTimeout(resolve, 5));

describe('KeyedMutex', () => {
  it('runs tasks under one key one at a time, in order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([mutex.run('a', task('one')), mutex.run('a', task('two'))]);

    expect(results).toEqual(['one', 'two']);
    expect(events).toEqual(['one:start', 'one:end', 'two:start', 'two:end']);
  });

  it('lets different keys overlap', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.run('a', async () => {
        events.push('a:start');
        await tick();
        events.push('a:end');
      }),
      mutex.run('b', async () => {
        events.push('b:start');
        await tick();
        events.push('b:end');
      })
    ]);

    expect(events.slice(0, 2)).toEqual(['a:start', 'b:start']);
  });

  it('keeps going after a task fails', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.run('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.run('a', async () => 'next')).resolves.toBe('next');
  });

  it('releases the key when idle', async () => {
    const mutex = new KeyedMutex();
    const running = mutex.run('a', tick);

    expect(mutex.isLocked('a')).toBe(true);
    await running;
    expect(mutex.isLocked('a')).toBe(false);
  });
});
