import { describe, expect, it } from 'vitest';
import { Mutex } from '../../src/utils/mutex';
import { sleep } from '../../src/utils/async';

describe('Mutex', () => {
  it('runs tasks one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await sleep(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive(task('a', 15)),
      mutex.runExclusive(task('b', 1)),
      mutex.runExclusive(task('c', 5)),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('releases the lock when a task throws', async () => {
    const mutex = new Mutex();
    const failed = mutex.runExclusive(() => {
      throw new Error('broken');
    });
    const next = mutex.runExclusive(() => 'after');

    await expect(failed).rejects.toThrow('broken');
    await expect(next).resolves.toBe('after');
    await sleep(0);
    expect(mutex.locked).toBe(false);
  });

  it('reports whether work is queued', async () => {
    const mutex = new Mutex();
    const pending = mutex.runExclusive(() => sleep(5));
    expect(mutex.locked).toBe(true);
    await pending;
    await sleep(0);
    expect(mutex.locked).toBe(false);
  });
});
