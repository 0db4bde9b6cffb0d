import { describe, expect, it } from 'vitest';

import { Mutex } from '@observatory/shared';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('Mutex', () => {
  it('runs critical sections one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const trace: string[] = [];

    const section = (name: string) =>
      mutex.runExclusive(async () => {
        trace.push(`${name}:start`);
        await tick();
        trace.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section('a'), section('b'), section('c')]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(trace).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('releases the lock when a section throws', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
  });
});
