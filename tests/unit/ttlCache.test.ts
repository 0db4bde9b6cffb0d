import { describe, expect, it } from 'vitest';

import { TtlCache } from '@observatory/shared';

function manualClock(start: string) {
  let now = new Date(start).getTime();
  return {
    clock: () => new Date(now),
    advance: (ms: number) => {
      now += ms;
    }
  };
}

describe('TtlCache', () => {
  it('expires entries once the ttl has elapsed', () => {
    const time = manualClock('2025-06-01T12:00:00Z');
    const cache = new TtlCache<string, number>(1000, time.clock);

    cache.set('a', 1);
    time.advance(999);
    expect(cache.get('a')).toBe(1);

    time.advance(1);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('restarts the ttl when a key is stored again', () => {
    const time = manualClock('2025-06-01T12:00:00Z');
    const cache = new TtlCache<string, number>(1000, time.clock);

    cache.set('a', 1);
    time.advance(800);
    cache.set('a', 2);
    time.advance(800);

    expect(cache.get('a')).toBe(2);
  });
});
