import { describe, expect, it } from 'vitest';

import { logger } from '@observatory/shared';

describe('shared logger', () => {
  it('attaches context via withContext', () => {
    const child = logger.withContext({ traceId: 'trace-1', userId: 7, slotId: 3 });

    const bindings = child.bindings();

    expect(bindings.traceId).toBe('trace-1');
    expect(bindings.userId).toBe(7);
    expect(bindings.slotId).toBe(3);
  });

  it('nests contexts', () => {
    const child = logger.withContext({ userId: 7 }).withContext({ slotId: 9 });

    expect(child.bindings()).toMatchObject({ userId: 7, slotId: 9 });
  });
});
