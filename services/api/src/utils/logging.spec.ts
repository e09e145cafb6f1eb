import { describe, expect, it } from 'vitest';

import { createRequestLogger } from './logging';

describe('createRequestLogger', () => {
  it('binds a scoped request id to the child logger', () => {
    const { requestId, log } = createRequestLogger('labels');

    expect(requestId).toMatch(/^labels-[A-Za-z0-9_-]{12}$/);
    expect(log.bindings()).toEqual({ requestId });
  });

  it('hands out a new id per request', () => {
    expect(createRequestLogger('labels').requestId).not.toBe(createRequestLogger('labels').requestId);
  });
});
