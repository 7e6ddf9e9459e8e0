import { describe, it, expect } from 'vitest';
import { getLoggingContext, updateLoggingContext, withLoggingContext } from '../log-context.js';

describe('logging context', () => {
  it('is empty outside a context block', () => {
    expect(getLoggingContext()).toEqual({});
  });

  it('propagates across awaits and merges nested blocks', async () => {
    const seen = await withLoggingContext({ sessionId: 'sess_1', requestId: 'req_1' }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return withLoggingContext({ stage: 'plan' }, async () => {
        await Promise.resolve();
        return getLoggingContext();
      });
    });

    expect(seen).toEqual({ sessionId: 'sess_1', requestId: 'req_1', stage: 'plan' });
  });

  it('updates the active context in place', () => {
    const seen = withLoggingContext({ sessionId: 'sess_2' }, () => {
      updateLoggingContext({ stage: 'execute', iteration: 2 });
      return getLoggingContext();
    });

    expect(seen).toEqual({ sessionId: 'sess_2', stage: 'execute', iteration: 2 });
  });

  it('ignores updates outside a context block', () => {
    updateLoggingContext({ stage: 'reflect' });

    expect(getLoggingContext()).toEqual({});
  });
});
