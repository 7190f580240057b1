import { describe, expect, it } from 'vitest';
import { background, ensureDeadline, isTimeoutAbort, withCancel, withTimeout } from '../src/util/context.js';
import { delay } from './helpers.js';

describe('call context', () => {
  it('keeps an earlier deadline', () => {
    const outer = withTimeout(background(), 50);
    expect(withTimeout(outer, 5000)).toBe(outer);
    expect(ensureDeadline(outer, 10)).toBe(outer);
  });

  it('tightens a later deadline', () => {
    const outer = withTimeout(background(), 5000);
    const inner = withTimeout(outer, 50);
    expect(inner).not.toBe(outer);
    expect(inner.deadline).toBeLessThan(outer.deadline ?? 0);
  });

  it('fires a timeout abort at the deadline', async () => {
    const ctx = withTimeout(background(), 10);
    await delay(50);
    expect(ctx.signal.aborted).toBe(true);
    expect(isTimeoutAbort(ctx.signal)).toBe(true);
  });

  it('distinguishes cancellation from timeout', () => {
    const { ctx, cancel } = withCancel(background());
    expect(ctx.signal.aborted).toBe(false);
    cancel();
    expect(ctx.signal.aborted).toBe(true);
    expect(isTimeoutAbort(ctx.signal)).toBe(false);
  });
});
