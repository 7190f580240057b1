/**
 * Per-call context: a cancellation signal plus the absolute deadline (epoch ms)
 * that signal will fire at, when one has been applied.
 */
export interface CallContext {
  readonly signal: AbortSignal;
  readonly deadline?: number;
}

export function background(): CallContext {
  return { signal: new AbortController().signal };
}

export function withTimeout(ctx: CallContext, timeoutMs: number): CallContext {
  const deadline = Date.now() + timeoutMs;
  if (ctx.deadline !== undefined && ctx.deadline <= deadline) return ctx;
  return {
    signal: AbortSignal.any([ctx.signal, AbortSignal.timeout(timeoutMs)]),
    deadline
  };
}

export function ensureDeadline(ctx: CallContext, timeoutMs: number): CallContext {
  return ctx.deadline === undefined ? withTimeout(ctx, timeoutMs) : ctx;
}

export function withCancel(ctx: CallContext): { ctx: CallContext; cancel: () => void } {
  const controller = new AbortController();
  return {
    ctx: { signal: AbortSignal.any([ctx.signal, controller.signal]), deadline: ctx.deadline },
    cancel: () => controller.abort()
  };
}

export function isTimeoutAbort(signal: AbortSignal): boolean {
  if (!signal.aborted) return false;
  const reason: unknown = signal.reason;
  return typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
}
