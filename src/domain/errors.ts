export type DomainErrorKind =
  | 'InvalidRequest'
  | 'AuthError'
  | 'RateLimited'
  | 'APIError'
  | 'NetworkError'
  | 'TimeoutError'
  | 'ToolNotFound'
  | 'ToolExecution'
  | 'MCPProtocol'
  | 'Configuration';

export class DomainError extends Error {
  readonly kind: DomainErrorKind;

  constructor(kind: DomainErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DomainError';
    this.kind = kind;
  }
}

export function isDomainError(error: unknown, kind?: DomainErrorKind): error is DomainError {
  if (!(error instanceof DomainError)) return false;
  return kind === undefined || error.kind === kind;
}

/**
 * Only transport-level failures are candidates for a retry policy. Timeouts are
 * excluded: the caller's deadline has already been spent.
 */
export function isRetryCandidate(error: unknown): boolean {
  return isDomainError(error, 'NetworkError');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
