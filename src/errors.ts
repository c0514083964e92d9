export type ProviderErrorKind =
  | 'auth'
  | 'quota'
  | 'timeout'
  | 'network'
  | 'http'
  | 'malformed_response';

/**
 * The model call failed. Recovered by the classifier into a fallback verdict,
 * never propagated past it.
 */
export class ProviderError extends Error {
  constructor(
    public readonly kind: ProviderErrorKind,
    message: string,
    public readonly details: { status?: number; cause?: unknown } = {},
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * The model answered but its output did not satisfy the response contract.
 */
export class SchemaViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaViolation';
  }
}

/**
 * The engine cannot be constructed. Fatal at start-up.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
