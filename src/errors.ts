export type TrackingErrorKind =
  | 'validation'
  | 'not_found'
  | 'timeout'
  | 'structural_mismatch'
  | 'overloaded'
  | 'session'
  | 'cancelled';

export abstract class TrackingError extends Error {
  abstract readonly kind: TrackingErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends TrackingError {
  readonly kind = 'validation';

  /** Message safe to return to the caller as-is. */
  readonly publicMessage: string;

  constructor(publicMessage: string, detail?: string) {
    super(detail ?? publicMessage);
    this.publicMessage = publicMessage;
  }
}

export class NotFoundError extends TrackingError {
  readonly kind = 'not_found';
}

export class TimeoutError extends TrackingError {
  readonly kind = 'timeout';
}

export class StructuralMismatchError extends TrackingError {
  readonly kind = 'structural_mismatch';
}

export class OverloadedError extends TrackingError {
  readonly kind = 'overloaded';
}

export class SessionError extends TrackingError {
  readonly kind = 'session';
}

export class RequestCancelledError extends TrackingError {
  readonly kind = 'cancelled';

  constructor(message = 'Request cancelled by caller') {
    super(message);
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function isTrackingError(err: unknown): err is TrackingError {
  return err instanceof TrackingError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
