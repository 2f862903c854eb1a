/**
 * Error taxonomy for bucketing and local-time resolution.
 *
 * Every error carries a machine-readable `code` so callers (the CLI in
 * particular) can map it to an output shape and exit code without
 * inspecting messages.
 */

export type TzBucketErrorCode =
  | 'INVALID_TIMEZONE'
  | 'PARSE_ERROR'
  | 'INVALID_RANGE'
  | 'POLICY_ERROR'
  | 'RUNTIME_ERROR';

/**
 * Status tag carried by a {@link PolicyError}.
 */
export type PolicyErrorStatus = 'ambiguous' | 'nonexistent';

/**
 * Base class for all errors raised by the core.
 */
export class TzBucketError extends Error {
  readonly code: TzBucketErrorCode;
  readonly data?: Readonly<Record<string, unknown>>;

  constructor(code: TzBucketErrorCode, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'TzBucketError';
    this.code = code;
    this.data = data;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
    };
  }
}

/**
 * The zone name is not a known IANA timezone.
 */
export class InvalidTimezoneError extends TzBucketError {
  readonly zoneName: string;

  constructor(zoneName: string) {
    super('INVALID_TIMEZONE', `Invalid timezone: ${zoneName}`, { zoneName });
    this.name = 'InvalidTimezoneError';
    this.zoneName = zoneName;
  }
}

/**
 * Malformed timestamp or local-time text, or a numeric value outside the representable range.
 */
export class ParseError extends TzBucketError {
  readonly input: string;

  constructor(message: string, input: string) {
    super('PARSE_ERROR', message, { input });
    this.name = 'ParseError';
    this.input = input;
  }
}

/**
 * A UTC range whose start is not strictly before its end.
 */
export class InvalidRangeError extends TzBucketError {
  constructor(start: string, end: string) {
    super('INVALID_RANGE', `Invalid range: start '${start}' must be earlier than end '${end}'`, {
      start,
      end,
    });
    this.name = 'InvalidRangeError';
  }
}

/**
 * An ambiguous or nonexistent local time rejected by an `error` policy.
 */
export class PolicyError extends TzBucketError {
  readonly status: PolicyErrorStatus;

  constructor(message: string, status: PolicyErrorStatus) {
    super('POLICY_ERROR', message, { status });
    this.name = 'PolicyError';
    this.status = status;
  }
}

/**
 * Internal resolution failure: date arithmetic overflow or an exhausted search bound.
 */
export class RuntimeError extends TzBucketError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('RUNTIME_ERROR', message, data);
    this.name = 'RuntimeError';
  }
}

/**
 * Type guard for errors raised by the core.
 */
export function isTzBucketError(value: unknown): value is TzBucketError {
  return value instanceof TzBucketError;
}
