export type NotationErrorKind = 'unknown_code' | 'malformed_sequence' | 'missing_required_serve';

function buildMessage(reason: string, fragment: string, code: string) {
  if (!fragment) return code ? `${reason} (code "${code}")` : reason;
  if (fragment === code) return `${reason}: "${fragment}"`;
  return `${reason}: "${fragment}" in "${code}"`;
}

/**
 * Base error for everything that goes wrong while decoding a charted point.
 *
 * `fragment` is the substring that could not be decoded and `code` the full
 * code it came from, so a dropped row can be traced back to its source.
 */
export class NotationError extends Error {
  readonly kind: NotationErrorKind;
  readonly fragment: string;
  readonly code: string;
  readonly reason: string;

  constructor(kind: NotationErrorKind, reason: string, fragment: string, code: string) {
    super(buildMessage(reason, fragment, code));
    this.name = 'NotationError';
    this.kind = kind;
    this.fragment = fragment;
    this.code = code;
    this.reason = reason;
  }
}

/** A character or token outside the notation tables. */
export class UnknownCodeError extends NotationError {
  constructor(reason: string, fragment: string, code: string = fragment) {
    super('unknown_code', reason, fragment, code);
    this.name = 'UnknownCodeError';
  }
}

/**
 * Known characters in an order the notation does not allow, e.g. shots after
 * a winner or a second-serve code on a point whose first serve went in.
 */
export class MalformedSequenceError extends NotationError {
  constructor(reason: string, fragment: string, code: string = fragment) {
    super('malformed_sequence', reason, fragment, code);
    this.name = 'MalformedSequenceError';
  }
}

export class MissingRequiredServeError extends NotationError {
  constructor(reason: string, code: string = '') {
    super('missing_required_serve', reason, '', code);
    this.name = 'MissingRequiredServeError';
  }
}

export function isNotationError(error: unknown): error is NotationError {
  return error instanceof NotationError;
}
