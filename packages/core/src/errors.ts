// packages/core/src/errors.ts
export type ErrorCode = 'CONFIG' | 'CONNECTION' | 'UNKNOWN_FIELD' | 'LOOKUP' | 'ABORTED';

export const DEPTH_LIMIT_WARNING = 'depth length limit exceeded';

export class FieldLinkError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid schema. Fatal: the process never starts serving. */
export class ConfigError extends FieldLinkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

/** A relation's data source is unreachable at startup. Fatal. */
export class ConnectionError extends FieldLinkError {
  readonly relation: string;

  constructor(relation: string, message: string, options?: { cause?: unknown }) {
    super('CONNECTION', message, options);
    this.relation = relation;
  }
}

export class UnknownFieldError extends FieldLinkError {
  readonly field: string;

  constructor(field: string) {
    super('UNKNOWN_FIELD', `no relation has field \`${field}\``);
    this.field = field;
  }
}

/** A read failed during traversal; fails only the current request. */
export class LookupError extends FieldLinkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LOOKUP', message, options);
  }
}

export class RequestAbortedError extends FieldLinkError {
  constructor(reason: string) {
    super('ABORTED', `request aborted: ${reason}`);
  }
}

/** Errors scoped to a single resolution request (rendered as a failure response). */
export function isRequestError(e: unknown): e is UnknownFieldError | LookupError | RequestAbortedError {
  return e instanceof UnknownFieldError || e instanceof LookupError || e instanceof RequestAbortedError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
