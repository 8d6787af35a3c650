/**
 * Error hierarchy for translation failures.
 * Each error carries a stable code, a severity and the location it came from.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

export interface ErrorContext {
  pointer?: string; // JSON Pointer of the schema node (e.g. '/properties/name')
  ref?: string; // Reference text as written in the document
  value?: unknown; // Offending keyword value
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  location?: string;
}

export interface ErrorParams {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base class for every error the engine reports.
 */
export abstract class TranslationError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  protected constructor(params: ErrorParams, defaultCode: ErrorCode) {
    super(params.message, params.cause ? { cause: params.cause } : undefined);
    this.name = this.constructor.name;
    this.errorCode = params.errorCode ?? defaultCode;
    this.severity = params.severity ?? 'error';
    if (params.context !== undefined) {
      this.context = params.context;
    }
    if (params.cause !== undefined) {
      this.cause = params.cause;
    }
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Location as a URI fragment, `#` for the document root. */
  get location(): string | undefined {
    const pointer = this.context?.pointer;
    return pointer === undefined ? undefined : `#${pointer}`;
  }

  /**
   * Serialize for logging. `prod` omits the stack and the offending value.
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
    if (this.context !== undefined) {
      if (env === 'prod') {
        const { value: _value, ...rest } = this.context;
        base.context = rest;
      } else {
        base.context = this.context;
      }
    }
    if (env !== 'prod' && this.stack !== undefined) {
      base.stack = this.stack;
    }
    return base;
  }

  toUserError(): UserError {
    const user: UserError = {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
    };
    const location = this.location;
    if (location !== undefined) {
      user.location = location;
    }
    return user;
  }

  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  /** `<location>: <message>`, or the bare message when there is no location. */
  describe(): string {
    const location = this.location;
    return location === undefined ? this.message : `${location}: ${this.message}`;
  }
}

/**
 * Malformed keyword values and schemas that cannot be satisfied.
 */
export class SchemaError extends TranslationError {
  constructor(params: ErrorParams) {
    super(params, ErrorCode.INVALID_KEYWORD_VALUE);
  }
}

/**
 * `$ref` and `$id` problems: bad URIs, anchors, unmapped external documents.
 */
export class RefResolutionError extends TranslationError {
  constructor(params: ErrorParams) {
    super(params, ErrorCode.INVALID_REFERENCE);
  }

  get ref(): string | undefined {
    return this.context?.ref;
  }
}

/**
 * Keywords, formats and features outside the selected version, or not
 * implemented. Raised only in strict modes.
 */
export class FeatureError extends TranslationError {
  constructor(params: ErrorParams) {
    super(params, ErrorCode.UNSUPPORTED_FEATURE);
  }
}

export class GenerationError extends TranslationError {
  constructor(params: ErrorParams) {
    super(params, ErrorCode.GENERATION_FAILED);
  }
}

export class ConfigurationError extends TranslationError {
  constructor(params: ErrorParams) {
    super(params, ErrorCode.CONFIGURATION_ERROR);
  }
}

/**
 * Every error found by one call. Duplicates (same location and message)
 * are dropped; the message lists one error per line.
 */
export class ErrorList extends TranslationError {
  public readonly errors: readonly TranslationError[];

  constructor(errors: readonly TranslationError[]) {
    const unique = dedupe(errors);
    const first = unique[0];
    super(
      {
        message: unique.map((e) => e.describe()).join('\n'),
        ...(first !== undefined ? { errorCode: first.errorCode } : {}),
      },
      ErrorCode.INTERNAL_ERROR
    );
    this.errors = unique;
  }

  override describe(): string {
    return this.message;
  }
}

function dedupe(errors: readonly TranslationError[]): TranslationError[] {
  const seen = new Set<string>();
  const out: TranslationError[] = [];
  const flat = errors.flatMap((e) => (e instanceof ErrorList ? e.errors : [e]));
  for (const e of flat) {
    const key = e.describe();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(e);
  }
  return out;
}

export function isTranslationError(error: unknown): error is TranslationError {
  return error instanceof TranslationError;
}
