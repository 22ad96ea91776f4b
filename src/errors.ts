export type ErrorContext = Readonly<Record<string, unknown>>;

export type BaseErrorOptions<C extends string = string> = Readonly<{
  code: C;
  context?: ErrorContext;
  cause?: unknown;
}>;

/**
 * Root of every error raised by this package.
 * Carries a machine-readable `code` and structured `context`.
 */
export class BaseError<C extends string = string> extends Error {
  readonly code: C;
  readonly context: ErrorContext;

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause });

    this.name = this.constructor.name;
    this.code = options.code;
    this.context = Object.freeze({ ...options.context });

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ---------------------------------------------------------------------------
// Codec errors
// ---------------------------------------------------------------------------

export type DecodeErrorCode =
  | 'NotBinary'
  | 'Empty'
  | 'UnknownTypeSelector'
  | 'MissingLengthDelimiter'
  | 'MalformedLength'
  | 'LengthOutOfBounds'
  | 'MissingIntegerTerminator'
  | 'MalformedInteger'
  | 'MissingListTerminator'
  | 'MissingDictTerminator'
  | 'UnsupportedKeyType'
  | 'DuplicateKey'
  | 'InvalidUtf8Key'
  | 'NestingTooDeep'
  | 'TrailingBytes';

/** Raised when input bytes are not canonical bencoding. */
export class DecodeError extends BaseError<DecodeErrorCode> {
  /** Byte offset at which the problem was detected. */
  readonly position: number;

  constructor(code: DecodeErrorCode, message: string, position: number, context?: ErrorContext) {
    super(message, { code, context: { ...context, position } });
    this.position = position;
  }
}

export type EncodeErrorCode = 'UnsupportedType' | 'UnsupportedKeyType' | 'DuplicateKey';

/** Raised when a value has no bencoded representation. */
export class EncodeError extends BaseError<EncodeErrorCode> {
  constructor(code: EncodeErrorCode, message: string, context?: ErrorContext) {
    super(message, { code, context });
  }
}

// ---------------------------------------------------------------------------
// Field errors
// ---------------------------------------------------------------------------

export type FieldErrorCode =
  | 'TypeMismatch'
  | 'OutOfRange'
  | 'EmptyValue'
  | 'UndecodableText'
  | 'ConversionFailed'
  | 'IllFormedUrl'
  | 'InvalidNode';

/**
 * A value rejected by a field policy.
 * Policies raise it without a field name; the accessor running the
 * policy attaches its own name with {@link FieldError.attach}.
 */
export class FieldError extends BaseError<FieldErrorCode> {
  private _field: string | undefined;
  readonly value: unknown;
  readonly detail: string;

  constructor(code: FieldErrorCode, detail: string, value: unknown) {
    super(detail, { code, context: { value } });
    this.detail = detail;
    this.value = value;
  }

  /** Name of the field that rejected the value, once attached. */
  get field(): string | undefined {
    return this._field;
  }

  /** Prefix the message with the field name. Only the first call has effect. */
  attach(field: string): this {
    if (this._field === undefined) {
      this._field = field;
      this.message = `${field}: ${this.detail}`;
    }
    return this;
  }
}

/** The value has the wrong shape (type) for the field. */
export class FieldTypeError extends FieldError {
  readonly expected: string;

  constructor(value: unknown, expected: string, shown: string) {
    super('TypeMismatch', `expected ${shown} to be of type ${expected}`, value);
    this.expected = expected;
  }
}

/** The value has the right shape but unacceptable content. */
export class FieldValueError extends FieldError {}

export class FieldRangeError extends FieldValueError {
  constructor(value: unknown, detail: string) {
    super('OutOfRange', detail, value);
  }
}

export class EmptyValueError extends FieldValueError {
  constructor(value: unknown) {
    super('EmptyValue', 'empty value is not allowed', value);
  }
}

export class TextDecodeError extends FieldValueError {
  /** Encodings tried, in order. */
  readonly encodings: readonly string[];

  constructor(value: unknown, shown: string, encodings: readonly string[]) {
    super('UndecodableText', `cannot decode ${shown} as ${encodings.join(', ')}`, value);
    this.encodings = encodings;
  }
}

export class ConversionError extends FieldValueError {
  constructor(value: unknown, detail: string) {
    super('ConversionFailed', detail, value);
  }
}

export type IllFormedUrlReason = 'missing scheme' | 'unexpected scheme' | 'missing hostname';

export class IllFormedUrlError extends FieldValueError {
  readonly reason: IllFormedUrlReason;

  constructor(value: string, reason: IllFormedUrlReason) {
    super('IllFormedUrl', `the value ${JSON.stringify(value)} is ill-formed (${reason})`, value);
    this.reason = reason;
  }
}

export class InvalidNodeError extends FieldValueError {
  constructor(value: unknown, detail: string) {
    super('InvalidNode', detail, value);
  }
}

// ---------------------------------------------------------------------------
// Record errors
// ---------------------------------------------------------------------------

export type MetainfoErrorCode = 'ExpectedTopLevelDict' | 'NoAssociatedFile';

export class MetainfoError extends BaseError<MetainfoErrorCode> {
  constructor(code: MetainfoErrorCode, message: string) {
    super(message, { code });
  }
}

/** Exclusive creation failed because the target already exists. */
export class FileExistsError extends BaseError<'FileExists'> {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`file already exists: ${path}`, { code: 'FileExists', context: { path }, cause });
    this.path = path;
  }
}
