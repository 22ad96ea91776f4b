import {
  isBencodeInteger,
  isPlainObject,
  type BencodeInteger,
  type EncodableDict,
} from '../BencodeValue';
import {
  ConversionError,
  EmptyValueError,
  FieldRangeError,
  FieldTypeError,
  IllFormedUrlError,
  InvalidNodeError,
  TextDecodeError,
} from '../errors';
import { errorCode, formatValue } from '../helpers';
import { codepageEncoding, decodeText, isUtf8Label } from '../text';
import { ValidatedList, type ItemValidator } from '../values/ValidatedList';
import type { FieldContext, TextContext, TypeCheck, Validator } from './Attr';

// ---------------------------------------------------------------------------
// Type checks
// ---------------------------------------------------------------------------

/** Build a type check from a label and a guard. */
export function typed<T>(label: string, is: (value: unknown) => value is T): TypeCheck<T> {
  return { label, is };
}

export const BYTES = typed('bytes', (v): v is Uint8Array => v instanceof Uint8Array);
export const TEXT = typed('string', (v): v is string => typeof v === 'string');
export const INTEGER = typed('integer', isBencodeInteger);
export const DICT = typed('dict', (v): v is EncodableDict => v instanceof Map);
export const DATE = typed('Date', (v): v is Date => v instanceof Date);

// ---------------------------------------------------------------------------
// Value checks
// ---------------------------------------------------------------------------

export interface Bounds {
  min?: BencodeInteger;
  max?: BencodeInteger;
}

/** Reject integers outside [min, max]; either bound may be omitted. */
export function bounded({ min, max }: Bounds): Validator<BencodeInteger> {
  return {
    check(value) {
      if (min !== undefined && value < min) {
        throw new FieldRangeError(value, `expected ${value} to be at least ${min}`);
      }
      if (max !== undefined && value > max) {
        throw new FieldRangeError(value, `expected ${value} to be at most ${max}`);
      }
    },
  };
}

/** Reject empty byte strings and lists, and blank text. */
export function nonEmpty<T extends { readonly length: number }>(): Validator<T> {
  return {
    check(value) {
      const text: unknown = value;
      const empty = typeof text === 'string' ? text.trim() === '' : value.length === 0;
      if (empty) throw new EmptyValueError(value);
    },
  };
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

/**
 * Encodings to try for a record's text, in order: the record's `encoding`
 * unless it is UTF-8, else its `codepage`; then UTF-8; then the fallback.
 */
export function candidateEncodings(context: TextContext): string[] {
  const candidates: string[] = [];
  if (context.encoding !== null && !isUtf8Label(context.encoding)) {
    candidates.push(context.encoding);
  } else if (context.codepage !== null) {
    candidates.push(codepageEncoding(Number(context.codepage)));
  }
  candidates.push('utf-8');
  if (context.fallbackEncoding !== null) {
    candidates.push(context.fallbackEncoding);
  }

  const seen = new Set<string>();
  return candidates.filter(label => {
    const key = isUtf8Label(label) ? 'utf-8' : label.trim().toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Decode bytes with the first encoding that accepts them. */
export function decodeWithCandidates(bytes: Uint8Array, encodings: readonly string[]): string {
  for (const encoding of encodings) {
    const text = decodeText(bytes, encoding);
    if (text !== undefined) return text;
  }
  throw new TextDecodeError(bytes, formatValue(bytes), encodings);
}

/**
 * Decode stored byte strings to text on load.
 * An explicit encoding is the only one tried; otherwise the record's
 * text context decides.
 */
export function encoded(encoding?: string): Validator<string> {
  return {
    load(value: unknown, ctx: FieldContext) {
      if (!(value instanceof Uint8Array)) return value;
      const encodings =
        encoding !== undefined ? [encoding] : candidateEncodings(ctx.host.textContext());
      return decodeWithCandidates(value, encodings);
    },
  };
}

// ---------------------------------------------------------------------------
// Timestamps
// ---------------------------------------------------------------------------

/** 0001-01-01T00:00:00Z */
export const MIN_TIMESTAMP = -62135596800;
/** 9999-12-31T23:59:59Z */
export const MAX_TIMESTAMP = 253402300799;

function checkSeconds(value: unknown, seconds: BencodeInteger): void {
  if (seconds < MIN_TIMESTAMP || seconds > MAX_TIMESTAMP) {
    throw new ConversionError(value, `timestamp ${seconds} is out of range`);
  }
}

/** Whole seconds since the epoch, rounded down. */
export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/** ISO-8601 at second precision with an explicit UTC offset. */
export function toIsoString(date: Date): string {
  return `${new Date(toUnixSeconds(date) * 1000).toISOString().slice(0, 19)}+00:00`;
}

/** Stored integers are seconds since the Unix epoch, loaded as Dates. */
export function unixEpoch(): Validator<Date> {
  return {
    load(value) {
      if (!isBencodeInteger(value)) return value;
      checkSeconds(value, value);
      return new Date(Number(value) * 1000);
    },
    check(value) {
      if (Number.isNaN(value.getTime())) {
        throw new ConversionError(value, 'expected a valid date');
      }
      checkSeconds(value, toUnixSeconds(value));
    },
  };
}

// ---------------------------------------------------------------------------
// URLs
// ---------------------------------------------------------------------------

export const DEFAULT_SCHEMES: readonly string[] = ['https', 'http', 'udp'];

const SCHEME = /^([A-Za-z][A-Za-z0-9+.-]*):/;

/** Reject a URL without a scheme, with a scheme not allowed, or without a host. */
export function checkUrl(value: string, schemes: ReadonlySet<string>): void {
  const match = SCHEME.exec(value);
  if (match === null) {
    throw new IllFormedUrlError(value, 'missing scheme');
  }
  if (!schemes.has(match[1].toLowerCase())) {
    throw new IllFormedUrlError(value, 'unexpected scheme');
  }

  // The authority must follow the scheme directly: "http:host" has none
  const hasAuthority = value.startsWith('//', match[0].length);
  let hostname = '';
  if (hasAuthority) {
    try {
      hostname = new URL(value).hostname;
    } catch (e) {
      if (errorCode(e) !== 'ERR_INVALID_URL') throw e;
    }
  }
  if (hostname === '') {
    throw new IllFormedUrlError(value, 'missing hostname');
  }
}

function schemeSet(schemes: readonly string[] = DEFAULT_SCHEMES): ReadonlySet<string> {
  return new Set(schemes.filter(s => s !== '').map(s => s.toLowerCase()));
}

export interface UrlOptions {
  /** Allowed schemes. Default: https, http, udp. */
  schemes?: readonly string[];
}

export function validUrl(options: UrlOptions = {}): Validator<string> {
  const schemes = schemeSet(options.schemes);
  return {
    check(value) {
      checkUrl(value, schemes);
    },
  };
}

/** Item validator for URL lists: UTF-8 bytes or text, holding an acceptable URL. */
export function urlItem(options: UrlOptions = {}): ItemValidator<string> {
  const schemes = schemeSet(options.schemes);
  return (value: unknown): string => {
    const text = value instanceof Uint8Array ? decodeWithCandidates(value, ['utf-8']) : value;
    if (typeof text !== 'string') {
      throw new FieldTypeError(text, 'string', formatValue(text));
    }
    checkUrl(text, schemes);
    return text;
  };
}

const defaultUrlItem = urlItem();

// ---------------------------------------------------------------------------
// Lists
// ---------------------------------------------------------------------------

/** Iterable other than text or bytes, whose items become list elements. */
function isItemIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof Uint8Array) &&
    Symbol.iterator in value
  );
}

/**
 * Turn an assigned or loaded value into a list validated by `validItem`.
 * A list that already uses the same validator is adopted as it is.
 * A single item (text or bytes) becomes a one-element list.
 */
function toValidatedList<T>(value: unknown, validItem: ItemValidator<T>): unknown {
  if (value instanceof ValidatedList && value.validItem === validItem) return value;
  if (typeof value === 'string' || value instanceof Uint8Array) {
    return new ValidatedList(validItem, value);
  }
  if (isItemIterable(value)) {
    return new ValidatedList(validItem, ...value);
  }
  return value;
}

/** A type check for lists sharing one item validator. */
export function listOf<T>(label: string, validItem: ItemValidator<T>): TypeCheck<ValidatedList<T>> {
  return typed(label, (v): v is ValidatedList<T> => v instanceof ValidatedList && v.validItem === validItem);
}

/** Web seed URLs; stored as a bare URL when there is only one. */
export function validUrlList(options?: UrlOptions): {
  validItem: ItemValidator<string>;
  validator: Validator<ValidatedList<string>>;
} {
  const validItem = options === undefined ? defaultUrlItem : urlItem(options);
  return {
    validItem,
    validator: {
      coerce: value => toValidatedList(value, validItem),
    },
  };
}

const NODE_PORT = /^[0-9]+$/;

/**
 * Node item validator: `"host:port"` text, or a `[host, port]` pair as
 * stored in the dictionary. The port must be within 1–65535.
 */
export const nodeItem: ItemValidator<string> = (value: unknown): string => {
  let host: string;
  let port: string;

  if (Array.isArray(value)) {
    const [rawHost, rawPort, ...rest] = value;
    const text = rawHost instanceof Uint8Array ? decodeWithCandidates(rawHost, ['utf-8']) : rawHost;
    if (rest.length > 0 || typeof text !== 'string' || !isBencodeInteger(rawPort)) {
      throw new InvalidNodeError(value, `expected ${formatValue(value)} to be a [host, port] pair`);
    }
    host = text;
    port = rawPort.toString();
  } else if (typeof value === 'string') {
    const colon = value.lastIndexOf(':');
    if (colon < 0) {
      throw new InvalidNodeError(value, `expected ${formatValue(value)} to be "host:port"`);
    }
    host = value.slice(0, colon);
    port = value.slice(colon + 1);
  } else {
    throw new FieldTypeError(value, 'string', formatValue(value));
  }

  if (host === '') {
    throw new InvalidNodeError(value, `missing host in ${formatValue(value)}`);
  }
  const portNumber = NODE_PORT.test(port) ? Number(port) : NaN;
  if (!(portNumber >= 1 && portNumber <= 65535)) {
    throw new InvalidNodeError(value, `invalid port ${port} in ${formatValue(value)}`);
  }
  return `${host}:${portNumber}`;
};

/** DHT bootstrap nodes, loaded from `[host, port]` pairs. */
export function validNodeList(): Validator<ValidatedList<string>> {
  return {
    load(value) {
      // A stored list is a list of pairs, never a bare node
      return Array.isArray(value) ? new ValidatedList(nodeItem, ...value) : value;
    },
    coerce: value => toValidatedList(value, nodeItem),
  };
}

/** Split "host:port" back into the stored pair. */
export function splitNode(node: string): [string, number] {
  const colon = node.lastIndexOf(':');
  return [node.slice(0, colon), Number(node.slice(colon + 1))];
}

/**
 * Announce list tier validator: a non-empty list of tracker URLs.
 * Tiers are frozen so that their content can only change through the
 * owning list.
 */
export const tierItem: ItemValidator<readonly string[]> = (value: unknown): readonly string[] => {
  if (!isItemIterable(value)) {
    throw new FieldTypeError(value, 'list', formatValue(value));
  }
  const items = Array.from(value);
  if (items.length === 0) {
    throw new EmptyValueError(value);
  }
  return Object.freeze(items.map(defaultUrlItem));
};

/** Tiers of tracker URLs, each tier a non-empty list. */
export function validAnnounceList(): Validator<ValidatedList<readonly string[]>> {
  return {
    coerce(value) {
      if (value instanceof ValidatedList && value.validItem === tierItem) return value;
      if (isItemIterable(value)) {
        return new ValidatedList(tierItem, ...value);
      }
      return value;
    },
  };
}

/** Accept plain objects where a dictionary is expected. */
export function dictLike(): Validator<EncodableDict> {
  return {
    coerce(value) {
      return isPlainObject(value) ? new Map(Object.entries(value)) : value;
    },
  };
}
