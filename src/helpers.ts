// ASCII codes of the bencoding delimiters
export const CHAR_COLON = 0x3a; // ':'
export const CHAR_D = 0x64; // 'd'
export const CHAR_E = 0x65; // 'e'
export const CHAR_I = 0x69; // 'i'
export const CHAR_L = 0x6c; // 'l'
export const CHAR_0 = 0x30; // '0'
export const CHAR_9 = 0x39; // '9'

const utf8Encoder = new TextEncoder();
const strictUtf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Check if a byte is an ASCII digit. */
export function isDigit(byte: number): boolean {
  return byte >= CHAR_0 && byte <= CHAR_9;
}

/** Encode text as ASCII bytes. Callers only pass digits, signs and delimiters. */
export function asciiBytes(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    bytes[i] = text.charCodeAt(i);
  }
  return bytes;
}

/** Decode ASCII bytes to text without validation. */
export function asciiText(bytes: Uint8Array): string {
  let result = '';
  for (let i = 0; i < bytes.length; i++) {
    result += String.fromCharCode(bytes[i]);
  }
  return result;
}

export function utf8Encode(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

/**
 * The `code` of an error raised by Node (`EEXIST`, `ERR_INVALID_URL`, ...).
 * Such errors may come from another realm, so `instanceof` is not used.
 */
export function errorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

/** Strict UTF-8 decoding; returns undefined for invalid sequences. */
export function utf8DecodeOrUndefined(bytes: Uint8Array): string | undefined {
  try {
    return strictUtf8Decoder.decode(bytes);
  } catch (e) {
    if (errorCode(e) === 'ERR_ENCODING_INVALID_ENCODED_DATA') return undefined;
    throw e;
  }
}

/** Concatenate byte chunks into a single array. */
export function concatBytes(chunks: Iterable<Uint8Array>): Uint8Array {
  const parts = Array.from(chunks);
  let total = 0;
  for (const part of parts) {
    total += part.length;
  }
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/** Lexicographic comparison of raw bytes. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareBytes(a, b) === 0;
}

/** Format a Uint8Array as a hex string. */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Human-readable rendering of a value for error messages.
 * Byte strings show as text when they are printable UTF-8, hex otherwise.
 */
export function formatValue(value: unknown): string {
  if (value instanceof Uint8Array) {
    const text = utf8DecodeOrUndefined(value);
    if (text !== undefined && !/[\u0000-\u001f\u007f]/.test(text)) {
      return `bytes ${JSON.stringify(text)}`;
    }
    return `bytes 0x${toHex(value)}`;
  }
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'bigint') return `${value}n`;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
  if (value === null || value === undefined || typeof value !== 'object') return String(value);
  return Object.prototype.toString.call(value);
}

/** Name of a value's runtime type, for "cannot be encoded/decoded" messages. */
export function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}
