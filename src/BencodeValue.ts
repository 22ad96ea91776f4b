/**
 * Value model shared by the decoder, the encoder and the field layer.
 *
 * Decoding produces {@link BencodeValue}s. The encoder accepts the wider
 * {@link Encodable} family: text is encoded as UTF-8, booleans as 0/1,
 * and plain objects as dictionaries.
 */

/** Integers are numbers while they are safe, bigints beyond that. */
export type BencodeInteger = number | bigint;

/** Dictionary keys: text when decoded as UTF-8, raw bytes otherwise. */
export type BencodeKey = string | Uint8Array;

export type BencodeValue = Uint8Array | BencodeInteger | BencodeList | BencodeDict;
export type BencodeList = BencodeValue[];
export type BencodeDict = Map<BencodeKey, BencodeValue>;

export type Encodable =
  | Uint8Array
  | string
  | BencodeInteger
  | boolean
  | readonly Encodable[]
  | EncodableMap
  | EncodableObject;

export type EncodableMap = ReadonlyMap<BencodeKey, Encodable>;

export interface EncodableObject {
  readonly [key: string]: Encodable;
}

/** A mutable dictionary of encodable values, e.g. a record's backing store. */
export type EncodableDict = Map<BencodeKey, Encodable>;

/** Type guard: a bencode integer (integral number or bigint). */
export function isBencodeInteger(value: unknown): value is BencodeInteger {
  return (typeof value === 'number' && Number.isInteger(value)) || typeof value === 'bigint';
}

/** Type guard: a plain object literal (not an array, map or class instance). */
export function isPlainObject(value: unknown): value is EncodableObject {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Type guard: a Map, whatever its content. */
export function isMap(value: unknown): value is Map<unknown, unknown> {
  return value instanceof Map;
}
