import { ByteReader, DEFAULT_MAX_DEPTH } from './ByteReader';
import { BencodeCodec } from './codecs/BencodeCodec';
import type { KeyMode } from './codecs/DictCodec';
import type { BencodeValue, Encodable } from './BencodeValue';
import { DecodeError } from './errors';
import { concatBytes, typeName } from './helpers';

export interface DecodeOptions {
  /** Representation of dictionary keys. Default: `'bytes'`. */
  keys?: KeyMode;
  /** Maximum list/dictionary nesting. Default: 512. */
  maxDepth?: number;
}

const encoder = new BencodeCodec();
const decoders: Record<KeyMode, BencodeCodec> = {
  bytes: new BencodeCodec({ keys: 'bytes' }),
  utf8: new BencodeCodec({ keys: 'utf8' }),
  mixed: new BencodeCodec({ keys: 'mixed' }),
};

/**
 * Decode a complete bencoded value.
 * The whole input must be consumed: trailing bytes are an error.
 */
export function decode(data: Uint8Array, options: DecodeOptions = {}): BencodeValue {
  if (!(data instanceof Uint8Array)) {
    throw new DecodeError('NotBinary', `object of type ${typeName(data)} cannot be decoded`, 0);
  }
  if (data.length === 0) {
    throw new DecodeError('Empty', 'value is empty', 0);
  }

  const reader = ByteReader.from(data, options.maxDepth ?? DEFAULT_MAX_DEPTH);
  const value = decoders[options.keys ?? 'bytes'].decode(reader);
  if (!reader.atEnd) {
    throw new DecodeError('TrailingBytes', 'extra bytes at the end', reader.offset);
  }
  return value;
}

/** Yield the canonical encoding of a value in order, chunk by chunk. */
export function iterencode(value: Encodable): Generator<Uint8Array, void, undefined> {
  return encoder.iterencode(value);
}

/** Canonical encoding of a value. */
export function encode(value: Encodable): Uint8Array {
  return concatBytes(encoder.iterencode(value));
}
