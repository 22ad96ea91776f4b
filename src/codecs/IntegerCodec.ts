import { ByteReader } from '../ByteReader';
import { Codec } from './Codec';
import type { BencodeInteger } from '../BencodeValue';
import { DecodeError, EncodeError } from '../errors';
import { CHAR_E, asciiBytes, asciiText } from '../helpers';

// The text must survive a parse/print round trip: no '+', no padding,
// no leading zero and no negative zero.
const CANONICAL_INTEGER = /^(?:0|-?[1-9][0-9]*)$/;

/**
 * Integer codec: `i<decimal>e`, arbitrary precision.
 * Decodes to a number while the value is a safe integer, a bigint beyond.
 */
export class IntegerCodec implements Codec<BencodeInteger> {
  *iterencode(value: BencodeInteger): Generator<Uint8Array, void, undefined> {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new EncodeError('UnsupportedType', `number ${value} cannot be encoded as an exact integer`, {
        value,
      });
    }
    yield asciiBytes('i');
    yield asciiBytes(value.toString());
    yield asciiBytes('e');
  }

  decode(reader: ByteReader): BencodeInteger {
    const start = reader.offset;
    const end = reader.indexOf(CHAR_E, start + 1);
    if (end < 0) {
      throw new DecodeError('MissingIntegerTerminator', 'missing int value terminator', start);
    }

    const text = asciiText(reader.slice(start + 1, end));
    if (!CANONICAL_INTEGER.test(text)) {
      throw new DecodeError('MalformedInteger', 'malformed int value', start, { text });
    }

    reader.seek(end + 1);
    return IntegerCodec.parse(text);
  }

  /** Parse canonical decimal text to the narrowest exact representation. */
  static parse(text: string): BencodeInteger {
    const asNumber = Number(text);
    if (Number.isSafeInteger(asNumber)) {
      return asNumber;
    }
    return BigInt(text);
  }
}
