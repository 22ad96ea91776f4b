import { ByteReader } from '../ByteReader';
import { Codec } from './Codec';
import { DecodeError } from '../errors';
import { CHAR_COLON, asciiBytes, asciiText } from '../helpers';

const CANONICAL_LENGTH = /^(?:0|[1-9][0-9]*)$/;

/**
 * Byte string codec: `<length>:<bytes>`.
 * The length is decimal with no sign, no padding and no leading zero.
 */
export class ByteStringCodec implements Codec<Uint8Array> {
  *iterencode(value: Uint8Array): Generator<Uint8Array, void, undefined> {
    yield asciiBytes(String(value.length));
    yield asciiBytes(':');
    if (value.length > 0) {
      yield value;
    }
  }

  decode(reader: ByteReader): Uint8Array {
    const start = reader.offset;
    const colon = reader.indexOf(CHAR_COLON, start + 1);
    if (colon < 0) {
      throw new DecodeError('MissingLengthDelimiter', 'missing data size delimiter', start);
    }

    const lengthText = asciiText(reader.slice(start, colon));
    if (!CANONICAL_LENGTH.test(lengthText)) {
      throw new DecodeError('MalformedLength', 'malformed data size', start, { text: lengthText });
    }

    const size = Number(lengthText);
    const dataStart = colon + 1;
    if (!Number.isSafeInteger(size) || size > reader.length - dataStart) {
      throw new DecodeError('LengthOutOfBounds', 'wrong data size', start, { size: lengthText });
    }

    reader.seek(dataStart);
    return reader.read(size);
  }
}
