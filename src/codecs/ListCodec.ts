import { ByteReader } from '../ByteReader';
import { Codec } from './Codec';
import type { BencodeList, BencodeValue, Encodable } from '../BencodeValue';
import { DecodeError } from '../errors';
import { CHAR_E, asciiBytes } from '../helpers';

/**
 * List codec: `l<item>*e`.
 * Items are handled by the element codec, usually the full value codec.
 */
export class ListCodec implements Codec<readonly Encodable[], BencodeList> {
  private readonly itemCodec: Codec<Encodable, BencodeValue>;

  constructor(itemCodec: Codec<Encodable, BencodeValue>) {
    this.itemCodec = itemCodec;
  }

  *iterencode(value: readonly Encodable[]): Generator<Uint8Array, void, undefined> {
    yield asciiBytes('l');
    for (const item of value) {
      yield* this.itemCodec.iterencode(item);
    }
    yield asciiBytes('e');
  }

  decode(reader: ByteReader): BencodeList {
    const start = reader.offset;
    reader.descend();
    reader.skip();

    const result: BencodeList = [];
    while (!reader.atEnd) {
      if (reader.peek() === CHAR_E) {
        reader.skip();
        reader.ascend();
        return result;
      }
      result.push(this.itemCodec.decode(reader));
    }

    throw new DecodeError('MissingListTerminator', 'missing list value terminator', start);
  }
}
