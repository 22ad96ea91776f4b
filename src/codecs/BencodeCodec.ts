import { ByteReader } from '../ByteReader';
import { Codec } from './Codec';
import { ByteStringCodec } from './ByteStringCodec';
import { IntegerCodec } from './IntegerCodec';
import { ListCodec } from './ListCodec';
import { DictCodec, type DictOptions } from './DictCodec';
import {
  isBencodeInteger,
  isPlainObject,
  type BencodeInteger,
  type BencodeValue,
  type Encodable,
  type EncodableMap,
  type EncodableObject,
} from '../BencodeValue';
import { DecodeError, EncodeError } from '../errors';
import { CHAR_D, CHAR_I, CHAR_L, isDigit, typeName, utf8Encode } from '../helpers';

/** An encodable value, narrowed to the bencoding type it is written as. */
export type Classified =
  | { kind: 'bytes'; value: Uint8Array }
  | { kind: 'integer'; value: BencodeInteger }
  | { kind: 'list'; value: readonly Encodable[] }
  | { kind: 'dict'; value: EncodableMap | EncodableObject };

function assertNever(value: never): never {
  throw new Error(`unexpected value kind: ${JSON.stringify(value)}`);
}

/**
 * Codec for any bencoded value.
 * Decoding dispatches on the type selector byte; encoding dispatches on
 * the runtime type of the value.
 */
export class BencodeCodec implements Codec<Encodable, BencodeValue> {
  private readonly bytes = new ByteStringCodec();
  private readonly integer = new IntegerCodec();
  private readonly list: ListCodec;
  private readonly dict: DictCodec;

  constructor(options?: DictOptions) {
    this.list = new ListCodec(this);
    this.dict = new DictCodec(this, options);
  }

  *iterencode(value: Encodable): Generator<Uint8Array, void, undefined> {
    const item = BencodeCodec.classify(value);
    switch (item.kind) {
      case 'bytes':
        yield* this.bytes.iterencode(item.value);
        return;
      case 'integer':
        yield* this.integer.iterencode(item.value);
        return;
      case 'list':
        yield* this.list.iterencode(item.value);
        return;
      case 'dict':
        yield* this.dict.iterencode(item.value);
        return;
      default:
        assertNever(item);
    }
  }

  decode(reader: ByteReader): BencodeValue {
    const selector = reader.peek();
    if (isDigit(selector)) return this.bytes.decode(reader);
    if (selector === CHAR_I) return this.integer.decode(reader);
    if (selector === CHAR_L) return this.list.decode(reader);
    if (selector === CHAR_D) return this.dict.decode(reader);

    const hex = selector.toString(16).toUpperCase().padStart(2, '0');
    throw new DecodeError('UnknownTypeSelector', `unknown type selector 0x${hex}`, reader.offset, {
      selector,
    });
  }

  /**
   * Narrow a value to its bencoding type.
   * Values outside the encodable family are rejected, including ones that
   * only type-check through a widened reference.
   */
  static classify(value: unknown): Classified {
    if (value instanceof Uint8Array) return { kind: 'bytes', value };
    if (typeof value === 'string') return { kind: 'bytes', value: utf8Encode(value) };
    if (typeof value === 'boolean') return { kind: 'integer', value: value ? 1 : 0 };
    if (isBencodeInteger(value)) return { kind: 'integer', value };
    if (Array.isArray(value)) return { kind: 'list', value };
    if (value instanceof Map || isPlainObject(value)) return { kind: 'dict', value };

    throw new EncodeError('UnsupportedType', `object of type ${typeName(value)} cannot be encoded`, {
      value,
    });
  }
}
