import { ByteReader } from '../ByteReader';
import { Codec } from './Codec';
import { ByteStringCodec } from './ByteStringCodec';
import type {
  BencodeDict,
  BencodeKey,
  BencodeValue,
  Encodable,
  EncodableMap,
  EncodableObject,
} from '../BencodeValue';
import { DecodeError, EncodeError } from '../errors';
import {
  CHAR_E,
  asciiBytes,
  asciiText,
  compareBytes,
  formatValue,
  typeName,
  utf8DecodeOrUndefined,
  utf8Encode,
} from '../helpers';

/**
 * How decoded dictionary keys are represented.
 * - `bytes`: always raw bytes.
 * - `utf8`: always text; a key that is not valid UTF-8 is an error.
 * - `mixed`: text where the key is valid UTF-8, raw bytes otherwise.
 */
export type KeyMode = 'bytes' | 'utf8' | 'mixed';

export interface DictOptions {
  keys?: KeyMode;
}

interface ProjectedEntry {
  keyBytes: Uint8Array;
  value: Encodable;
}

/**
 * Dictionary codec: `d(<key><value>)*e`.
 * Keys are byte strings, written in ascending raw byte order.
 */
export class DictCodec implements Codec<EncodableMap | EncodableObject, BencodeDict> {
  private readonly itemCodec: Codec<Encodable, BencodeValue>;
  private readonly keyCodec = new ByteStringCodec();
  private readonly keyMode: KeyMode;

  constructor(itemCodec: Codec<Encodable, BencodeValue>, options?: DictOptions) {
    this.itemCodec = itemCodec;
    this.keyMode = options?.keys ?? 'bytes';
  }

  *iterencode(value: EncodableMap | EncodableObject): Generator<Uint8Array, void, undefined> {
    const entries = DictCodec.sortedEntries(value);
    yield asciiBytes('d');
    for (const entry of entries) {
      yield* this.keyCodec.iterencode(entry.keyBytes);
      yield* this.itemCodec.iterencode(entry.value);
    }
    yield asciiBytes('e');
  }

  decode(reader: ByteReader): BencodeDict {
    const start = reader.offset;
    reader.descend();
    reader.skip();

    const result: BencodeDict = new Map();
    // Raw keys seen so far, as one char per byte
    const seen = new Set<string>();

    while (!reader.atEnd) {
      if (reader.peek() === CHAR_E) {
        reader.skip();
        reader.ascend();
        return result;
      }

      const keyStart = reader.offset;
      const key = this.itemCodec.decode(reader);
      if (!(key instanceof Uint8Array)) {
        throw new DecodeError('UnsupportedKeyType', `unsupported key type ${typeName(key)}`, keyStart);
      }

      const rawKey = asciiText(key);
      if (seen.has(rawKey)) {
        throw new DecodeError('DuplicateKey', `duplicate key ${formatValue(key)}`, keyStart);
      }
      seen.add(rawKey);

      const converted = this.convertKey(key, keyStart);
      if (reader.atEnd) break;
      result.set(converted, this.itemCodec.decode(reader));
    }

    throw new DecodeError('MissingDictTerminator', 'missing dict value terminator', start);
  }

  private convertKey(key: Uint8Array, position: number): BencodeKey {
    if (this.keyMode === 'bytes') return key;

    const text = utf8DecodeOrUndefined(key);
    if (text !== undefined) return text;
    if (this.keyMode === 'mixed') return key;

    throw new DecodeError('InvalidUtf8Key', `not a UTF-8 key: ${formatValue(key)}`, position);
  }

  /**
   * Project keys to raw bytes and sort them.
   * Text keys project to their UTF-8 encoding; two keys with the same
   * projection are duplicates.
   */
  static sortedEntries(value: EncodableMap | EncodableObject): ProjectedEntry[] {
    const source: Iterable<[unknown, Encodable]> =
      value instanceof Map ? value.entries() : Object.entries(value);

    const entries: ProjectedEntry[] = [];
    for (const [key, item] of source) {
      if (typeof key === 'string') {
        entries.push({ keyBytes: utf8Encode(key), value: item });
      } else if (key instanceof Uint8Array) {
        entries.push({ keyBytes: key, value: item });
      } else {
        throw new EncodeError('UnsupportedKeyType', `invalid key type ${typeName(key)}`, { key });
      }
    }

    entries.sort((a, b) => compareBytes(a.keyBytes, b.keyBytes));

    for (let i = 1; i < entries.length; i++) {
      if (compareBytes(entries[i - 1].keyBytes, entries[i].keyBytes) === 0) {
        const keyBytes = entries[i].keyBytes;
        const shown = utf8DecodeOrUndefined(keyBytes) ?? formatValue(keyBytes);
        throw new EncodeError('DuplicateKey', `duplicate key ${shown}`, { key: keyBytes });
      }
    }

    return entries;
  }
}
