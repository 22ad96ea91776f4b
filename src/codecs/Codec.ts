import type { ByteReader } from '../ByteReader';

/**
 * Base interface for all bencoding codecs.
 * @template TEncode The values this codec accepts for encoding.
 * @template TDecode The values it produces when decoding.
 */
export interface Codec<TEncode, TDecode = TEncode> {
  /** Yield the encoding of a value as successive byte chunks. Throws on unsupported values. */
  iterencode(value: TEncode): Generator<Uint8Array, void, undefined>;

  /** Decode one item at the reader's current offset, leaving the cursor after it. */
  decode(reader: ByteReader): TDecode;
}
