export { decode, encode, iterencode } from './bencode';
export type { DecodeOptions } from './bencode';
export type {
  BencodeInteger,
  BencodeKey,
  BencodeValue,
  BencodeList,
  BencodeDict,
  Encodable,
  EncodableMap,
  EncodableObject,
  EncodableDict,
} from './BencodeValue';
export { ByteReader, DEFAULT_MAX_DEPTH } from './ByteReader';
export type { Codec } from './codecs/Codec';
export { ByteStringCodec } from './codecs/ByteStringCodec';
export { IntegerCodec } from './codecs/IntegerCodec';
export { ListCodec } from './codecs/ListCodec';
export { DictCodec } from './codecs/DictCodec';
export type { DictOptions, KeyMode } from './codecs/DictCodec';
export { BencodeCodec } from './codecs/BencodeCodec';
export type { Classified } from './codecs/BencodeCodec';
export * from './errors';
export { codepageEncoding, decodeText, isUtf8Label } from './text';
export { ValidatedList } from './values/ValidatedList';
export type { ItemValidator } from './values/ValidatedList';
export { Attr } from './fields/Attr';
export type {
  AttrOptions,
  FieldContext,
  FieldHost,
  TextContext,
  TypeCheck,
  Validator,
} from './fields/Attr';
export { Layout } from './fields/Layout';
export type { ContextFields, FieldSet } from './fields/Layout';
export * from './fields/validators';
export * from './fields/fields';
export { Backbone } from './torrent/Backbone';
export type { DumpOptions, RecordOptions, SaveOptions } from './torrent/Backbone';
export { Metainfo, METAINFO_LAYOUT } from './torrent/Metainfo';
export type { MetainfoFields } from './torrent/Metainfo';
export { bytesToText, formatJson } from './torrent/dump';
export type { JsonFormatOptions } from './torrent/dump';
export { createTorrent, parseTorrent, loadTorrent } from './torrent/index';
export type { ParseOptions } from './torrent/index';
