import type { BencodeInteger, Encodable, EncodableDict } from '../BencodeValue';
import type { ValidatedList } from '../values/ValidatedList';
import { Attr, type TypeCheck } from './Attr';
import {
  BYTES,
  DATE,
  DICT,
  INTEGER,
  TEXT,
  bounded,
  dictLike,
  encoded,
  listOf,
  nodeItem,
  nonEmpty,
  splitNode,
  tierItem,
  toIsoString,
  toUnixSeconds,
  unixEpoch,
  validAnnounceList,
  validNodeList,
  validUrl,
  validUrlList,
  type Bounds,
  type UrlOptions,
} from './validators';

/** Field holding any value of the given type, stored as it is. */
export function field<T extends Encodable>(key: string, type: TypeCheck<T>): Attr<T> {
  return new Attr(key, { type, store: value => value });
}

export function integerField(key: string, bounds: Bounds = {}): Attr<BencodeInteger> {
  return new Attr(key, {
    type: INTEGER,
    validators: [bounded(bounds)],
    store: value => value,
  });
}

export function bytesField(key: string): Attr<Uint8Array> {
  return new Attr(key, {
    type: BYTES,
    validators: [nonEmpty<Uint8Array>()],
    store: value => value,
  });
}

export interface StringOptions {
  /** Fixed encoding of the stored bytes. Default: decided by the record. */
  encoding?: string;
}

/** Text stored as bytes in the record's encoding; saved back as UTF-8. */
export function stringField(key: string, options: StringOptions = {}): Attr<string> {
  return new Attr(key, {
    type: TEXT,
    validators: [encoded(options.encoding), nonEmpty<string>()],
    store: value => value,
  });
}

export function urlField(key: string, options: UrlOptions = {}): Attr<string> {
  return new Attr(key, {
    type: TEXT,
    validators: [encoded('utf-8'), nonEmpty<string>(), validUrl(options)],
    store: value => value,
  });
}

/** Seconds since the Unix epoch, exposed as a Date. */
export function timestampField(key: string): Attr<Date> {
  return new Attr(key, {
    type: DATE,
    validators: [unixEpoch()],
    store: toUnixSeconds,
    dump: toIsoString,
  });
}

/** List of URLs; stored bare when there is exactly one. */
export function urlListField(key: string, options?: UrlOptions): Attr<ValidatedList<string>> {
  const { validItem, validator } = validUrlList(options);
  return new Attr(key, {
    type: listOf('URL list', validItem),
    validators: [validator],
    store: list => {
      if (list.length === 0) return undefined;
      if (list.length === 1) return list.get(0);
      return list.toArray();
    },
  });
}

/** List of "host:port" nodes, stored as [host, port] pairs. */
export function nodeListField(key: string): Attr<ValidatedList<string>> {
  return new Attr(key, {
    type: listOf('node list', nodeItem),
    validators: [validNodeList()],
    store: list => (list.length === 0 ? undefined : list.toArray().map(splitNode)),
  });
}

/** Tiers of tracker URLs, stored as a list of lists. */
export function announceListField(key: string): Attr<ValidatedList<readonly string[]>> {
  return new Attr(key, {
    type: listOf('announce list', tierItem),
    validators: [validAnnounceList()],
    store: list => (list.length === 0 ? undefined : list.toArray()),
  });
}

/** Nested dictionary; plain objects are accepted on assignment. */
export function dictField(key: string): Attr<EncodableDict> {
  return new Attr(key, {
    type: DICT,
    validators: [dictLike()],
    store: value => value,
  });
}
