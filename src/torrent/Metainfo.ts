import type { BencodeInteger, EncodableDict, EncodableObject } from '../BencodeValue';
import {
  announceListField,
  dictField,
  integerField,
  nodeListField,
  stringField,
  timestampField,
  urlField,
  urlListField,
} from '../fields/fields';
import { Layout } from '../fields/Layout';
import type { ValidatedList } from '../values/ValidatedList';
import { Backbone, type RecordOptions } from './Backbone';

/** Typed fields of a torrent file. */
export interface MetainfoFields {
  info: EncodableDict;
  announce: string;
  announceList: ValidatedList<readonly string[]>;
  creationDate: Date;
  comment: string;
  createdBy: string;
  encoding: string;
  publisher: string;
  publisherUrl: string;
  nodes: ValidatedList<string>;
  urlList: ValidatedList<string>;
  private: BencodeInteger;
  codepage: BencodeInteger;
}

const encoding = stringField('encoding', { encoding: 'ascii' });
const codepage = integerField('codepage', { min: 1 });

export const METAINFO_LAYOUT = new Layout<MetainfoFields>(
  {
    info: dictField('info'),
    announce: urlField('announce'),
    announceList: announceListField('announce-list'),
    creationDate: timestampField('creation date'),
    comment: stringField('comment'),
    createdBy: stringField('created by'),
    encoding,
    publisher: stringField('publisher'),
    publisherUrl: urlField('publisher-url'),
    nodes: nodeListField('nodes'),
    urlList: urlListField('url-list'),
    private: integerField('private', { min: 0, max: 1 }),
    codepage,
  },
  { encoding, codepage },
);

type Assignable<T> = T | null | undefined;
type UrlListInput = Assignable<ValidatedList<string> | Iterable<string | Uint8Array> | string>;

/**
 * Contents of a `.torrent` file.
 * @see https://wiki.theory.org/BitTorrentSpecification#Metainfo_File_Structure
 */
export class Metainfo extends Backbone<MetainfoFields> {
  constructor(rawBytes: Uint8Array, options?: RecordOptions) {
    super(METAINFO_LAYOUT, rawBytes, options);
  }

  get info(): EncodableDict | null {
    return this.get('info');
  }
  set info(value: Assignable<EncodableDict | EncodableObject>) {
    this.set('info', value);
  }

  get announce(): string | null {
    return this.get('announce');
  }
  set announce(value: Assignable<string>) {
    this.set('announce', value);
  }

  get announceList(): ValidatedList<readonly string[]> | null {
    return this.get('announceList');
  }
  set announceList(value: Assignable<ValidatedList<readonly string[]> | Iterable<Iterable<string>>>) {
    this.set('announceList', value);
  }

  get creationDate(): Date | null {
    return this.get('creationDate');
  }
  set creationDate(value: Assignable<Date>) {
    this.set('creationDate', value);
  }

  get comment(): string | null {
    return this.get('comment');
  }
  set comment(value: Assignable<string>) {
    this.set('comment', value);
  }

  get createdBy(): string | null {
    return this.get('createdBy');
  }
  set createdBy(value: Assignable<string>) {
    this.set('createdBy', value);
  }

  get encoding(): string | null {
    return this.get('encoding');
  }
  set encoding(value: Assignable<string>) {
    this.set('encoding', value);
  }

  get publisher(): string | null {
    return this.get('publisher');
  }
  set publisher(value: Assignable<string>) {
    this.set('publisher', value);
  }

  get publisherUrl(): string | null {
    return this.get('publisherUrl');
  }
  set publisherUrl(value: Assignable<string>) {
    this.set('publisherUrl', value);
  }

  get nodes(): ValidatedList<string> | null {
    return this.get('nodes');
  }
  set nodes(value: Assignable<ValidatedList<string> | Iterable<string> | string>) {
    this.set('nodes', value);
  }

  get urlList(): ValidatedList<string> | null {
    return this.get('urlList');
  }
  set urlList(value: UrlListInput) {
    this.set('urlList', value);
  }

  get private(): BencodeInteger | null {
    return this.get('private');
  }
  set private(value: Assignable<BencodeInteger>) {
    this.set('private', value);
  }

  get codepage(): BencodeInteger | null {
    return this.get('codepage');
  }
  set codepage(value: Assignable<BencodeInteger>) {
    this.set('codepage', value);
  }
}
