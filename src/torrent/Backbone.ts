import * as fs from 'fs';
import { decode, encode } from '../bencode';
import type { BencodeKey, Encodable, EncodableDict } from '../BencodeValue';
import { FileExistsError, MetainfoError } from '../errors';
import { errorCode, typeName } from '../helpers';
import type { FieldHost, TextContext } from '../fields/Attr';
import type { Layout } from '../fields/Layout';
import { formatJson, type JsonFormatOptions } from './dump';

export interface RecordOptions {
  /** Load fields on first access instead of at construction. Default: false. */
  lazy?: boolean;
  /** Encoding tried last when decoding text fields. */
  fallbackEncoding?: string | null;
  /** Keep dictionary keys that are not UTF-8 as raw bytes instead of failing. */
  binaryKeys?: boolean;
  /** File the bytes were read from, used by {@link Backbone.save}. */
  filePath?: string | null;
}

export interface SaveOptions {
  /** Replace an existing file. Default: false, the file must not exist. */
  overwrite?: boolean;
}

export interface DumpOptions extends JsonFormatOptions, SaveOptions {}

/**
 * Write a whole file. Without `overwrite` the file is created exclusively,
 * failing with {@link FileExistsError} if it exists.
 */
function writeFile(path: string, contents: Uint8Array | string, overwrite: boolean): void {
  try {
    fs.writeFileSync(path, contents, { flag: overwrite ? 'w' : 'wx' });
  } catch (e) {
    if (errorCode(e) === 'EEXIST') {
      throw new FileExistsError(path, e);
    }
    throw e;
  }
}

/**
 * A bencoded dictionary with typed fields on top.
 *
 * The dictionary holds the keys no field has loaded yet, and keys no field
 * knows about. Loaded fields live in their own slots until saved.
 */
export class Backbone<V> implements FieldHost {
  readonly layout: Layout<V>;
  readonly data: EncodableDict;
  /** Bytes last parsed or written. */
  rawBytes: Uint8Array;
  /** File last loaded or saved to. */
  filePath: string | null;
  /** Encoding tried last when decoding text fields loaded from now on. */
  fallbackEncoding: string | null;

  constructor(layout: Layout<V>, rawBytes: Uint8Array, options: RecordOptions = {}) {
    const value = decode(rawBytes, { keys: options.binaryKeys ? 'mixed' : 'utf8' });
    if (!(value instanceof Map)) {
      throw new MetainfoError(
        'ExpectedTopLevelDict',
        `expected top-level dictionary instead of ${typeName(value)}`,
      );
    }

    this.layout = layout;
    this.data = new Map<BencodeKey, Encodable>(value);
    this.rawBytes = rawBytes;
    this.filePath = options.filePath ?? null;
    this.fallbackEncoding = options.fallbackEncoding ?? null;

    if (!options.lazy) {
      this.loadFields();
    }
  }

  get<K extends keyof V>(name: K): V[K] | null {
    return this.layout.fields[name].get(this);
  }

  /** Assign a field by accessor name; the value is validated first. */
  set<K extends keyof V>(name: K, value: unknown): void {
    this.layout.fields[name].set(this, value);
  }

  textContext(): TextContext {
    return this.layout.textContext(this, this.fallbackEncoding);
  }

  /** Load every field not loaded yet. */
  loadFields(): void {
    this.layout.loadAll(this);
  }

  /** Write every loaded field back to the dictionary. */
  saveFields(): void {
    this.layout.saveAll(this);
  }

  /** Canonical bencoding of the record, fields included. */
  toBytes(): Uint8Array {
    this.saveFields();
    return encode(this.data);
  }

  /** Write the record to a file and remember it on success. */
  saveAs(path: string, options: SaveOptions = {}): void {
    const rawBytes = this.toBytes();
    writeFile(path, rawBytes, options.overwrite ?? false);
    this.rawBytes = rawBytes;
    this.filePath = path;
  }

  /** Write the record back to the file it was loaded from or last saved to. */
  save(): void {
    if (this.filePath === null) {
      throw new MetainfoError('NoAssociatedFile', 'expected a torrent loaded from file');
    }
    this.saveAs(this.filePath, { overwrite: true });
  }

  /** The dictionary as written by {@link Backbone.dump}, before formatting. */
  toDumpTree(): Map<BencodeKey, Encodable> {
    this.loadFields();
    this.saveFields();
    const tree = new Map(this.data);
    this.layout.dumpAll(this, tree);
    return tree;
  }

  /** Write a JSON rendering of the record. There is no way to read it back. */
  dump(path: string, options: DumpOptions = {}): void {
    const text = formatJson(this.toDumpTree(), options);
    writeFile(path, text, options.overwrite ?? false);
  }
}
