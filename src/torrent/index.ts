import * as fs from 'fs';
import { asciiBytes } from '../helpers';
import { Metainfo } from './Metainfo';
import type { RecordOptions } from './Backbone';

export type ParseOptions = Omit<RecordOptions, 'filePath'>;

/** An empty torrent. */
export function createTorrent(options?: ParseOptions): Metainfo {
  return parseTorrent(asciiBytes('de'), options);
}

/** A torrent from bencoded bytes. */
export function parseTorrent(rawBytes: Uint8Array, options?: ParseOptions): Metainfo {
  return new Metainfo(rawBytes, { ...options, filePath: null });
}

/** A torrent read from a file, remembered for {@link Metainfo.save}. */
export function loadTorrent(path: string, options?: ParseOptions): Metainfo {
  const rawBytes = new Uint8Array(fs.readFileSync(path));
  return new Metainfo(rawBytes, { ...options, filePath: path });
}
