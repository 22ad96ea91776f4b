import codepages from './codepages.json';
import { errorCode } from './helpers';

/** Windows code page numbers mapped to WHATWG encoding labels. */
const CODEPAGE_LABELS: ReadonlyMap<number, string> = new Map(
  Object.entries(codepages).map(([page, label]) => [Number(page), label]),
);

const UTF8_LABELS = new Set(['utf-8', 'utf8', 'unicode-1-1-utf-8']);
const ASCII_LABELS = new Set(['ascii', 'us-ascii']);

/** Encoding label for a numeric code page; unknown pages map to `cp<N>`. */
export function codepageEncoding(codepage: number): string {
  return CODEPAGE_LABELS.get(codepage) ?? `cp${codepage}`;
}

/** Whether a label names UTF-8. */
export function isUtf8Label(label: string): boolean {
  return UTF8_LABELS.has(label.trim().toLowerCase());
}

/**
 * Strict decoding of bytes in a named encoding.
 * Returns undefined when the bytes are invalid in that encoding or the
 * encoding is not supported.
 */
export function decodeText(bytes: Uint8Array, encoding: string): string | undefined {
  const label = encoding.trim().toLowerCase();

  // WHATWG treats "ascii" as windows-1252
  if (ASCII_LABELS.has(label)) {
    let result = '';
    for (const byte of bytes) {
      if (byte >= 0x80) return undefined;
      result += String.fromCharCode(byte);
    }
    return result;
  }

  try {
    return new TextDecoder(label, { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (e) {
    const code = errorCode(e);
    if (code === 'ERR_ENCODING_NOT_SUPPORTED' || code === 'ERR_ENCODING_INVALID_ENCODED_DATA') {
      return undefined;
    }
    throw e;
  }
}
