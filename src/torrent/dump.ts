import { isBencodeInteger, isPlainObject, type BencodeKey } from '../BencodeValue';
import { toHex, typeName, utf8DecodeOrUndefined } from '../helpers';

export interface JsonFormatOptions {
  /**
   * Indentation: a number of spaces or a tab per level. Without it the
   * output is a single line with `", "` and `": "` separators.
   */
  indent?: number | '\t' | null;
  /** Sort dictionary keys. Default: false. */
  sortKeys?: boolean;
}

/** Byte strings as UTF-8 text when they decode, `hex::<hex>` otherwise. */
export function bytesToText(bytes: Uint8Array): string {
  return utf8DecodeOrUndefined(bytes) ?? `hex::${toHex(bytes)}`;
}

function keyToText(key: BencodeKey): string {
  return typeof key === 'string' ? key : bytesToText(key);
}

function entriesOf(value: object): [string, unknown][] | undefined {
  if (value instanceof Map) {
    const entries: [string, unknown][] = [];
    for (const [key, item] of value) {
      if (typeof key !== 'string' && !(key instanceof Uint8Array)) {
        throw new TypeError(`keys must be str or bytes, not ${typeName(key)}`);
      }
      entries.push([keyToText(key), item]);
    }
    return entries;
  }
  if (isPlainObject(value)) return Object.entries(value);
  return undefined;
}

/**
 * Render a bencodable value as JSON text.
 * Byte strings are rendered with {@link bytesToText}; non-ASCII text is
 * written as it is.
 */
export function formatJson(value: unknown, options: JsonFormatOptions = {}): string {
  const unit =
    options.indent === undefined || options.indent === null
      ? null
      : typeof options.indent === 'number'
        ? ' '.repeat(options.indent)
        : options.indent;
  const sortKeys = options.sortKeys ?? false;

  const render = (item: unknown, level: number): string => {
    if (typeof item === 'string') return JSON.stringify(item);
    if (item instanceof Uint8Array) return JSON.stringify(bytesToText(item));
    if (isBencodeInteger(item)) return item.toString();
    if (typeof item === 'boolean') return item ? 'true' : 'false';
    if (item === null) return 'null';

    let parts: string[];
    let open: string;
    let close: string;
    if (Array.isArray(item)) {
      parts = item.map(element => render(element, level + 1));
      [open, close] = ['[', ']'];
    } else {
      const entries = typeof item === 'object' ? entriesOf(item) : undefined;
      if (entries === undefined) {
        throw new TypeError(`Object of type ${typeName(item)} is not JSON serializable`);
      }
      if (sortKeys) {
        entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      }
      parts = entries.map(([key, element]) => `${JSON.stringify(key)}: ${render(element, level + 1)}`);
      [open, close] = ['{', '}'];
    }

    if (parts.length === 0) return open + close;
    if (unit === null) return open + parts.join(', ') + close;

    const inner = '\n' + unit.repeat(level + 1);
    return open + inner + parts.join(',' + inner) + '\n' + unit.repeat(level) + close;
  };

  return render(value, 0);
}
