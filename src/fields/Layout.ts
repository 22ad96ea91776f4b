import type { BencodeInteger, BencodeKey, Encodable } from '../BencodeValue';
import type { Attr, FieldHost, TextContext } from './Attr';

/** One field per accessor name, typed by the value it holds. */
export type FieldSet<V> = { readonly [K in keyof V]: Attr<V[K]> };

/** Fields that decide how the record's other text fields are decoded. */
export interface ContextFields {
  encoding?: Attr<string>;
  codepage?: Attr<BencodeInteger>;
}

/**
 * The declared fields of a record type, in declaration order.
 * Binds every field to its accessor name.
 */
export class Layout<V> {
  readonly fields: FieldSet<V>;
  private readonly context: ContextFields;
  private readonly ordered: readonly Attr<unknown>[];

  constructor(fields: FieldSet<V>, context: ContextFields = {}) {
    this.fields = fields;
    this.context = context;

    const ordered: Attr<unknown>[] = [];
    for (const name in fields) {
      ordered.push(fields[name].bind(name));
    }
    for (const attr of [context.encoding, context.codepage]) {
      if (attr !== undefined && !ordered.includes(attr)) {
        throw new Error(`context field ${attr.name} is not part of the layout`);
      }
    }
    this.ordered = ordered;
  }

  /** Every field, in declaration order. */
  get all(): readonly Attr<unknown>[] {
    return this.ordered;
  }

  /** Text decoding settings of a record, loading the context fields if needed. */
  textContext(host: FieldHost, fallbackEncoding: string | null): TextContext {
    return {
      encoding: this.context.encoding?.get(host) ?? null,
      codepage: this.context.codepage?.get(host) ?? null,
      fallbackEncoding,
    };
  }

  /**
   * Load every field not loaded yet, context fields first.
   * Fields pulled in by another field's load are not loaded again.
   */
  loadAll(host: FieldHost): void {
    for (const attr of [this.context.encoding, this.context.codepage]) {
      if (attr !== undefined && !attr.isLoaded(host)) attr.loadFrom(host);
    }
    for (const attr of this.ordered) {
      if (!attr.isLoaded(host)) attr.loadFrom(host);
    }
  }

  saveAll(host: FieldHost): void {
    for (const attr of this.ordered) {
      attr.saveTo(host);
    }
  }

  dumpAll(host: FieldHost, tree: Map<BencodeKey, Encodable>): void {
    for (const attr of this.ordered) {
      attr.dumpTo(host, tree);
    }
  }
}
