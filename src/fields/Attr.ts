import type { BencodeInteger, BencodeKey, Encodable, EncodableDict } from '../BencodeValue';
import { FieldError, FieldTypeError } from '../errors';
import { formatValue } from '../helpers';

/** Settings that decide how a record's byte strings are decoded to text. */
export interface TextContext {
  /** Value of the record's own `encoding` field. */
  encoding: string | null;
  /** Value of the record's own `codepage` field. */
  codepage: BencodeInteger | null;
  /** Encoding tried last, chosen by the caller. */
  fallbackEncoding: string | null;
}

/** The record a field reads from and writes to. */
export interface FieldHost {
  readonly data: EncodableDict;
  textContext(): TextContext;
}

export interface FieldContext {
  readonly host: FieldHost;
}

/** Runtime type check with a label for error messages. */
export interface TypeCheck<T> {
  readonly label: string;
  is(value: unknown): value is T;
}

/**
 * One link of a field's validation chain. Every hook is optional.
 * - `load` runs on raw stored values only, before anything else.
 * - `coerce` runs on loaded and assigned values, before the type check.
 * - `check` runs on loaded and assigned values, after the type check.
 */
export interface Validator<T> {
  load?(value: unknown, ctx: FieldContext): unknown;
  coerce?(value: unknown, ctx: FieldContext): unknown;
  check?(value: T, ctx: FieldContext): void;
}

export interface AttrOptions<T> {
  type: TypeCheck<T>;
  validators?: readonly Validator<T>[];
  /** Stored form of a value; `undefined` removes the key. */
  store(value: T): Encodable | undefined;
  /** Human-readable form for dumps; the stored form when absent. */
  dump?(value: T): Encodable;
}

interface Slot<T> {
  value: T | null;
}

/**
 * A typed view over one key of a record's dictionary.
 *
 * A field starts UNLOADED for each record. The first read (or a bulk load)
 * validates the raw value, caches the result and removes the key from the
 * dictionary; from then on the field is LOADED and the cache is the source
 * of truth until {@link Attr.saveTo} writes it back.
 */
export class Attr<T> {
  readonly key: string;
  private _name: string | undefined;
  private readonly options: AttrOptions<T>;
  private readonly slots = new WeakMap<FieldHost, Slot<T>>();
  /** Records this field is loading from right now. */
  private readonly loading = new WeakSet<FieldHost>();

  constructor(key: string, options: AttrOptions<T>) {
    this.key = key;
    this.options = options;
  }

  /** Name used in error messages: the accessor name once bound, the key before. */
  get name(): string {
    return this._name ?? this.key;
  }

  get type(): TypeCheck<T> {
    return this.options.type;
  }

  /** Give the field its accessor name. A field keeps the first name it gets. */
  bind(name: string): this {
    if (this._name !== undefined && this._name !== name) {
      throw new Error(`field ${JSON.stringify(this.key)} is already bound as ${this._name}`);
    }
    this._name = name;
    return this;
  }

  isLoaded(host: FieldHost): boolean {
    return this.slots.has(host);
  }

  /** Current value, loading it first if needed. */
  get(host: FieldHost): T | null {
    const slot = this.slots.get(host);
    return slot === undefined ? this.loadFrom(host) : slot.value;
  }

  /** Validate and assign a value; `null` or `undefined` clears the field. */
  set(host: FieldHost, value: unknown): void {
    if (value === null || value === undefined) {
      this.slots.set(host, { value: null });
      return;
    }
    this.slots.set(host, { value: this.validate(value, { host }) });
  }

  /**
   * Read, validate and cache the raw value, then remove its key.
   * A failed validation leaves both the dictionary and the field untouched.
   * A field whose load reads the field itself, such as a record encoding
   * decoded with the record's own text settings, is an error.
   */
  loadFrom(host: FieldHost): T | null {
    const raw = host.data.get(this.key);
    let value: T | null = null;

    if (raw !== undefined) {
      if (this.loading.has(host)) {
        throw new Error(`field ${this.name} is read while it is being loaded`);
      }
      const ctx = { host };
      this.loading.add(host);
      try {
        value = this.guard(() => {
          let loaded: unknown = raw;
          for (const validator of this.validators) {
            if (validator.load) loaded = validator.load(loaded, ctx);
          }
          return this.validate(loaded, ctx);
        });
      } finally {
        this.loading.delete(host);
      }
      host.data.delete(this.key);
    }

    this.slots.set(host, { value });
    return value;
  }

  /** Write the cached value back. Untouched fields leave the dictionary alone. */
  saveTo(host: FieldHost): void {
    const slot = this.slots.get(host);
    if (slot === undefined) return;

    const stored = slot.value === null ? undefined : this.options.store(slot.value);
    if (stored === undefined) {
      host.data.delete(this.key);
    } else {
      host.data.set(this.key, stored);
    }
  }

  /** Replace this field's entry in a dump tree with its human-readable form. */
  dumpTo(host: FieldHost, tree: Map<BencodeKey, Encodable>): void {
    const slot = this.slots.get(host);
    if (slot === undefined || slot.value === null || !this.options.dump) return;
    if (tree.has(this.key)) {
      tree.set(this.key, this.options.dump(slot.value));
    }
  }

  private get validators(): readonly Validator<T>[] {
    return this.options.validators ?? [];
  }

  private validate(value: unknown, ctx: FieldContext): T {
    return this.guard(() => {
      let coerced = value;
      for (const validator of this.validators) {
        if (validator.coerce) coerced = validator.coerce(coerced, ctx);
      }

      const { type } = this.options;
      if (!type.is(coerced)) {
        throw new FieldTypeError(coerced, type.label, formatValue(coerced));
      }

      for (const validator of this.validators) {
        if (validator.check) validator.check(coerced, ctx);
      }
      return coerced;
    });
  }

  private guard<R>(run: () => R): R {
    try {
      return run();
    } catch (e) {
      if (e instanceof FieldError) throw e.attach(this.name);
      throw e;
    }
  }
}
