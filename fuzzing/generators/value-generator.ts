/**
 * Random bencodable value generator for fuzzing.
 *
 * Produces nested values of every bencoding type from a seed, so that
 * runs are reproducible.
 */

import type { Encodable } from '../../src/BencodeValue';
import { encode } from '../../src/bencode';

/** Seeded PRNG (xorshift32). */
export class Rng {
  private state: number;

  constructor(seed: number) {
    // xorshift32 never leaves the zero state
    this.state = seed >>> 0 || 0x9e3779b9;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state ^= this.state << 13;
    this.state ^= this.state >>> 17;
    this.state ^= this.state << 5;
    return (this.state >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns true with the given probability. */
  chance(p: number): boolean {
    return this.next() < p;
  }

  /** Returns `length` random bytes. */
  bytes(length: number): Uint8Array {
    const result = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
      result[i] = this.int(0, 255);
    }
    return result;
  }
}

export interface GeneratorOptions {
  /** Maximum nesting depth (default: 4). */
  maxDepth?: number;
  /** Maximum list length and dictionary size (default: 5). */
  maxItems?: number;
  /** Maximum byte string length (default: 16). */
  maxBytes?: number;
}

const DEFAULTS: Required<GeneratorOptions> = {
  maxDepth: 4,
  maxItems: 5,
  maxBytes: 16,
};

const WORDS = ['announce', 'info', 'length', 'name', 'piece length', 'pieces', 'path', 'files'];

const BOUNDARY_INTEGERS: readonly (number | bigint)[] = [
  0, 1, -1, 9, 10, 255, 256, 65535, 2 ** 31 - 1, -(2 ** 31),
  Number.MAX_SAFE_INTEGER, Number.MIN_SAFE_INTEGER,
  2n ** 53n, 2n ** 64n - 1n, -(2n ** 63n), 10n ** 30n,
];

export class ValueGenerator {
  private rng: Rng;
  private opts: Required<GeneratorOptions>;

  constructor(seed: number, options?: GeneratorOptions) {
    this.rng = new Rng(seed);
    this.opts = { ...DEFAULTS, ...options };
  }

  /** Generate a random value; containers only above `maxDepth`. */
  generate(depth = 0): Encodable {
    const kinds = depth >= this.opts.maxDepth ? ['bytes', 'int'] : ['bytes', 'int', 'list', 'dict'];
    switch (this.rng.pick(kinds)) {
      case 'bytes':
        return this.byteString();
      case 'int':
        return this.integer();
      case 'list': {
        const items: Encodable[] = [];
        const n = this.rng.int(0, this.opts.maxItems);
        for (let i = 0; i < n; i++) items.push(this.generate(depth + 1));
        return items;
      }
      default: {
        const dict = new Map<string | Uint8Array, Encodable>();
        const n = this.rng.int(0, this.opts.maxItems);
        for (let i = 0; i < n; i++) {
          const key = this.rng.chance(0.7) ? this.rng.pick(WORDS) + i : this.rng.bytes(this.rng.int(0, 4));
          dict.set(key, this.generate(depth + 1));
        }
        return dict;
      }
    }
  }

  private byteString(): Uint8Array | string {
    if (this.rng.chance(0.5)) return this.rng.pick(WORDS);
    return this.rng.bytes(this.rng.int(0, this.opts.maxBytes));
  }

  private integer(): number | bigint {
    if (this.rng.chance(0.3)) return this.rng.pick(BOUNDARY_INTEGERS);
    return this.rng.int(-1000, 1000);
  }
}

/**
 * Generate the canonical encoding of a random value.
 * Byte keys that collide with text keys are regenerated from the next seed.
 */
export function generateEncoded(seed: number, options?: GeneratorOptions): Uint8Array {
  for (let attempt = 0; ; attempt++) {
    try {
      return encode(new ValueGenerator(seed + attempt * 7919, options).generate());
    } catch (e) {
      if (attempt >= 10) throw e;
    }
  }
}
