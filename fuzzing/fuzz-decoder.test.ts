/**
 * Fuzz tests for decode and parseTorrent.
 *
 * Tests that the decoder either succeeds and returns a value that
 * re-encodes canonically, or throws a DecodeError and nothing else.
 */

import { decode, encode } from '../src/bencode';
import { BaseError, DecodeError } from '../src/errors';
import { toHex } from '../src/helpers';
import { parseTorrent } from '../src/torrent';
import { generateEncoded, Rng } from './generators/value-generator';
import { mutate, MUTATORS } from './generators/mutator';
import { ALL_SEEDS, SEED_TORRENT } from './seeds';

const FUZZ_ITERATIONS = Number(process.env.FUZZ_ITERATIONS) || 500;

interface Outcome {
  decoded: boolean;
  error?: unknown;
}

/** Decode, then check that the value survives a second encode/decode pass unchanged. */
function decodeChecked(input: Uint8Array, keys: 'bytes' | 'mixed' = 'bytes'): Outcome {
  let value;
  try {
    value = decode(input, { keys });
  } catch (e) {
    return { decoded: false, error: e };
  }
  const canonical = encode(value);
  expect(toHex(encode(decode(canonical, { keys })))).toBe(toHex(canonical));
  return { decoded: true };
}

// -- Test suites --

describe('Decoder fuzzing: generated values', () => {
  it('should decode the canonical encoding of generated values back to the same bytes', () => {
    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const input = generateEncoded(i);
      expect(toHex(encode(decode(input)))).toBe(toHex(input));
    }
  });
});

describe('Decoder fuzzing: mutation-based', () => {
  it('should decode or reject mutated inputs with a DecodeError', () => {
    let decoded = 0;
    let rejected = 0;

    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const seed = i % 2 === 0 ? ALL_SEEDS[i % ALL_SEEDS.length] : generateEncoded(i);
      const rng = new Rng(i);
      const { decoded: ok, error } = decodeChecked(mutate(seed, rng), i % 3 === 0 ? 'mixed' : 'bytes');

      if (ok) {
        decoded++;
      } else {
        expect(error).toBeInstanceOf(DecodeError);
        rejected++;
      }
    }

    expect(rejected).toBeGreaterThan(0);
    console.log(`Mutation fuzzing: ${decoded} decoded, ${rejected} rejected out of ${FUZZ_ITERATIONS}`);
  });

  it('should handle heavily mutated inputs (3-5 mutations)', () => {
    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const seed = ALL_SEEDS[i % ALL_SEEDS.length];
      const rng = new Rng(i + 100000);
      const { decoded, error } = decodeChecked(mutate(seed, rng, rng.int(3, 5)));
      if (!decoded) expect(error).toBeInstanceOf(DecodeError);
    }
  });
});

describe('Decoder fuzzing: targeted mutation strategies', () => {
  for (const mutator of MUTATORS) {
    it(`should handle ${mutator.name} mutations`, () => {
      for (let i = 0; i < Math.min(50, FUZZ_ITERATIONS); i++) {
        const seed = ALL_SEEDS[i % ALL_SEEDS.length];
        const rng = new Rng(i + 200000);
        const { decoded, error } = decodeChecked(mutator(seed, rng));
        if (!decoded) expect(error).toBeInstanceOf(DecodeError);
      }
    });
  }
});

describe('Metainfo fuzzing: mutated torrents', () => {
  it('should parse or reject mutated torrents with a library error', () => {
    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const rng = new Rng(i + 300000);
      const input = mutate(SEED_TORRENT, rng);
      try {
        parseTorrent(input, { binaryKeys: true }).toBytes();
      } catch (e) {
        expect(e).toBeInstanceOf(BaseError);
      }
    }
  });
});
