/**
 * Mutation strategies for byte-based fuzzing.
 *
 * Takes a valid bencoded input and applies random mutations to produce
 * inputs that test decoder error handling and edge cases.
 */

import { Rng } from './value-generator';

/** A mutation function that transforms an input. */
export type Mutator = (input: Uint8Array, rng: Rng) => Uint8Array;

function splice(input: Uint8Array, pos: number, deleteCount: number, insert: ArrayLike<number> = []): Uint8Array {
  const result = new Uint8Array(input.length - deleteCount + insert.length);
  result.set(input.subarray(0, pos), 0);
  result.set(Array.from(insert), pos);
  result.set(input.subarray(pos + deleteCount), pos + insert.length);
  return result;
}

function ascii(text: string): number[] {
  return Array.from(text, c => c.charCodeAt(0));
}

// -- Byte-level mutations --

/** Flip a random bit in a random byte. */
export function bitFlip(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const result = input.slice();
  result[rng.int(0, input.length - 1)] ^= 1 << rng.int(0, 7);
  return result;
}

/** Insert a random byte at a random position. */
export function byteInsert(input: Uint8Array, rng: Rng): Uint8Array {
  return splice(input, rng.int(0, input.length), 0, [rng.int(0, 255)]);
}

/** Delete a random byte. */
export function byteDelete(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  return splice(input, rng.int(0, input.length - 1), 1);
}

/** Replace a random byte with another. */
export function byteReplace(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  return splice(input, rng.int(0, input.length - 1), 1, [rng.int(0, 255)]);
}

/** Truncate the input at a random position. */
export function truncate(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length <= 1) return input;
  return input.slice(0, rng.int(1, input.length - 1));
}

// -- Token-level mutations --

const DELIMITERS = ascii('ilde:');

/** Insert a random type selector or delimiter. */
export function insertDelimiter(input: Uint8Array, rng: Rng): Uint8Array {
  return splice(input, rng.int(0, input.length), 0, [rng.pick(DELIMITERS)]);
}

/** Remove a random type selector or delimiter. */
export function removeDelimiter(input: Uint8Array, rng: Rng): Uint8Array {
  const positions: number[] = [];
  input.forEach((byte, i) => {
    if (DELIMITERS.includes(byte)) positions.push(i);
  });
  if (positions.length === 0) return input;
  return splice(input, rng.pick(positions), 1);
}

const BOUNDARY_NUMBERS = [
  '0', '-0', '00', '01', '-1', '+1', ' 1', '9', '10',
  '4294967295', '18446744073709551615', '-9223372036854775808',
  '99999999999999999999999999',
];

/** Replace a run of digits with a boundary or non-canonical number. */
export function numberBoundary(input: Uint8Array, rng: Rng): Uint8Array {
  const runs: [number, number][] = [];
  let start = -1;
  for (let i = 0; i <= input.length; i++) {
    const digit = i < input.length && input[i] >= 0x30 && input[i] <= 0x39;
    if (digit && start < 0) start = i;
    if (!digit && start >= 0) {
      runs.push([start, i]);
      start = -1;
    }
  }
  if (runs.length === 0) return input;
  const [from, to] = rng.pick(runs);
  return splice(input, from, to - from, ascii(rng.pick(BOUNDARY_NUMBERS)));
}

/** Duplicate a random slice in place. */
export function duplicateSlice(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const from = rng.int(0, input.length - 1);
  const to = rng.int(from + 1, input.length);
  return splice(input, to, 0, input.slice(from, to));
}

/** Wrap the input in extra list or dictionary openers. */
export function deepNesting(input: Uint8Array, rng: Rng): Uint8Array {
  const depth = rng.int(1, 600);
  const opener = rng.pick(ascii('ld'));
  return splice(input, 0, 0, new Array<number>(depth).fill(opener));
}

// -- Composite mutations --

/** All available mutators. */
export const MUTATORS: Mutator[] = [
  bitFlip,
  byteInsert,
  byteDelete,
  byteReplace,
  truncate,
  insertDelimiter,
  removeDelimiter,
  numberBoundary,
  duplicateSlice,
  deepNesting,
];

/**
 * Apply 1-N random mutations to an input.
 * @param input - The seed input
 * @param rng - Random number generator
 * @param count - Number of mutations to apply (default: 1-3)
 */
export function mutate(input: Uint8Array, rng: Rng, count?: number): Uint8Array {
  const n = count ?? rng.int(1, 3);
  let result = input;
  for (let i = 0; i < n; i++) {
    const mutator = rng.pick(MUTATORS);
    result = mutator(result, rng);
  }
  return result;
}
