/**
 * Standalone continuous fuzzer for the bencode decoder.
 *
 * Alternates generated values and mutated seeds in a loop, reporting any
 * input that makes the decoder fail with something other than a
 * DecodeError, or decode to a value that does not re-encode stably.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N]
 */

import { decode, encode } from '../src/bencode';
import { DecodeError } from '../src/errors';
import { toHex } from '../src/helpers';
import { generateEncoded, Rng } from './generators/value-generator';
import { mutate } from './generators/mutator';
import { ALL_SEEDS } from './seeds';

interface FuzzResult {
  seed: number;
  strategy: string;
  input: Uint8Array;
  decoded: boolean;
  error?: string;
}

function fuzzOne(input: Uint8Array, seed: number, strategy: string): FuzzResult {
  const result: FuzzResult = { seed, strategy, input, decoded: false };

  try {
    const canonical = encode(decode(input));
    result.decoded = true;
    if (toHex(encode(decode(canonical))) !== toHex(canonical)) {
      result.error = 'unstable re-encoding';
    }
  } catch (e) {
    if (!(e instanceof DecodeError)) {
      result.error = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
    }
  }

  return result;
}

function main() {
  const args = process.argv.slice(2);
  let maxIterations = Infinity;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations' && args[i + 1]) {
      maxIterations = parseInt(args[i + 1], 10);
      i++;
    }
  }

  console.log(`Bencode Decoder Fuzzer`);
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log('');

  let iteration = 0;
  let generated = 0;
  let mutated = 0;
  let decoded = 0;
  const crashes: FuzzResult[] = [];

  const startTime = Date.now();

  while (iteration < maxIterations) {
    let result: FuzzResult;

    if (iteration % 2 === 0) {
      result = fuzzOne(generateEncoded(iteration), iteration, 'generation');
      generated++;
    } else {
      const seed = ALL_SEEDS[iteration % ALL_SEEDS.length];
      const rng = new Rng(iteration);
      result = fuzzOne(mutate(seed, rng, rng.int(1, 5)), iteration, 'mutation');
      mutated++;
    }

    if (result.decoded) decoded++;
    if (result.error !== undefined) {
      crashes.push(result);
      console.error(`\n[!] FAILURE at iteration ${iteration} (${result.strategy}): ${result.error}`);
      console.error(`    Input: ${toHex(result.input.slice(0, 100))}...`);
    }

    iteration++;

    // Progress report every 10000 iterations
    if (iteration % 10000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(
        `[${elapsed}s] iteration=${iteration} rate=${rate}/s ` +
        `generated=${generated} mutated=${mutated} ` +
        `decoded=${decoded} failures=${crashes.length}`
      );
    }
  }

  // Final report
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  console.log(`Generated: ${generated}`);
  console.log(`Mutated: ${mutated}`);
  console.log(`Decoded: ${decoded}`);

  if (crashes.length > 0) {
    console.log('');
    console.log(`=== ${crashes.length} issue(s) found ===`);
    for (const crash of crashes) {
      console.log(`  Seed: ${crash.seed}, Strategy: ${crash.strategy}, Error: ${crash.error}`);
      console.log(`  Input: ${toHex(crash.input.slice(0, 150))}`);
      console.log('');
    }
    process.exit(1);
  } else {
    console.log('\nNo issues found.');
    process.exit(0);
  }
}

main();
