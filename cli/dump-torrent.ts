#!/usr/bin/env npx tsx
/**
 * CLI tool to write a JSON dump of a .torrent file.
 *
 * Usage:
 *   npx tsx cli/dump-torrent.ts <input.torrent> [output.json] [--indent N|tab] [--sort-keys] [--overwrite]
 *
 * The output defaults to the input path with a .json extension.
 */

import * as path from 'path';
import { FileExistsError } from '../src/errors';
import { loadTorrent } from '../src/torrent';
import type { DumpOptions } from '../src/torrent/Backbone';

const USAGE =
  'Usage: npx tsx cli/dump-torrent.ts <input.torrent> [output.json] [--indent N|tab] [--sort-keys] [--overwrite]';

function parseIndent(value: string | undefined): number | '\t' {
  if (value === 'tab') return '\t';
  const width = Number(value);
  if (!Number.isInteger(width) || width < 0) {
    console.error(`Error: invalid indentation: ${value}`);
    process.exit(1);
  }
  return width;
}

function main(): void {
  const args = process.argv.slice(2);
  const positional: string[] = [];
  const options: DumpOptions = {};

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--indent':
        options.indent = parseIndent(args[++i]);
        break;
      case '--sort-keys':
        options.sortKeys = true;
        break;
      case '--overwrite':
        options.overwrite = true;
        break;
      default:
        positional.push(args[i]);
    }
  }

  if (positional.length < 1 || positional.length > 2) {
    console.error(USAGE);
    process.exit(1);
  }

  const inputPath = path.resolve(positional[0]);
  const parsed = path.parse(inputPath);
  const outputPath = positional[1]
    ? path.resolve(positional[1])
    : path.join(parsed.dir, `${parsed.name}.json`);

  try {
    const torrent = loadTorrent(inputPath);
    torrent.dump(outputPath, options);
    console.log(`Wrote ${outputPath}`);
  } catch (err) {
    if (err instanceof FileExistsError) {
      console.error(`Error: ${err.message} (use --overwrite to replace it)`);
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

main();
