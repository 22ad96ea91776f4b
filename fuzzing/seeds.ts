/**
 * Seed corpus of canonical bencoded inputs for mutation-based fuzzing.
 * Each seed exercises a different part of the format.
 */

const text = new TextEncoder();

/** Empty dictionary, the smallest torrent. */
export const SEED_EMPTY_DICT = text.encode('de');

/** Every scalar type. */
export const SEED_SCALARS = text.encode('l4:spami0ei-42ei18446744073709551616e0:e');

/** Nested containers. */
export const SEED_NESTED = text.encode('d1:ald1:bli1ei2ee1:cdeee1:dlleee');

/** A small single-file torrent. */
export const SEED_TORRENT = text.encode(
  'd8:announce31:http://tracker.example/announce' +
    '13:announce-listll31:http://tracker.example/announceel23:udp://backup.example:80ee' +
    '7:comment12:test torrent' +
    '10:created by9:mktorrent' +
    '13:creation datei1700000000e' +
    '4:infod6:lengthi1024e4:name8:file.bin12:piece lengthi16384e6:pieces20:aaaaaaaaaaaaaaaaaaaae' +
    '5:nodesll9:127.0.0.1i6881eee' +
    '8:url-list23:https://seed.example/f/' +
    'e',
);

/** Binary byte strings and keys. */
export const SEED_BINARY = new Uint8Array([
  ...text.encode('d2:'),
  0xff,
  0xfe,
  ...text.encode('3:'),
  0x00,
  0x80,
  0xc3,
  ...text.encode('e'),
]);

/** All seeds as an array for iteration. */
export const ALL_SEEDS: Uint8Array[] = [
  SEED_EMPTY_DICT,
  SEED_SCALARS,
  SEED_NESTED,
  SEED_TORRENT,
  SEED_BINARY,
];
