import type { ByteSource } from './byte-reader.js';

export type Key =
  | { kind: 'char'; char: string }
  | { kind: 'up' }
  | { kind: 'down' }
  | { kind: 'screenDown' }
  | { kind: 'enter' }
  | { kind: 'backspace' }
  | { kind: 'cancel' }
  | { kind: 'toggleMode' }
  | { kind: 'none' };

type NamedKey = Exclude<Key, { kind: 'char' }>;

const ESC = 0x1b;

export const NO_KEY: Key = { kind: 'none' };

/** Single control bytes that stand for a key on their own. */
export const CONTROL_ALIASES: ReadonlyMap<number, NamedKey> = new Map<number, NamedKey>([
  [0x0e, { kind: 'down' }], // ctrl-n
  [0x10, { kind: 'up' }], // ctrl-p
  [0x04, { kind: 'screenDown' }], // ctrl-d
  [0x0d, { kind: 'enter' }],
  [0x0a, { kind: 'enter' }],
  [0x7f, { kind: 'backspace' }],
  [0x08, { kind: 'backspace' }], // ctrl-h
  [0x03, { kind: 'cancel' }], // ctrl-c
  [0x14, { kind: 'toggleMode' }], // ctrl-t
]);

/** Two-byte suffixes following ESC. `O` variants are sent in application cursor mode. */
export const ESCAPE_SUFFIXES: ReadonlyMap<string, NamedKey> = new Map<string, NamedKey>([
  ['[A', { kind: 'up' }],
  ['[B', { kind: 'down' }],
  ['OA', { kind: 'up' }],
  ['OB', { kind: 'down' }],
]);

function utf8ContinuationCount(lead: number): number | null {
  if (lead < 0x80) return 0;
  if (lead >= 0xc2 && lead <= 0xdf) return 1;
  if (lead >= 0xe0 && lead <= 0xef) return 2;
  if (lead >= 0xf0 && lead <= 0xf4) return 3;
  return null;
}

async function readEscapeSuffix(source: ByteSource): Promise<Key> {
  const first = await source.readByte();
  const second = await source.readByte();
  const suffix = String.fromCharCode(first, second);
  return ESCAPE_SUFFIXES.get(suffix) ?? NO_KEY;
}

function isContinuationByte(byte: number): boolean {
  return byte >= 0x80 && byte <= 0xbf;
}

async function readUtf8Char(source: ByteSource, lead: number, continuation: number): Promise<Key> {
  const bytes = [lead];
  for (let i = 0; i < continuation; i++) {
    const next = await source.readByte();
    if (!isContinuationByte(next)) {
      // Truncated character: drop it and leave the byte for the next key.
      source.unreadByte(next);
      return NO_KEY;
    }
    bytes.push(next);
  }
  const char = Buffer.from(bytes).toString('utf8');
  // The decoder substitutes U+FFFD for malformed sequences.
  if (char.includes('\uFFFD')) return NO_KEY;
  return { kind: 'char', char };
}

/**
 * Reads one logical key from the terminal byte stream.
 *
 * Resolves with `{ kind: 'none' }` for escape sequences it does not know and
 * for bytes that cannot start a character.
 */
export async function nextKey(source: ByteSource): Promise<Key> {
  const byte = await source.readByte();

  const alias = CONTROL_ALIASES.get(byte);
  if (alias) return alias;

  if (byte === ESC) return readEscapeSuffix(source);

  const continuation = utf8ContinuationCount(byte);
  if (continuation === null) return NO_KEY;
  if (continuation === 0) return { kind: 'char', char: String.fromCharCode(byte) };
  return readUtf8Char(source, byte, continuation);
}
