import type { Alphabet, DecodeMode, LookupTable } from '../types'
import { INVALID_SEXTET, STANDARD_ALPHABET, URL_ALPHABET } from './constants'

const ALPHABETS: readonly Alphabet[] = ['standard', 'url']
const DECODE_MODES: readonly DecodeMode[] = ['standard', 'url', 'mixed']

function buildEncodeTable(symbols: string): Uint8Array {
  const table = new Uint8Array(64)
  for (let i = 0; i < table.length; i++) {
    table[i] = symbols.charCodeAt(i)
  }
  return table
}

function buildDecodeTable(...alphabets: string[]): Uint8Array {
  const table = new Uint8Array(256).fill(INVALID_SEXTET)
  for (const symbols of alphabets) {
    for (let i = 0; i < symbols.length; i++) {
      table[symbols.charCodeAt(i)] = i
    }
  }
  return table
}

const STANDARD_ENCODE = buildEncodeTable(STANDARD_ALPHABET)
const URL_ENCODE = buildEncodeTable(URL_ALPHABET)

const STANDARD_DECODE = buildDecodeTable(STANDARD_ALPHABET)
const URL_DECODE = buildDecodeTable(URL_ALPHABET)
// 62 <- '+' or '-', 63 <- '/' or '_'
const MIXED_DECODE = buildDecodeTable(STANDARD_ALPHABET, URL_ALPHABET)

// Frozen copies for callers; the codec only reads the tables above.
const frozen = (table: Uint8Array): readonly number[] => Object.freeze(Array.from(table))

const PUBLIC_ENCODE: Record<Alphabet, readonly number[]> = {
  standard: frozen(STANDARD_ENCODE),
  url: frozen(URL_ENCODE),
}
const PUBLIC_DECODE: Record<DecodeMode, readonly number[]> = {
  standard: frozen(STANDARD_DECODE),
  url: frozen(URL_DECODE),
  mixed: frozen(MIXED_DECODE),
}

export function isAlphabet(value: unknown): value is Alphabet {
  return typeof value === 'string' && ALPHABETS.includes(value as Alphabet)
}

export function isDecodeMode(value: unknown): value is DecodeMode {
  return typeof value === 'string' && DECODE_MODES.includes(value as DecodeMode)
}

/** Encode table used by the codec itself. Not exported from the package. */
export function encodeTableFor(alphabet: Alphabet): Uint8Array {
  return alphabet === 'url' ? URL_ENCODE : STANDARD_ENCODE
}

/** Decode table used by the codec itself. Not exported from the package. */
export function decodeTableFor(mode: DecodeMode): Uint8Array {
  switch (mode) {
    case 'url':
      return URL_DECODE
    case 'mixed':
      return MIXED_DECODE
    default:
      return STANDARD_DECODE
  }
}

/**
 * 64-entry table mapping a 6-bit value to the character code of its symbol.
 *
 * The returned table is a frozen copy; the codec never reads from it.
 */
export function getEncodeTable(alphabet: Alphabet): LookupTable {
  return PUBLIC_ENCODE[alphabet === 'url' ? 'url' : 'standard']
}

/**
 * 256-entry table mapping an input byte to its 6-bit value, or
 * {@link INVALID_SEXTET} when the byte is not a symbol in `mode`.
 *
 * The returned table is a frozen copy; the codec never reads from it.
 */
export function getDecodeTable(mode: DecodeMode): LookupTable {
  return PUBLIC_DECODE[mode === 'url' || mode === 'mixed' ? mode : 'standard']
}

/** Whether the encoder pads output in this alphabet. */
export function isPaddedAlphabet(alphabet: Alphabet): boolean {
  return alphabet === 'standard'
}

/** Whether trailing pad symbols are legal input in this mode. */
export function acceptsPadding(mode: DecodeMode): boolean {
  return mode !== 'url'
}
