import type {
  Base64Warning,
  Base64WarningCallback,
  Base64WarningCode,
  DecodeMode,
  DecodeOptions,
  EncodedInput,
  LookupTable,
} from './types'
import { acceptsPadding, decodeTableFor, isDecodeMode } from './core/alphabet'
import { INVALID_SEXTET, MAX_ENCODED_LENGTH, PAD_CODE } from './core/constants'
import {
  CapacityError,
  FormatError,
  IllegalCharacterError,
  IllegalSequenceError,
  InvalidArgumentError,
  SizeOverflowError,
} from './core/errors'
import {
  allocate,
  assertBytes,
  assertEncodedInput,
  assertNoOverlap,
  codeAt,
  symbolBytes,
} from './core/bytes'
import { assertLength, decodeCapacity, decodedLength } from './core/size'

const NOOP_WARNING = (_warning: Base64Warning): void => undefined

const MAX_PADDING = 2

interface DecoderDefaults {
  maxLength: number
  onWarning: Base64WarningCallback
}

function withDefaults(options?: DecodeOptions): DecoderDefaults {
  const maxLength = options?.maxLength ?? MAX_ENCODED_LENGTH
  assertLength(maxLength, 'maxLength')
  return {
    maxLength,
    onWarning: options?.onWarning ?? NOOP_WARNING,
  }
}

function warn(options: DecoderDefaults, code: Base64WarningCode, message: string): void {
  options.onWarning({ code, message })
}

function resolveMode(mode: unknown): DecodeMode {
  if (!isDecodeMode(mode)) {
    throw new InvalidArgumentError(`Unknown decode mode: ${String(mode)}`)
  }
  return mode
}

function assertDecodableLength(length: number): void {
  if (length % 4 === 1) {
    throw new FormatError(`Invalid base64 length ${length} (length % 4 must not be 1)`)
  }
}

/** Trailing pad symbols, capped one past the legal maximum. */
function countPadding(src: EncodedInput): number {
  let count = 0
  while (count <= MAX_PADDING && count < src.length) {
    if (codeAt(src, src.length - 1 - count) !== PAD_CODE) break
    count++
  }
  return count
}

function isStandardOnlySymbol(code: number): boolean {
  return code === 0x2b || code === 0x2f // '+' '/'
}

function isUrlOnlySymbol(code: number): boolean {
  return code === 0x2d || code === 0x5f // '-' '_'
}

/**
 * Strips trailing pad symbols and checks they are legal for `mode`.
 *
 * @returns Length of the body that precedes the padding
 */
function stripPadding(bytes: Uint8Array, mode: DecodeMode): number {
  const length = bytes.length
  let end = length
  while (end > 0 && bytes[end - 1] === PAD_CODE) {
    end--
    if (length - end > MAX_PADDING) {
      throw new FormatError(`Too many padding characters (more than ${MAX_PADDING})`)
    }
  }
  if (end === length) return end

  if (length % 4 !== 0) {
    throw new FormatError(`Padded input length must be a multiple of 4, got ${length}`)
  }
  if (!acceptsPadding(mode)) {
    throw new FormatError('Padding is not permitted in url-safe input')
  }
  return end
}

/**
 * Checks every body symbol and the unused bits of the final partial group
 * without writing anything.
 */
function validateBody(
  src: EncodedInput,
  bytes: Uint8Array,
  end: number,
  table: LookupTable,
  mode: DecodeMode,
  cfg: DecoderDefaults,
): void {
  let sawStandard = false
  let sawUrl = false
  for (let i = 0; i < end; i++) {
    const code = bytes[i]!
    if (table[code] === INVALID_SEXTET) {
      throw new IllegalCharacterError(i, codeAt(src, i))
    }
    if (isStandardOnlySymbol(code)) sawStandard = true
    else if (isUrlOnlySymbol(code)) sawUrl = true
  }

  const tail = end % 4
  if (tail === 1) {
    throw new IllegalCharacterError(end - 1, codeAt(src, end - 1))
  }
  if (tail === 3 && (table[bytes[end - 1]!]! & 0x03) !== 0) {
    throw new IllegalSequenceError(
      'Non-zero unused bits in the last symbol of a 3-symbol group (low 2 bits must be 0)',
    )
  }
  if (tail === 2 && (table[bytes[end - 1]!]! & 0x0f) !== 0) {
    throw new IllegalSequenceError(
      'Non-zero unused bits in the last symbol of a 2-symbol group (low 4 bits must be 0)',
    )
  }

  if (mode === 'standard' && end === bytes.length && tail !== 0) {
    warn(cfg, 'missing_padding', `Standard input of length ${end} is not padded`)
  }
  if (mode === 'mixed' && sawStandard && sawUrl) {
    warn(cfg, 'mixed_alphabet', 'Input combines standard and url-safe symbols')
  }
}

function writeGroups(bytes: Uint8Array, end: number, table: LookupTable, dst: Uint8Array): number {
  const sextet = (i: number): number => table[bytes[i]!]!
  const tail = end % 4
  const whole = end - tail
  let o = 0

  for (let i = 0; i < whole; i += 4) {
    const v = (sextet(i) << 18) | (sextet(i + 1) << 12) | (sextet(i + 2) << 6) | sextet(i + 3)
    dst[o++] = (v >> 16) & 0xff
    dst[o++] = (v >> 8) & 0xff
    dst[o++] = v & 0xff
  }

  if (tail === 3) {
    // [AAAAAA][BBBBBB][CCCC00] -> [AAAAAABB][BBBBCCCC]
    const v = (sextet(whole) << 12) | (sextet(whole + 1) << 6) | sextet(whole + 2)
    dst[o++] = (v >> 10) & 0xff
    dst[o++] = (v >> 2) & 0xff
  } else if (tail === 2) {
    // [AAAAAA][BB0000] -> [AAAAAABB]
    const v = (sextet(whole) << 6) | sextet(whole + 1)
    dst[o++] = (v >> 4) & 0xff
  }

  dst[o] = 0
  return o
}

/**
 * Decodes `src` into the caller's buffer and writes a `0` terminator after the
 * last byte.
 *
 * `dst` must hold at least `decodedLength(src.length) + 1` bytes. Validation
 * runs to completion before the first write, so a failed call leaves `dst`
 * untouched.
 *
 * @returns Number of bytes written, excluding the terminator
 * @throws {FormatError} On a length of 4k+1 or malformed padding
 * @throws {CapacityError} If `dst` is too small
 * @throws {IllegalCharacterError} On a symbol outside the alphabet of `mode`
 * @throws {IllegalSequenceError} On non-zero unused bits in the final group
 */
export function decodeInto(
  src: EncodedInput,
  dst: Uint8Array,
  mode: DecodeMode = 'standard',
  options?: DecodeOptions,
): number {
  assertEncodedInput(src, 'src')
  assertBytes(dst, 'dst')
  const resolved = resolveMode(mode)
  const cfg = withDefaults(options)

  const length = src.length
  assertDecodableLength(length)
  const required = decodeCapacity(length)
  if (dst.length < required) {
    throw new CapacityError(required, dst.length)
  }
  if (typeof src !== 'string') {
    assertNoOverlap(src, dst)
  }
  if (length === 0) {
    dst[0] = 0
    return 0
  }

  const bytes = symbolBytes(src)
  const table = decodeTableFor(resolved)
  const end = stripPadding(bytes, resolved)
  validateBody(src, bytes, end, table, resolved, cfg)
  return writeGroups(bytes, end, table, dst)
}

/**
 * Decodes `src` into a freshly allocated buffer.
 *
 * `options.maxLength` caps the bytes the payload decodes to; trailing padding
 * does not count against it.
 *
 * @example
 * ```ts
 * decode('aGVsbG8gd29ybGQ=') // bytes of 'hello world'
 * decode('-_8', 'url') // Uint8Array [0xfb, 0xff]
 * decode('+_8', 'mixed') // Uint8Array [0xfb, 0xff]
 * ```
 */
export function decode(
  src: EncodedInput,
  mode: DecodeMode = 'standard',
  options?: DecodeOptions,
): Uint8Array {
  assertEncodedInput(src, 'src')
  assertDecodableLength(src.length)
  const cfg = withDefaults(options)
  const size = decodedLength(src.length - countPadding(src))
  if (size > cfg.maxLength) {
    throw new SizeOverflowError(
      `Decoded length of ${src.length} symbols exceeds the limit of ${cfg.maxLength}`,
    )
  }
  const out = allocate(decodeCapacity(src.length))
  const written = decodeInto(src, out, mode, options)
  return out.subarray(0, written)
}

/**
 * Decodes `src` and reads the payload as UTF-8.
 *
 * @throws {InvalidArgumentError} If the decoded bytes are not valid UTF-8
 */
export function decodeToString(
  src: EncodedInput,
  mode: DecodeMode = 'standard',
  options?: DecodeOptions,
): string {
  const bytes = decode(src, mode, options)
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch (error) {
    const wrapped = new InvalidArgumentError('Decoded payload is not valid UTF-8')
    wrapped.cause = error
    throw wrapped
  }
}
