import type { Alphabet, CodecOptions } from './types'
import { encodeTableFor, isAlphabet, isPaddedAlphabet } from './core/alphabet'
import { MAX_ENCODED_LENGTH, PAD_CODE } from './core/constants'
import { CapacityError, InvalidArgumentError } from './core/errors'
import { allocate, assertBytes, assertNoOverlap, bytesToBinaryString } from './core/bytes'
import { assertLength, encodeCapacity, encodedLength, unpaddedEncodedLength } from './core/size'

function resolveAlphabet(alphabet: unknown): Alphabet {
  if (!isAlphabet(alphabet)) {
    throw new InvalidArgumentError(`Unknown alphabet: ${String(alphabet)}`)
  }
  return alphabet
}

/**
 * Encodes `src` into the caller's buffer and writes a `0` terminator after the
 * last symbol.
 *
 * `dst` must hold at least `encodedLength(src.length) + 1` bytes, even for the
 * url alphabet; a smaller buffer fails before anything is written.
 *
 * @returns Number of symbols written, excluding the terminator
 * @throws {CapacityError} If `dst` is too small
 * @throws {InvalidArgumentError} If an argument is not byte data or the buffers overlap
 */
export function encodeInto(
  src: Uint8Array,
  dst: Uint8Array,
  alphabet: Alphabet = 'standard',
): number {
  assertBytes(src, 'src')
  assertBytes(dst, 'dst')
  const table = encodeTableFor(resolveAlphabet(alphabet))
  const required = encodeCapacity(src.length)
  if (dst.length < required) {
    throw new CapacityError(required, dst.length)
  }
  assertNoOverlap(src, dst)

  const whole = src.length - (src.length % 3)
  let o = 0
  for (let i = 0; i < whole; i += 3) {
    const triple = (src[i]! << 16) | (src[i + 1]! << 8) | src[i + 2]!
    dst[o++] = table[(triple >> 18) & 0x3f]!
    dst[o++] = table[(triple >> 12) & 0x3f]!
    dst[o++] = table[(triple >> 6) & 0x3f]!
    dst[o++] = table[triple & 0x3f]!
  }

  const remain = src.length - whole
  if (remain > 0) {
    const b1 = remain === 2 ? src[whole + 1]! : 0
    const triple = (src[whole]! << 16) | (b1 << 8)
    dst[o++] = table[(triple >> 18) & 0x3f]!
    dst[o++] = table[(triple >> 12) & 0x3f]!
    if (remain === 2) {
      dst[o++] = table[(triple >> 6) & 0x3f]!
    }
    if (isPaddedAlphabet(alphabet)) {
      for (let pad = remain; pad < 3; pad++) {
        dst[o++] = PAD_CODE
      }
    }
  }

  dst[o] = 0
  return o
}

function checkMaxLength(options?: CodecOptions): number {
  const maxLength = options?.maxLength ?? MAX_ENCODED_LENGTH
  assertLength(maxLength, 'maxLength')
  return maxLength
}

/**
 * Encodes `src` into a freshly allocated buffer.
 *
 * The returned view covers exactly the encoded symbols; the terminator byte
 * follows it in the backing buffer.
 *
 * @throws {SizeOverflowError} If the symbols produced would exceed `options.maxLength`
 * @throws {ResourceExhaustionError} If the output buffer cannot be allocated
 */
export function encode(
  src: Uint8Array,
  alphabet: Alphabet = 'standard',
  options?: CodecOptions,
): Uint8Array {
  assertBytes(src, 'src')
  const resolved = resolveAlphabet(alphabet)
  const limit = checkMaxLength(options)
  const symbols = isPaddedAlphabet(resolved)
    ? encodedLength(src.length, limit)
    : unpaddedEncodedLength(src.length, limit)
  // encodeInto wants room for the padded form even when it writes none
  const out = allocate(encodeCapacity(src.length))
  encodeInto(src, out, resolved)
  return out.subarray(0, symbols)
}

/**
 * Encodes `src` to a string.
 *
 * @example
 * ```ts
 * encodeToString(new TextEncoder().encode('hello world')) // 'aGVsbG8gd29ybGQ='
 * encodeToString(new Uint8Array([0xfb, 0xff]), 'url') // '-_8'
 * ```
 */
export function encodeToString(
  src: Uint8Array,
  alphabet: Alphabet = 'standard',
  options?: CodecOptions,
): string {
  return bytesToBinaryString(encode(src, alphabet, options))
}
