import { GROUP_BYTES, GROUP_SYMBOLS, MAX_ENCODED_LENGTH } from './constants'
import { InvalidArgumentError, SizeOverflowError } from './errors'

/**
 * Throws unless `value` is a non-negative safe integer.
 */
export function assertLength(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(
      `${name} must be a non-negative safe integer, got ${String(value)}`,
    )
  }
}

/**
 * Length of the padded encoding of `byteLength` bytes: `ceil(n / 3) * 4`.
 *
 * This is also the buffer size that suffices for the unpadded (url) encoding.
 *
 * @param limit - Largest acceptable result (default: Number.MAX_SAFE_INTEGER)
 * @throws {SizeOverflowError} If the result would exceed `limit`
 */
export function encodedLength(byteLength: number, limit: number = MAX_ENCODED_LENGTH): number {
  assertLength(byteLength, 'byteLength')
  assertLength(limit, 'limit')
  const groups = Math.floor(byteLength / GROUP_BYTES) + (byteLength % GROUP_BYTES !== 0 ? 1 : 0)
  if (groups > Math.floor(limit / GROUP_SYMBOLS)) {
    throw new SizeOverflowError(
      `Encoded length of ${byteLength} bytes exceeds the limit of ${limit}`,
    )
  }
  return groups * GROUP_SYMBOLS
}

/**
 * Exact length of the unpadded encoding of `byteLength` bytes.
 *
 * @throws {SizeOverflowError} If the unpadded result would exceed `limit`
 */
export function unpaddedEncodedLength(
  byteLength: number,
  limit: number = MAX_ENCODED_LENGTH,
): number {
  assertLength(byteLength, 'byteLength')
  assertLength(limit, 'limit')
  const whole = Math.floor(byteLength / GROUP_BYTES)
  const remainder = byteLength % GROUP_BYTES
  // 1 leftover byte -> 2 symbols, 2 -> 3
  const tail = remainder === 0 ? 0 : remainder + 1
  if (tail > limit || whole > Math.floor((limit - tail) / GROUP_SYMBOLS)) {
    throw new SizeOverflowError(
      `Encoded length of ${byteLength} bytes exceeds the limit of ${limit}`,
    )
  }
  return whole * GROUP_SYMBOLS + tail
}

/**
 * Upper bound on the bytes decoded from `encodedLen` symbols: `floor(m * 3 / 4)`.
 *
 * Evaluated per whole group so that `m * 3` is never formed.
 */
export function decodedLength(encodedLen: number): number {
  assertLength(encodedLen, 'encodedLength')
  const groups = Math.floor(encodedLen / GROUP_SYMBOLS)
  const rest = encodedLen % GROUP_SYMBOLS
  return groups * GROUP_BYTES + Math.floor((rest * GROUP_BYTES) / GROUP_SYMBOLS)
}

/** Buffer capacity `encodeInto` requires: the padded length plus the terminator. */
export function encodeCapacity(byteLength: number, limit: number = MAX_ENCODED_LENGTH): number {
  return encodedLength(byteLength, limit) + 1
}

/** Buffer capacity `decodeInto` requires: the decoded bound plus the terminator. */
export function decodeCapacity(encodedLen: number): number {
  return decodedLength(encodedLen) + 1
}
