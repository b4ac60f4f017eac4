import type { EncodedInput } from '../types'
import { INVALID_SEXTET } from './constants'
import { InvalidArgumentError, ResourceExhaustionError } from './errors'

const STRING_CHUNK = 0x8000

export function assertBytes(value: unknown, name: string): asserts value is Uint8Array {
  if (!(value instanceof Uint8Array)) {
    throw new InvalidArgumentError(`${name} must be a Uint8Array`)
  }
}

export function assertEncodedInput(value: unknown, name: string): asserts value is EncodedInput {
  if (typeof value !== 'string' && !(value instanceof Uint8Array)) {
    throw new InvalidArgumentError(`${name} must be a string or a Uint8Array`)
  }
}

/**
 * Throws if `a` and `b` share any bytes of the same underlying buffer.
 */
export function assertNoOverlap(a: Uint8Array, b: Uint8Array): void {
  if (a.buffer !== b.buffer || a.byteLength === 0 || b.byteLength === 0) return
  const aEnd = a.byteOffset + a.byteLength
  const bEnd = b.byteOffset + b.byteLength
  if (a.byteOffset < bEnd && b.byteOffset < aEnd) {
    throw new InvalidArgumentError('Input and output buffers must not overlap')
  }
}

/**
 * Fresh zero-filled buffer. An engine allocation failure surfaces as
 * {@link ResourceExhaustionError}.
 */
export function allocate(length: number): Uint8Array {
  try {
    return new Uint8Array(length)
  } catch (error) {
    if (error instanceof RangeError) {
      throw new ResourceExhaustionError(length, error)
    }
    throw error
  }
}

/**
 * Symbol bytes of an encoded string. Code units above 0xff are never alphabet
 * symbols, so they are mapped to a byte that every decode table rejects.
 */
export function symbolBytes(input: EncodedInput): Uint8Array {
  if (typeof input !== 'string') return input
  const out = allocate(input.length)
  for (let i = 0; i < input.length; i++) {
    const code = input.charCodeAt(i)
    out[i] = code > 0xff ? INVALID_SEXTET : code
  }
  return out
}

/**
 * The unmapped code unit at `offset`, for error reporting.
 */
export function codeAt(input: EncodedInput, offset: number): number {
  return typeof input === 'string' ? input.charCodeAt(offset) : (input[offset] ?? 0)
}

export function bytesToBinaryString(bytes: Uint8Array): string {
  let out = ''
  for (let i = 0; i < bytes.length; i += STRING_CHUNK) {
    const part = bytes.subarray(i, Math.min(i + STRING_CHUNK, bytes.length))
    out += String.fromCharCode(...part)
  }
  return out
}
