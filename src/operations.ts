import type { Base64Error } from './core/errors'
import { decode } from './decoder'
import { encode } from './encoder'
import { attempt, type Result } from './result'

export type OperationResult = Result<Uint8Array, Base64Error>

/**
 * The five byte-in, byte-out operations. Each returns the encoded or decoded
 * bytes, or the single error that stopped it.
 */
export interface Base64Operations {
  encodeStandard(input: Uint8Array): OperationResult
  encodeURL(input: Uint8Array): OperationResult
  decodeStandard(input: Uint8Array): OperationResult
  decodeURL(input: Uint8Array): OperationResult
  decodeMixed(input: Uint8Array): OperationResult
}

export function encodeStandard(input: Uint8Array): OperationResult {
  return attempt(() => encode(input, 'standard'))
}

export function encodeURL(input: Uint8Array): OperationResult {
  return attempt(() => encode(input, 'url'))
}

export function decodeStandard(input: Uint8Array): OperationResult {
  return attempt(() => decode(input, 'standard'))
}

export function decodeURL(input: Uint8Array): OperationResult {
  return attempt(() => decode(input, 'url'))
}

export function decodeMixed(input: Uint8Array): OperationResult {
  return attempt(() => decode(input, 'mixed'))
}

export const operations: Readonly<Base64Operations> = Object.freeze({
  encodeStandard,
  encodeURL,
  decodeStandard,
  decodeURL,
  decodeMixed,
})

/**
 * One-line diagnostic for a failed operation, e.g.
 * `"format: Invalid base64 length 9 (length % 4 must not be 1)"`.
 */
export function describeError(error: Base64Error): string {
  return `${error.kind}: ${error.message}`
}
