/**
 * Discriminant carried by every codec error. Each failure maps to exactly one kind.
 */
export type Base64ErrorKind =
  | 'invalid-argument'
  | 'format'
  | 'illegal-character'
  | 'illegal-sequence'
  | 'capacity-too-small'
  | 'resource-exhaustion'
  | 'size-overflow'

/**
 * Base error class for all codec errors.
 */
export class Base64Error extends Error {
  readonly kind: Base64ErrorKind

  constructor(kind: Base64ErrorKind, message: string) {
    super(message)
    this.name = 'Base64Error'
    this.kind = kind
  }
}

/**
 * Error thrown when an argument is not byte data, not a valid length, or when
 * input and output buffers overlap.
 */
export class InvalidArgumentError extends Base64Error {
  constructor(message: string) {
    super('invalid-argument', message)
    this.name = 'InvalidArgumentError'
  }
}

/**
 * Error thrown when the encoded text has an impossible length or malformed padding.
 */
export class FormatError extends Base64Error {
  constructor(message: string) {
    super('format', message)
    this.name = 'FormatError'
  }
}

/**
 * Error thrown when the encoded text contains a symbol outside the selected alphabet.
 */
export class IllegalCharacterError extends Base64Error {
  /** Offset of the offending symbol in the input. */
  readonly offset: number
  /** Byte (or string code unit) found at {@link offset}. */
  readonly code: number

  constructor(offset: number, code: number) {
    const hex = code.toString(16).padStart(2, '0')
    super('illegal-character', `Illegal base64 character 0x${hex} at offset ${offset}`)
    this.name = 'IllegalCharacterError'
    this.offset = offset
    this.code = code
  }
}

/**
 * Error thrown when the final partial group carries non-zero unused bits, so the
 * text could not have been produced by a conforming encoder.
 */
export class IllegalSequenceError extends Base64Error {
  constructor(message: string) {
    super('illegal-sequence', message)
    this.name = 'IllegalSequenceError'
  }
}

/**
 * Error thrown when a caller-supplied buffer cannot hold the result.
 */
export class CapacityError extends Base64Error {
  readonly required: number
  readonly capacity: number

  constructor(required: number, capacity: number) {
    super('capacity-too-small', `Output buffer too small: need ${required} bytes, got ${capacity}`)
    this.name = 'CapacityError'
    this.required = required
    this.capacity = capacity
  }
}

/**
 * Error thrown when an output buffer cannot be allocated.
 */
export class ResourceExhaustionError extends Base64Error {
  readonly requested: number

  constructor(requested: number, cause?: unknown) {
    super('resource-exhaustion', `Failed to allocate ${requested} bytes`)
    this.name = 'ResourceExhaustionError'
    this.requested = requested
    if (cause !== undefined) {
      this.cause = cause
    }
  }
}

/**
 * Error thrown when a requested size exceeds the representable range.
 */
export class SizeOverflowError extends Base64Error {
  constructor(message: string) {
    super('size-overflow', message)
    this.name = 'SizeOverflowError'
  }
}

export function isBase64Error(value: unknown): value is Base64Error {
  return value instanceof Base64Error
}
