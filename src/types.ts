/** Alphabet used for encoding. */
export type Alphabet = 'standard' | 'url'

/** Symbol set accepted when decoding. `mixed` accepts both alphabets in one input. */
export type DecodeMode = Alphabet | 'mixed'

/** Encoded input accepted by the decoder. */
export type EncodedInput = Uint8Array | string

/**
 * Read-only view of a lookup table. The tables are shared by every call and must
 * never be written to.
 */
export interface LookupTable {
  readonly length: number
  readonly [index: number]: number
}

export type Base64WarningCode = 'missing_padding' | 'mixed_alphabet'

export interface Base64Warning {
  code: Base64WarningCode
  message: string
}

/**
 * Warning callback type for non-fatal observations during decoding.
 */
export type Base64WarningCallback = (warning: Base64Warning) => void

/**
 * Options shared by the allocating wrappers.
 */
export interface CodecOptions {
  /**
   * Largest output the wrapper may produce: symbols when encoding, payload bytes when
   * decoding (default: Number.MAX_SAFE_INTEGER)
   */
  maxLength?: number
}

/**
 * Options for decoding.
 */
export interface DecodeOptions extends CodecOptions {
  /** Callback for non-fatal warnings (default: ignored) */
  onWarning?: Base64WarningCallback
}
