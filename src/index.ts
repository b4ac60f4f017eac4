// Main entry point
export { encode, encodeInto, encodeToString } from './encoder'
export { decode, decodeInto, decodeToString } from './decoder'

// Operations table
export {
  operations,
  encodeStandard,
  encodeURL,
  decodeStandard,
  decodeURL,
  decodeMixed,
  describeError,
} from './operations'
export { ok, err, isOk, isErr, attempt } from './result'

// Size calculator and tables
export {
  encodedLength,
  unpaddedEncodedLength,
  decodedLength,
  encodeCapacity,
  decodeCapacity,
} from './core/size'
export {
  getEncodeTable,
  getDecodeTable,
  isAlphabet,
  isDecodeMode,
  isPaddedAlphabet,
  acceptsPadding,
} from './core/alphabet'

// Errors
export {
  Base64Error,
  InvalidArgumentError,
  FormatError,
  IllegalCharacterError,
  IllegalSequenceError,
  CapacityError,
  ResourceExhaustionError,
  SizeOverflowError,
  isBase64Error,
} from './core/errors'

// Constants
export {
  STANDARD_ALPHABET,
  URL_ALPHABET,
  PAD_CHAR,
  INVALID_SEXTET,
  MAX_ENCODED_LENGTH,
  VERSION,
} from './core/constants'

// Types
export type {
  Alphabet,
  DecodeMode,
  EncodedInput,
  LookupTable,
  Base64Warning,
  Base64WarningCode,
  Base64WarningCallback,
  CodecOptions,
  DecodeOptions,
} from './types'
export type { Base64ErrorKind } from './core/errors'
export type { Ok, Err, Result } from './result'
export type { Base64Operations, OperationResult } from './operations'
