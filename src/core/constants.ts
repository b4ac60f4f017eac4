/** The 64 symbols of the standard alphabet (RFC 4648 §4). */
export const STANDARD_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/'

/** The 64 symbols of the URL and filename safe alphabet (RFC 4648 §5). */
export const URL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_'

/** Pad symbol appended by the standard alphabet. */
export const PAD_CHAR = '='

/** Character code of {@link PAD_CHAR}. */
export const PAD_CODE = 0x3d

/** Decode table entry for bytes that are not symbols of the selected alphabet. */
export const INVALID_SEXTET = 0xff

/** Bytes per encoding group. */
export const GROUP_BYTES = 3

/** Symbols per encoding group. */
export const GROUP_SYMBOLS = 4

/** Largest buffer length the size calculator will report. */
export const MAX_ENCODED_LENGTH = Number.MAX_SAFE_INTEGER

/** Library version. */
export const VERSION = __VERSION__
