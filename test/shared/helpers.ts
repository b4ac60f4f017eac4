/**
 * Test helpers for building byte payloads in-memory.
 */

/**
 * Convert an ASCII string to a Uint8Array.
 */
export function ascii(str: string): Uint8Array {
  const arr = new Uint8Array(str.length)
  for (let i = 0; i < str.length; i++) {
    arr[i] = str.charCodeAt(i)
  }
  return arr
}

/**
 * Convert bytes back to a string, one character per byte.
 */
export function text(bytes: Uint8Array): string {
  return String.fromCharCode(...bytes)
}

/**
 * Deterministic pseudo-random bytes (LCG), so failures are reproducible.
 */
export function seededBytes(length: number, seed: number): Uint8Array {
  const out = new Uint8Array(length)
  let state = seed >>> 0 || 1
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0
    out[i] = state >>> 24
  }
  return out
}

/**
 * A buffer pre-filled with a marker byte, for detecting stray writes.
 */
export function filled(length: number, marker = 0xaa): Uint8Array {
  return new Uint8Array(length).fill(marker)
}
