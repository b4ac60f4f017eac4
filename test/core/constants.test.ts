import { describe, expect, it } from 'vitest'
import {
  GROUP_BYTES,
  GROUP_SYMBOLS,
  INVALID_SEXTET,
  MAX_ENCODED_LENGTH,
  PAD_CHAR,
  PAD_CODE,
  STANDARD_ALPHABET,
  URL_ALPHABET,
  VERSION,
} from '../../src/core/constants'

describe('core/constants', () => {
  it('defines two 64-symbol alphabets that differ only in the last two symbols', () => {
    expect(STANDARD_ALPHABET).toHaveLength(64)
    expect(URL_ALPHABET).toHaveLength(64)
    expect(new Set(STANDARD_ALPHABET).size).toBe(64)
    expect(new Set(URL_ALPHABET).size).toBe(64)
    expect(STANDARD_ALPHABET.slice(0, 62)).toBe(URL_ALPHABET.slice(0, 62))
    expect(STANDARD_ALPHABET.slice(62)).toBe('+/')
    expect(URL_ALPHABET.slice(62)).toBe('-_')
  })

  it('exposes padding and group constants', () => {
    expect(PAD_CHAR).toBe('=')
    expect(PAD_CODE).toBe(PAD_CHAR.charCodeAt(0))
    expect(INVALID_SEXTET).toBe(0xff)
    expect(GROUP_BYTES).toBe(3)
    expect(GROUP_SYMBOLS).toBe(4)
    expect(MAX_ENCODED_LENGTH).toBe(Number.MAX_SAFE_INTEGER)
  })

  it('injects test build version', () => {
    expect(VERSION).toBe('0.0.1-test')
  })
})
