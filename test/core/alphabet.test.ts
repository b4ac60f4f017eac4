import { describe, expect, it } from 'vitest'
import {
  acceptsPadding,
  decodeTableFor,
  encodeTableFor,
  getDecodeTable,
  getEncodeTable,
  isAlphabet,
  isDecodeMode,
  isPaddedAlphabet,
} from '../../src/core/alphabet'
import { INVALID_SEXTET, STANDARD_ALPHABET, URL_ALPHABET } from '../../src/core/constants'
import { decode } from '../../src/decoder'
import { encodeToString } from '../../src/encoder'

const code = (ch: string): number => ch.charCodeAt(0)

describe('core/alphabet', () => {
  it('encode tables map 6-bit values to alphabet symbols', () => {
    const standard = getEncodeTable('standard')
    const url = getEncodeTable('url')
    expect(standard.length).toBe(64)
    expect(url.length).toBe(64)
    for (let i = 0; i < 64; i++) {
      expect(standard[i]).toBe(STANDARD_ALPHABET.charCodeAt(i))
      expect(url[i]).toBe(URL_ALPHABET.charCodeAt(i))
    }
    expect(standard[62]).toBe(code('+'))
    expect(url[63]).toBe(code('_'))
  })

  it('decode tables are the inverse of the encode tables', () => {
    for (const alphabet of ['standard', 'url'] as const) {
      const enc = getEncodeTable(alphabet)
      const dec = getDecodeTable(alphabet)
      expect(dec.length).toBe(256)
      for (let i = 0; i < 64; i++) {
        expect(dec[enc[i]!]).toBe(i)
      }
    }
  })

  it('rejects the other alphabet and the pad symbol', () => {
    const standard = getDecodeTable('standard')
    const url = getDecodeTable('url')
    expect(standard[code('-')]).toBe(INVALID_SEXTET)
    expect(standard[code('_')]).toBe(INVALID_SEXTET)
    expect(url[code('+')]).toBe(INVALID_SEXTET)
    expect(url[code('/')]).toBe(INVALID_SEXTET)
    for (const mode of ['standard', 'url', 'mixed'] as const) {
      const table = getDecodeTable(mode)
      expect(table[code('=')]).toBe(INVALID_SEXTET)
      expect(table[0]).toBe(INVALID_SEXTET)
      expect(table[0xff]).toBe(INVALID_SEXTET)
    }
  })

  it('mixed table is the union of standard and url tables', () => {
    const standard = getDecodeTable('standard')
    const url = getDecodeTable('url')
    const mixed = getDecodeTable('mixed')
    let valid = 0
    for (let b = 0; b < 256; b++) {
      const expected = standard[b] !== INVALID_SEXTET ? standard[b] : url[b]
      expect(mixed[b]).toBe(expected)
      if (mixed[b] !== INVALID_SEXTET) valid++
    }
    expect(valid).toBe(66)
    expect(mixed[code('+')]).toBe(62)
    expect(mixed[code('-')]).toBe(62)
    expect(mixed[code('/')]).toBe(63)
    expect(mixed[code('_')]).toBe(63)
  })

  it('returns the same shared table on every lookup', () => {
    expect(getDecodeTable('mixed')).toBe(getDecodeTable('mixed'))
    expect(getEncodeTable('url')).toBe(getEncodeTable('url'))
  })

  it('hands out frozen copies that writes cannot change', () => {
    const dec = getDecodeTable('standard')
    const enc = getEncodeTable('url')
    expect(Object.isFrozen(dec)).toBe(true)
    expect(Object.isFrozen(enc)).toBe(true)
    expect(Reflect.set(dec, 0x51, INVALID_SEXTET)).toBe(false)
    expect(Reflect.set(enc, 0, 0x21)).toBe(false)
    expect(dec[0x51]).toBe(16)
    expect(enc[0]).toBe(code('A'))
  })

  it('keeps the codec tables apart from the public copies', () => {
    expect(getDecodeTable('mixed')).not.toBe(decodeTableFor('mixed'))
    expect(getEncodeTable('standard')).not.toBe(encodeTableFor('standard'))
    expect(Array.from(decodeTableFor('mixed'))).toEqual(Array.from(getDecodeTable('mixed')))
    expect(Array.from(decode('QQ=='))).toEqual([0x41])
    expect(encodeToString(new Uint8Array(3), 'url')).toBe('AAAA')
  })

  it('describes padding per alphabet and mode', () => {
    expect(isPaddedAlphabet('standard')).toBe(true)
    expect(isPaddedAlphabet('url')).toBe(false)
    expect(acceptsPadding('standard')).toBe(true)
    expect(acceptsPadding('mixed')).toBe(true)
    expect(acceptsPadding('url')).toBe(false)
  })

  it('guards alphabet and mode names', () => {
    expect(isAlphabet('standard')).toBe(true)
    expect(isAlphabet('url')).toBe(true)
    expect(isAlphabet('mixed')).toBe(false)
    expect(isAlphabet(1)).toBe(false)
    expect(isDecodeMode('mixed')).toBe(true)
    expect(isDecodeMode('base32')).toBe(false)
    expect(isDecodeMode(undefined)).toBe(false)
  })
})
