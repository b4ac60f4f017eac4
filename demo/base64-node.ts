import { mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import {
  CapacityError,
  decode,
  decodeInto,
  decodeToString,
  describeError,
  encode,
  encodeCapacity,
  encodeInto,
  encodeToString,
  encodedLength,
  isErr,
  operations,
} from '../src/index'
import type { Base64Warning } from '../src/index'

const OUT_DIR = resolve(process.cwd(), 'demo', '.out', 'base64-node')

function section(title: string): void {
  console.log(`\n${'═'.repeat(68)}`)
  console.log(`  ${title}`)
  console.log('═'.repeat(68))
}

function ok(name: string, details: Record<string, unknown>): void {
  const summary = Object.entries(details)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(', ')
  console.log(`[OK] ${name}: ${summary}`)
}

function logWarning(warning: Base64Warning): void {
  console.warn(`[WARN] ${warning.code}: ${warning.message}`)
}

function makeDemoPayload(length: number): Uint8Array {
  const out = new Uint8Array(length)
  for (let i = 0; i < out.length; i++) out[i] = (i * 37 + 11) & 0xff
  return out
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i])
}

async function demoAllocating(payload: Uint8Array): Promise<void> {
  section('1) Allocating encode/decode')
  const standard = encode(payload, 'standard')
  const url = encode(payload, 'url')

  await writeFile(resolve(OUT_DIR, 'payload.bin'), payload)
  await writeFile(resolve(OUT_DIR, 'payload.std.b64'), standard)
  await writeFile(resolve(OUT_DIR, 'payload.url.b64'), url)

  const standardBack = decode(await readFile(resolve(OUT_DIR, 'payload.std.b64')), 'standard')
  const urlBack = decode(await readFile(resolve(OUT_DIR, 'payload.url.b64')), 'url')
  const mixedBack = decode(url, 'mixed')

  ok('round trips', {
    payloadBytes: payload.length,
    standardSymbols: standard.length,
    urlSymbols: url.length,
    standard: sameBytes(standardBack, payload),
    url: sameBytes(urlBack, payload),
    mixed: sameBytes(mixedBack, payload),
  })
  ok('text helpers', {
    encoded: encodeToString(new TextEncoder().encode('hello world')),
    decoded: decodeToString('aGVsbG8gd29ybGQ='),
  })
}

function demoBuffers(payload: Uint8Array): void {
  section('2) Caller-owned buffers')
  const dst = new Uint8Array(encodeCapacity(payload.length))
  const written = encodeInto(payload, dst, 'url')
  const back = new Uint8Array(payload.length + 1)
  const decoded = decodeInto(dst.subarray(0, written), back, 'url')

  let capacityRejected = false
  try {
    encodeInto(payload, new Uint8Array(encodedLength(payload.length)))
  } catch (error) {
    if (!(error instanceof CapacityError)) throw error
    capacityRejected = true
  }

  ok('buffer primitives', {
    capacity: dst.length,
    written,
    terminator: dst[written],
    decoded,
    capacityRejected,
  })
}

function demoOperations(): void {
  section('3) Operations table and diagnostics')
  const samples: Array<[string, string]> = [
    ['decodeStandard', 'invalid=+'],
    ['decodeStandard', 'QUJD-_8'],
    ['decodeURL', 'QUI='],
    ['decodeStandard', 'QR=='],
  ]
  for (const [name, text] of samples) {
    const input = new TextEncoder().encode(text)
    const result =
      name === 'decodeURL' ? operations.decodeURL(input) : operations.decodeStandard(input)
    const outcome = isErr(result) ? describeError(result.error) : 'ok'
    console.log(`  ${name}(${JSON.stringify(text)}) -> ${outcome}`)
  }

  decode('QUJD', 'standard', { onWarning: logWarning })
  decode('QUI', 'standard', { onWarning: logWarning })
  decode('-_+/', 'mixed', { onWarning: logWarning })
}

async function main(): Promise<void> {
  await rm(OUT_DIR, { recursive: true, force: true })
  await mkdir(OUT_DIR, { recursive: true })
  console.log('Output directory:', OUT_DIR)

  const payload = makeDemoPayload(1000)
  await demoAllocating(payload)
  demoBuffers(payload)
  demoOperations()

  section('Done')
  console.log('base64 demo completed.')
}

main().catch((error) => {
  console.error(error)
  process.exitCode = 1
})
