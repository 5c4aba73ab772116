import type { RawInfoValue } from '../../types'

/** Prefix of the app-level convention carrying UTF-16BE text as base64 in a literal string. */
export const TAGGED_UTF16BE_PREFIX = 'UTF16BE:'

const UTF16BE_BOM = [0xfe, 0xff] as const
const UTF16LE_BOM = [0xff, 0xfe] as const

const STRICT_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/
const HEX_DIGITS = /^[0-9A-Fa-f]*$/

// ignoreBOM keeps a leading EF BB BF as U+FEFF instead of silently dropping it
const utf8Decoder = new TextDecoder('utf-8', { ignoreBOM: true })
const utf8Encoder = new TextEncoder()

export function utf8Lossy(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes)
}

const startsWith = (bytes: Uint8Array, prefix: readonly number[]): boolean =>
  bytes.length >= prefix.length && prefix.every((byte, idx) => bytes[idx] === byte)

/**
 * Decode 16-bit code units. Returns null for an odd byte count or an unpaired surrogate.
 */
export function decodeUtf16(bytes: Uint8Array, littleEndian: boolean): string | null {
  if (bytes.length % 2 !== 0) return null
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const units: number[] = []
  for (let offset = 0; offset < bytes.length; offset += 2) {
    units.push(view.getUint16(offset, littleEndian))
  }

  for (let idx = 0; idx < units.length; idx += 1) {
    const unit = units[idx]
    if (unit >= 0xd800 && unit <= 0xdbff) {
      const next = units[idx + 1]
      if (next === undefined || next < 0xdc00 || next > 0xdfff) return null
      idx += 1
    } else if (unit >= 0xdc00 && unit <= 0xdfff) {
      return null
    }
  }

  let text = ''
  for (let start = 0; start < units.length; start += 4096) {
    text += String.fromCharCode(...units.slice(start, start + 4096))
  }
  return text
}

/**
 * Decode bytes carrying a UTF-16 byte-order mark. Null when there is no BOM
 * or the code units after it are not valid UTF-16.
 */
export function decodeWithByteOrderMark(bytes: Uint8Array): string | null {
  if (startsWith(bytes, UTF16BE_BOM)) {
    const decoded = decodeUtf16(bytes.subarray(2), false)
    if (decoded !== null) return decoded
  }
  if (startsWith(bytes, UTF16LE_BOM)) {
    const decoded = decodeUtf16(bytes.subarray(2), true)
    if (decoded !== null) return decoded
  }
  return null
}

export function hexToBytes(hex: string): Uint8Array | null {
  if (hex.length % 2 !== 0 || !HEX_DIGITS.test(hex)) return null
  const bytes = new Uint8Array(hex.length / 2)
  for (let idx = 0; idx < bytes.length; idx += 1) {
    bytes[idx] = Number.parseInt(hex.slice(idx * 2, idx * 2 + 2), 16)
  }
  return bytes
}

function decodeHexWrapped(text: string): string | null {
  if (text.length < 2 || !text.startsWith('<') || !text.endsWith('>')) return null
  const bytes = hexToBytes(text.slice(1, -1))
  if (!bytes) return null
  return decodeWithByteOrderMark(bytes) ?? utf8Lossy(bytes)
}

function decodeTaggedUtf16Be(payload: string): string | null {
  if (!STRICT_BASE64.test(payload)) return null
  let bytes: Uint8Array = Buffer.from(payload, 'base64')
  if (startsWith(bytes, UTF16BE_BOM)) {
    bytes = bytes.subarray(2)
  }
  return decodeUtf16(bytes, false)
}

/**
 * Recover readable text from the raw bytes of an Info string value.
 *
 * Tried in order, first success wins: UTF-16BE BOM, UTF-16LE BOM, `<hex>` wrapper,
 * `UTF16BE:<base64>` tag, then UTF-8 with U+FFFD substitution. Never throws.
 */
export function decodeRawBytes(bytes: Uint8Array): string {
  const fromBom = decodeWithByteOrderMark(bytes)
  if (fromBom !== null) return fromBom

  const text = utf8Lossy(bytes)

  const fromHex = decodeHexWrapped(text)
  if (fromHex !== null) return fromHex

  if (text.startsWith(TAGGED_UTF16BE_PREFIX)) {
    // A broken payload comes back exactly as stored
    return decodeTaggedUtf16Be(text.slice(TAGGED_UTF16BE_PREFIX.length)) ?? text
  }

  return text
}

export function unsupportedPlaceholder(type: string): string {
  return `<unprocessed ${type}>`
}

/** Display form of any Info dictionary value. */
export function describeInfoValue(value: RawInfoValue): string {
  switch (value.kind) {
    case 'text':
      return decodeRawBytes(value.bytes)
    case 'name':
      return utf8Lossy(value.bytes)
    case 'integer':
    case 'real':
      return String(value.value)
    case 'boolean':
      return value.value ? 'true' : 'false'
    case 'null':
      return 'null'
    case 'unsupported':
      return unsupportedPlaceholder(value.type)
    default: {
      const exhaustive: never = value
      return exhaustive
    }
  }
}

/** Plain literal form written by the store: the UTF-8 bytes of the text. */
export function encodeLiteral(text: string): Uint8Array {
  return utf8Encoder.encode(text)
}

function utf16BeWithBom(text: string): Uint8Array {
  const bytes = new Uint8Array(2 + text.length * 2)
  bytes[0] = UTF16BE_BOM[0]
  bytes[1] = UTF16BE_BOM[1]
  for (let idx = 0; idx < text.length; idx += 1) {
    const unit = text.charCodeAt(idx)
    bytes[2 + idx * 2] = unit >> 8
    bytes[3 + idx * 2] = unit & 0xff
  }
  return bytes
}

/**
 * `UTF16BE:` followed by base64 of BOM + UTF-16BE code units. Lets callers carry
 * non-ASCII text through the literal channel; decodeRawBytes recovers it.
 */
export function encodeTaggedUtf16Be(text: string): string {
  return `${TAGGED_UTF16BE_PREFIX}${Buffer.from(utf16BeWithBom(text)).toString('base64')}`
}

/** `<FEFF...>` text form of the UTF-16BE bytes. */
export function encodeHexWrapped(text: string): string {
  return `<${Buffer.from(utf16BeWithBom(text)).toString('hex').toUpperCase()}>`
}

const isAscii = (text: string): boolean => /^[\x00-\x7f]*$/.test(text)

/** Tag-encode only when the text would not survive as plain ASCII. */
export function encodeForLiteralChannel(text: string): string {
  return isAscii(text) ? text : encodeTaggedUtf16Be(text)
}
