import {
  PDFArray,
  PDFBool,
  PDFDict,
  PDFHexString,
  PDFName,
  PDFNull,
  PDFNumber,
  PDFRef,
  PDFStream,
  PDFString
} from 'pdf-lib'
import type { PDFObject } from 'pdf-lib'
import type { RawInfoValue } from '../../types'
import { encodeLiteral, utf8Lossy } from './value-codec'

const isHexDigit = (char: string | undefined): boolean => char !== undefined && /^[0-9A-Fa-f]$/.test(char)

/**
 * Raw bytes of a name, without the leading slash and with `#xx` escapes resolved.
 */
export function nameBytes(name: PDFName): Uint8Array {
  const encoded = name.toString().slice(1)
  const bytes: number[] = []
  for (let idx = 0; idx < encoded.length; idx += 1) {
    const char = encoded[idx]
    if (char === '#' && isHexDigit(encoded[idx + 1]) && isHexDigit(encoded[idx + 2])) {
      bytes.push(Number.parseInt(encoded.slice(idx + 1, idx + 3), 16))
      idx += 2
    } else {
      bytes.push(encoded.charCodeAt(idx) & 0xff)
    }
  }
  return new Uint8Array(bytes)
}

export function decodeKey(name: PDFName): string {
  return utf8Lossy(nameBytes(name))
}

/**
 * Name object for a key, stored as its UTF-8 bytes. `PDFName.of` resolves `#xx`
 * in its input, so a literal `#` goes in as `#23`.
 */
export function keyToName(key: string): PDFName {
  let raw = ''
  for (const byte of encodeLiteral(key)) {
    raw += byte === 0x23 ? '#23' : String.fromCharCode(byte)
  }
  return PDFName.of(raw)
}

const ESCAPES: Record<string, number> = {
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  b: 0x08,
  f: 0x0c,
  '(': 0x28,
  ')': 0x29,
  '\\': 0x5c
}

const isOctalDigit = (char: string | undefined): boolean => char !== undefined && char >= '0' && char <= '7'

/**
 * Bytes of a literal string body: escapes resolved, `\ddd` octal codes read,
 * backslash-newline continuations dropped and bare CR / CRLF read as LF.
 */
export function unescapeLiteral(body: string): Uint8Array {
  const bytes: number[] = []
  for (let idx = 0; idx < body.length; idx += 1) {
    const char = body[idx]

    if (char === '\r') {
      bytes.push(0x0a)
      if (body[idx + 1] === '\n') idx += 1
      continue
    }
    if (char !== '\\') {
      bytes.push(body.charCodeAt(idx) & 0xff)
      continue
    }

    const next = body[idx + 1]
    if (next === undefined) break
    idx += 1

    if (next in ESCAPES) {
      bytes.push(ESCAPES[next])
    } else if (isOctalDigit(next)) {
      let octal = next
      while (octal.length < 3 && isOctalDigit(body[idx + 1])) {
        octal += body[idx + 1]
        idx += 1
      }
      bytes.push(Number.parseInt(octal, 8) & 0xff)
    } else if (next === '\r') {
      if (body[idx + 1] === '\n') idx += 1
    } else if (next !== '\n') {
      // Unknown escape: the backslash is ignored
      bytes.push(body.charCodeAt(idx) & 0xff)
    }
  }
  return new Uint8Array(bytes)
}

/** Bytes of a hex string body; whitespace ignored, a missing final digit read as 0. */
export function unescapeHex(body: string): Uint8Array {
  const digits = body.replace(/[^0-9A-Fa-f]/g, '')
  const padded = digits.length % 2 === 0 ? digits : `${digits}0`
  return Uint8Array.from(Buffer.from(padded, 'hex'))
}

/** Raw bytes of a literal or hex string object. */
export function stringBytes(object: PDFString | PDFHexString): Uint8Array {
  const body = object.toString().slice(1, -1)
  return object instanceof PDFString ? unescapeLiteral(body) : unescapeHex(body)
}

export function toRawInfoValue(object: PDFObject): RawInfoValue {
  if (object instanceof PDFString || object instanceof PDFHexString) {
    return { kind: 'text', bytes: stringBytes(object) }
  }
  if (object instanceof PDFName) {
    return { kind: 'name', bytes: nameBytes(object) }
  }
  if (object instanceof PDFNumber) {
    const value = object.asNumber()
    return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'real', value }
  }
  if (object instanceof PDFBool) {
    return { kind: 'boolean', value: object.asBoolean() }
  }
  if (object === PDFNull) {
    return { kind: 'null' }
  }
  if (object instanceof PDFArray) return { kind: 'unsupported', type: 'Array' }
  if (object instanceof PDFStream) return { kind: 'unsupported', type: 'Stream' }
  if (object instanceof PDFDict) return { kind: 'unsupported', type: 'Dictionary' }
  if (object instanceof PDFRef) return { kind: 'unsupported', type: 'Reference' }
  return { kind: 'unsupported', type: 'Unknown' }
}

/**
 * Literal string object holding exactly these bytes. Backslash, parentheses and
 * line breaks are escaped; every other byte is written as is.
 */
export function literalString(bytes: Uint8Array): PDFString {
  let escaped = ''
  for (const byte of bytes) {
    switch (byte) {
      case 0x5c:
        escaped += '\\\\'
        break
      case 0x28:
        escaped += '\\('
        break
      case 0x29:
        escaped += '\\)'
        break
      case 0x0a:
        escaped += '\\n'
        break
      case 0x0d:
        escaped += '\\r'
        break
      default:
        escaped += String.fromCharCode(byte)
    }
  }
  return PDFString.of(escaped)
}
