/**
 * Metadata Types
 *
 * Values read from and written to a PDF document information dictionary.
 */

/** One decoded key/value pair of the Info dictionary. */
export interface MetadataEntry {
  key: string
  value: string
}

/** Structured PDF object kinds the codec reports by name instead of decoding. */
export type UnsupportedValueKind = 'Array' | 'Dictionary' | 'Stream' | 'Reference' | 'Unknown'

/**
 * An Info dictionary value, detached from the PDF object model.
 *
 * `text` carries the raw string bytes (literal or hex form already unescaped);
 * `name` carries the raw name bytes without the leading slash.
 */
export type RawInfoValue =
  | { kind: 'text'; bytes: Uint8Array }
  | { kind: 'name'; bytes: Uint8Array }
  | { kind: 'integer'; value: number }
  | { kind: 'real'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' }
  | { kind: 'unsupported'; type: UnsupportedValueKind }
