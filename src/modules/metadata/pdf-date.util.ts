const pad = (value: number, width = 2): string => String(value).padStart(width, '0')

/**
 * Format an instant as a PDF date: `D:YYYYMMDDHHmmSS+HH'mm'`.
 *
 * Fields are wall-clock time at `offsetMinutes` east of UTC (the host's local
 * offset by default). The sign is `+` for offsets >= 0; both offset fields are
 * magnitudes.
 */
export function formatPdfDate(date: Date, offsetMinutes: number = -date.getTimezoneOffset()): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000)
  const stamp =
    pad(shifted.getUTCFullYear(), 4) +
    pad(shifted.getUTCMonth() + 1) +
    pad(shifted.getUTCDate()) +
    pad(shifted.getUTCHours()) +
    pad(shifted.getUTCMinutes()) +
    pad(shifted.getUTCSeconds())

  const sign = offsetMinutes >= 0 ? '+' : '-'
  const magnitude = Math.abs(offsetMinutes)
  return `D:${stamp}${sign}${pad(Math.floor(magnitude / 60))}'${pad(magnitude % 60)}'`
}

export const PDF_DATE_PATTERN = /^D:\d{14}[+-]\d{2}'\d{2}'$/
