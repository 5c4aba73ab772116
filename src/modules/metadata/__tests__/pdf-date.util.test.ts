import { describe, expect, it } from 'vitest'
import { PDF_DATE_PATTERN, formatPdfDate } from '../pdf-date.util'

const instant = new Date(Date.UTC(2024, 0, 15, 10, 30, 45))

describe('formatPdfDate', () => {
  it('formats UTC with a zero offset', () => {
    expect(formatPdfDate(instant, 0)).toBe("D:20240115103045+00'00'")
  })

  it('shifts wall-clock fields east of UTC', () => {
    expect(formatPdfDate(instant, 330)).toBe("D:20240115160045+05'30'")
  })

  it('shifts wall-clock fields west of UTC with positive magnitudes', () => {
    expect(formatPdfDate(instant, -300)).toBe("D:20240115053045-05'00'")
    expect(formatPdfDate(instant, -570)).toBe("D:20240115010045-09'30'")
  })

  it('rolls over the date', () => {
    expect(formatPdfDate(new Date(Date.UTC(2023, 11, 31, 23, 0, 0)), 120)).toBe("D:20240101010000+02'00'")
  })

  it('defaults to the host offset', () => {
    const value = formatPdfDate(instant)
    expect(value).toMatch(PDF_DATE_PATTERN)
    expect(value).toBe(formatPdfDate(instant, -instant.getTimezoneOffset()))
  })
})
