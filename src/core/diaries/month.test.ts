import { describe, expect, it } from 'vitest'
import { daysInMonth, parseIsoDate, resolveMonthWindow } from './month.js'

describe('resolveMonthWindow', () => {
  it('spans the whole month', () => {
    expect(resolveMonthWindow(2024, 3)).toEqual({
      year: 2024,
      month: 3,
      from: '2024-03-01',
      to: '2024-03-31',
      days: 31,
    })
  })

  it('uses the calendar day count for February', () => {
    expect(resolveMonthWindow(2024, 2).to).toBe('2024-02-29')
    expect(resolveMonthWindow(2023, 2).to).toBe('2023-02-28')
    expect(daysInMonth(1900, 2)).toBe(28)
    expect(daysInMonth(2000, 2)).toBe(29)
  })

  it('rejects months outside 1-12', () => {
    expect(() => resolveMonthWindow(2024, 0)).toThrow(RangeError)
    expect(() => resolveMonthWindow(2024, 13)).toThrow('Invalid month: 13')
  })
})

describe('parseIsoDate', () => {
  it('accepts real calendar days', () => {
    expect(parseIsoDate('2024-02-29')).toBe('2024-02-29')
  })

  it('rejects impossible days and other formats', () => {
    expect(parseIsoDate('2023-02-29')).toBeNull()
    expect(parseIsoDate('2024-04-31')).toBeNull()
    expect(parseIsoDate('2024-4-1')).toBeNull()
    expect(parseIsoDate('2024-04-01T00:00:00Z')).toBeNull()
    expect(parseIsoDate(20240401)).toBeNull()
  })
})
