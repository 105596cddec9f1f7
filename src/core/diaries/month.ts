import type { IsoDate, MonthWindow } from '../../types/index.js'

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

export function formatIsoDate(year: number, month: number, day: number): IsoDate {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

export function resolveMonthWindow(year: number, month: number): MonthWindow {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new RangeError(`Invalid year: ${year}`)
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`Invalid month: ${month}`)
  }
  const days = daysInMonth(year, month)
  return {
    year,
    month,
    from: formatIsoDate(year, month, 1),
    to: formatIsoDate(year, month, days),
    days,
  }
}

/** Returns the date unchanged when it names a real calendar day, otherwise `null`. */
export function parseIsoDate(value: unknown): IsoDate | null {
  if (typeof value !== 'string') return null
  const match = ISO_DATE.exec(value)
  if (!match) return null
  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  if (month < 1 || month > 12 || day < 1) return null
  if (day > daysInMonth(year, month)) return null
  return value
}
