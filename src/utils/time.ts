import type { IsoDate } from '../types/index.js'

export function getLocalDate(date: Date = new Date(), timeZone?: string): IsoDate {
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(date)
}

export function getLocalYearMonth(date: Date = new Date(), timeZone?: string): { year: number, month: number } {
  const [year, month] = getLocalDate(date, timeZone).split('-').map(Number)
  return { year, month }
}

/** `YYYYMMDD_HHMMSS` in local time, used to name per-run output directories. */
export function runStamp(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0')
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `${day}_${time}`
}
