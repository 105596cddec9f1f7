import type { DiaryEntry, IsoDate } from '../../types/index.js'
import { CLASSIFICATION_FIELDS, FLEXIBLE_SENTINEL } from './types.js'
import type { DiaryClassification } from './types.js'
import { parseIsoDate } from './month.js'

function missingFields(entry: DiaryEntry): string[] {
  return CLASSIFICATION_FIELDS.filter(field => entry[field] === undefined)
}

function isUnfilledFlexibleDay(entry: DiaryEntry): boolean {
  return entry.checkIn === FLEXIBLE_SENTINEL
    && entry.checkOut === ''
    && entry.isHoliday === false
    && entry.isWeekend === false
}

/**
 * Explains where an entry falls in the two-stage rule. The date check runs
 * first, so a future day with missing fields reports `not-past`.
 */
export function classifyDiary(entry: DiaryEntry, today: IsoDate): DiaryClassification {
  const date = parseIsoDate(entry.date)
  if (!date) return { entry, verdict: 'invalid-date' }
  if (date >= today) return { entry, verdict: 'not-past' }

  const missing = missingFields(entry)
  if (missing.length > 0) return { entry, verdict: 'missing-fields', missing }

  return { entry, verdict: isUnfilledFlexibleDay(entry) ? 'actionable' : 'not-flexible' }
}

export function classifyDiaries(entries: DiaryEntry[], today: IsoDate): DiaryClassification[] {
  return entries.map(entry => classifyDiary(entry, today))
}

/**
 * Keeps past flexible-schedule days that have not been clocked and are
 * neither holidays nor weekends. `today` is exclusive; input order is kept.
 */
export function filterActionable(entries: DiaryEntry[], today: IsoDate): DiaryEntry[] {
  return classifyDiaries(entries, today)
    .filter(item => item.verdict === 'actionable')
    .map(item => item.entry)
}
