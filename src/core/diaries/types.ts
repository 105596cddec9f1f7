import type { ApiUser, DiaryEntry, UserId } from '../../types/index.js'

/** Check-in code the service reports for a flexible-schedule day nobody has clocked yet. */
export const FLEXIBLE_SENTINEL = '_FlexibleSchedule'

export const CLASSIFICATION_FIELDS = ['checkIn', 'checkOut', 'isHoliday', 'isWeekend'] as const

export type DiaryVerdict =
  | 'actionable'
  | 'invalid-date'
  | 'not-past'
  | 'missing-fields'
  | 'not-flexible'

export interface DiaryClassification {
  entry: DiaryEntry
  verdict: DiaryVerdict
  missing?: string[]
}

export interface DiaryClient {
  readonly token: string
  resolveUserId(): Promise<UserId | null>
  fetchMonthlyDiaries(userId: UserId, year: number, month: number): Promise<DiaryEntry[]>
  listUsers(): Promise<ApiUser[]>
}
