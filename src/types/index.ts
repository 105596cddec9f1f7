/** Calendar date formatted as `YYYY-MM-DD`. */
export type IsoDate = string

export type UserId = number

export interface DiaryEntry {
  date?: IsoDate
  checkIn?: string
  checkOut?: string
  isHoliday?: boolean
  isWeekend?: boolean
  diaryId?: number | string
}

export interface MonthWindow {
  year: number
  month: number
  from: IsoDate
  to: IsoDate
  days: number
}

export interface ApiUser {
  id: UserId
  email?: string
  firstName?: string
  lastName?: string
}

export interface RenderedRequest {
  date: IsoDate
  fileName: string
  content: string
}

export interface ExecutionResult {
  artifactPath: string
  success: boolean
  responseOrError: string
}

export type RunStatus = 'completed' | 'nothing-to-do'

export interface RunSummary {
  status: RunStatus
  userId: UserId
  year: number
  month: number
  totalDays: number
  actionableDays: number
  skipped: number
  outputDir?: string
  artifacts: string[]
  executed: boolean
  results: ExecutionResult[]
  succeeded: number
  failed: number
}
