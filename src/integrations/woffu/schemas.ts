import { z } from 'zod'
import type { ApiUser, DiaryEntry } from '../../types/index.js'

// Wrong-typed wire values degrade to absent instead of failing the whole entry.
const diaryWireSchema = z.object({
  date: z.string().optional().catch(undefined),
  in: z.string().optional().catch(undefined),
  out: z.string().optional().catch(undefined),
  isHoliday: z.boolean().optional().catch(undefined),
  isWeekend: z.boolean().optional().catch(undefined),
  diaryId: z.union([z.number(), z.string()]).optional().catch(undefined),
})

const diariesResponseSchema = z.object({
  diaries: z.array(z.unknown()),
})

const userIdSchema = z.union([
  z.number().int().positive(),
  z.string().regex(/^\d+$/).transform(Number).pipe(z.number().int().positive()),
])

const userWireSchema = z.object({
  id: userIdSchema,
  email: z.string().optional().catch(undefined),
  firstName: z.string().optional().catch(undefined),
  lastName: z.string().optional().catch(undefined),
})

export function toDiaryEntry(value: unknown): DiaryEntry {
  const parsed = diaryWireSchema.safeParse(value)
  if (!parsed.success) return {}

  const wire = parsed.data
  const entry: DiaryEntry = {}
  if (wire.date !== undefined) entry.date = wire.date
  if (wire.in !== undefined) entry.checkIn = wire.in
  if (wire.out !== undefined) entry.checkOut = wire.out
  if (wire.isHoliday !== undefined) entry.isHoliday = wire.isHoliday
  if (wire.isWeekend !== undefined) entry.isWeekend = wire.isWeekend
  if (wire.diaryId !== undefined) entry.diaryId = wire.diaryId
  return entry
}

/** Returns `null` when the payload carries no `diaries` array. */
export function parseDiariesResponse(payload: unknown): DiaryEntry[] | null {
  const parsed = diariesResponseSchema.safeParse(payload)
  if (!parsed.success) return null
  return parsed.data.diaries.map(toDiaryEntry)
}

export function parseUser(payload: unknown): ApiUser | null {
  const parsed = userWireSchema.safeParse(payload)
  return parsed.success ? parsed.data : null
}

export function parseUsers(payload: unknown): ApiUser[] {
  if (!Array.isArray(payload)) return []
  return payload
    .map(parseUser)
    .filter((user): user is ApiUser => user !== null)
}
