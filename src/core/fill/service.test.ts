import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { Mock } from 'vitest'
import type { DiaryEntry, UserId } from '../../types/index.js'
import type { DiaryClient } from '../diaries/types.js'
import { FLEXIBLE_SENTINEL } from '../diaries/types.js'
import { RequestExecutor } from '../requests/executor.js'
import { TemplateProcessor } from '../requests/template.js'
import type { ParsedRequest, RawResponse } from '../requests/types.js'
import { FillService } from './service.js'
import { formatSummaryLines } from './format.js'

const TEMPLATE = 'PUT https://woffu.example.test/api/diaries/DIARY_ID\nAuthorization: Bearer TOKEN_PLACEHOLDER\n\n{"userId": 0, "date": "2000-01-01"}'

function flexibleDay(date: string, diaryId?: number): DiaryEntry {
  return { date, checkIn: FLEXIBLE_SENTINEL, checkOut: '', isHoliday: false, isWeekend: false, diaryId }
}

function fakeClient(userId: UserId | null, diaries: DiaryEntry[]): DiaryClient {
  return {
    token: 'test-token',
    resolveUserId: vi.fn(async () => userId),
    fetchMonthlyDiaries: vi.fn(async () => diaries),
    listUsers: vi.fn(async () => []),
  }
}

describe('FillService', () => {
  let outputDir: string
  let dispatch: Mock<(request: ParsedRequest) => Promise<RawResponse>>
  let sleep: Mock<(ms: number) => Promise<void>>

  beforeEach(async () => {
    outputDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'flexday-fill-')), 'requests')
    dispatch = vi.fn<(request: ParsedRequest) => Promise<RawResponse>>(async () => ({ exitCode: 0, stdout: 'HTTP/1.1 201 Created\r\n\r\n', stderr: '' }))
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => {})
  })

  afterEach(async () => {
    await fs.rm(path.dirname(outputDir), { recursive: true, force: true })
  })

  function createService(client: DiaryClient) {
    return new FillService({
      client,
      templates: new TemplateProcessor('inline', TEMPLATE, client.token),
      executor: new RequestExecutor({ dispatch }),
      delayMs: 1000,
      today: () => '2024-03-20',
      sleep,
    })
  }

  it('fails the run when the user id cannot be resolved', async () => {
    const service = createService(fakeClient(null, []))
    await expect(service.run({ year: 2024, month: 3, outputDir, execute: false }))
      .rejects.toMatchObject({ name: 'AuthResolutionError' })
  })

  it('fails the run when the month has no diaries', async () => {
    const service = createService(fakeClient(7, []))
    await expect(service.run({ year: 2024, month: 3, outputDir, execute: false }))
      .rejects.toThrow('No diaries found for 2024-03')
  })

  it('rejects an invalid month before calling the API', async () => {
    const client = fakeClient(7, [])
    await expect(createService(client).run({ year: 2024, month: 14, outputDir, execute: false }))
      .rejects.toThrow(RangeError)
    expect(client.resolveUserId).not.toHaveBeenCalled()
  })

  it('finishes with nothing to do when no day is actionable', async () => {
    const client = fakeClient(7, [flexibleDay('2024-03-25', 1), { ...flexibleDay('2024-03-02', 2), isWeekend: true }])

    const summary = await createService(client).run({ year: 2024, month: 3, outputDir, execute: true })

    expect(summary).toMatchObject({ status: 'nothing-to-do', totalDays: 2, actionableDays: 0, artifacts: [] })
    await expect(fs.access(outputDir)).rejects.toThrow()
    expect(dispatch).not.toHaveBeenCalled()
  })

  it('writes one artifact per actionable day without sending them', async () => {
    const client = fakeClient(7, [flexibleDay('2024-03-04', 11), flexibleDay('2024-03-05', 12), flexibleDay('2024-03-21', 13)])

    const summary = await createService(client).run({ year: 2024, month: 3, outputDir, execute: false })

    expect(client.fetchMonthlyDiaries).toHaveBeenCalledWith(7, 2024, 3)
    expect(summary.status).toBe('completed')
    expect(summary.artifacts).toEqual([
      path.join(outputDir, 'diary_request_2024-03-04.http'),
      path.join(outputDir, 'diary_request_2024-03-05.http'),
    ])
    await expect(fs.readFile(summary.artifacts[1], 'utf8')).resolves.toBe(
      'PUT https://woffu.example.test/api/diaries/12\nAuthorization: Bearer test-token\n\n{"userId": 7, "date": "2024-03-05"}',
    )
    expect(summary.executed).toBe(false)
    expect(dispatch).not.toHaveBeenCalled()
  })

  it('sends artifacts in order, pausing between them, and keeps going after a failure', async () => {
    dispatch
      .mockResolvedValueOnce({ exitCode: 0, stdout: 'HTTP/1.1 500 Internal Server Error\r\n\r\n', stderr: '' })
      .mockResolvedValueOnce({ exitCode: 0, stdout: 'HTTP/1.1 204 No Content\r\n\r\n', stderr: '' })
      .mockResolvedValueOnce({ exitCode: 0, stdout: 'HTTP/1.1 200 OK\r\n\r\n', stderr: '' })
    const client = fakeClient(7, [flexibleDay('2024-03-04', 11), flexibleDay('2024-03-05', 12), flexibleDay('2024-03-06', 13)])

    const summary = await createService(client).run({ year: 2024, month: 3, outputDir, execute: true })

    expect(dispatch.mock.calls.map(([request]) => request.url)).toEqual([
      'https://woffu.example.test/api/diaries/11',
      'https://woffu.example.test/api/diaries/12',
      'https://woffu.example.test/api/diaries/13',
    ])
    expect(sleep).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledWith(1000)
    expect(summary.results.map(result => result.success)).toEqual([false, true, true])
    expect(summary).toMatchObject({ executed: true, succeeded: 2, failed: 1 })
  })

  it('skips actionable days that have no diary id', async () => {
    const client = fakeClient(7, [flexibleDay('2024-03-04'), flexibleDay('2024-03-05', 12)])

    const summary = await createService(client).run({ year: 2024, month: 3, outputDir, execute: false })

    expect(summary.actionableDays).toBe(2)
    expect(summary.skipped).toBe(1)
    expect(summary.artifacts).toEqual([path.join(outputDir, 'diary_request_2024-03-05.http')])
  })

  it('summarises the run', async () => {
    const client = fakeClient(7, [flexibleDay('2024-03-04', 11)])
    const summary = await createService(client).run({ year: 2024, month: 3, outputDir, execute: true })

    expect(formatSummaryLines(summary)).toEqual([
      'User ID: 7',
      'Month: 2024-03',
      'Days in diary: 1',
      'Flexible schedule days: 1',
      'HTTP request files created: 1',
      `Output directory: ${outputDir}`,
      'Successfully executed: 1/1',
    ])
  })
})
