import fs from 'node:fs/promises'
import path from 'node:path'
import type { ExecutionResult, IsoDate, RunSummary } from '../../types/index.js'
import type { DiaryClient } from '../diaries/types.js'
import { filterActionable } from '../diaries/filter.js'
import { resolveMonthWindow } from '../diaries/month.js'
import { RequestExecutor } from '../requests/executor.js'
import { TemplateProcessor, toRenderable } from '../requests/template.js'
import { AuthResolutionError, EmptyDiarySetError, TemplateIOError } from '../errors.js'
import { logger } from '../../utils/logger.js'

export interface FillServiceOptions {
  client: DiaryClient
  templates: TemplateProcessor
  executor: RequestExecutor
  delayMs: number
  today: () => IsoDate
  sleep: (ms: number) => Promise<void>
}

export interface FillRunOptions {
  year: number
  month: number
  outputDir: string
  execute: boolean
}

function monthLabel(year: number, month: number): string {
  return `${year}-${String(month).padStart(2, '0')}`
}

export class FillService {
  private readonly client: DiaryClient
  private readonly templates: TemplateProcessor
  private readonly executor: RequestExecutor
  private readonly delayMs: number
  private readonly today: () => IsoDate
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: FillServiceOptions) {
    this.client = options.client
    this.templates = options.templates
    this.executor = options.executor
    this.delayMs = options.delayMs
    this.today = options.today
    this.sleep = options.sleep
  }

  async run(options: FillRunOptions): Promise<RunSummary> {
    const { year, month } = resolveMonthWindow(options.year, options.month)
    const label = monthLabel(year, month)

    logger.info('Resolving user id')
    const userId = await this.client.resolveUserId()
    if (userId === null) {
      throw new AuthResolutionError()
    }
    logger.info('User id resolved', { userId })

    logger.info(`Fetching diaries for ${label}`)
    const diaries = await this.client.fetchMonthlyDiaries(userId, year, month)
    if (diaries.length === 0) {
      throw new EmptyDiarySetError(year, month)
    }

    const today = this.today()
    const actionable = filterActionable(diaries, today)
    logger.info('Diaries filtered', { total: diaries.length, actionable: actionable.length, today })

    const summary: RunSummary = {
      status: 'nothing-to-do',
      userId,
      year,
      month,
      totalDays: diaries.length,
      actionableDays: actionable.length,
      skipped: 0,
      artifacts: [],
      executed: false,
      results: [],
      succeeded: 0,
      failed: 0,
    }

    if (actionable.length === 0) {
      logger.info('No flexible schedule days found that need to be filled')
      return summary
    }

    await this.prepareOutputDir(options.outputDir)
    summary.status = 'completed'
    summary.outputDir = options.outputDir

    for (const entry of actionable) {
      const diary = toRenderable(entry)
      if (!diary) {
        logger.warn('Actionable diary has no diaryId; skipping', { date: entry.date })
        summary.skipped += 1
        continue
      }
      const rendered = this.templates.render(diary, userId)
      summary.artifacts.push(await this.templates.write(rendered, options.outputDir))
    }

    if (options.execute) {
      summary.executed = true
      summary.results = await this.executeAll(summary.artifacts)
      summary.succeeded = summary.results.filter(result => result.success).length
      summary.failed = summary.results.length - summary.succeeded
    }

    return summary
  }

  private async prepareOutputDir(outputDir: string): Promise<void> {
    try {
      await fs.mkdir(outputDir, { recursive: true })
    }
    catch (error) {
      throw new TemplateIOError('Error creating output directory', outputDir, error)
    }
    logger.info('Using output directory', { path: outputDir })
  }

  private async executeAll(artifacts: string[]): Promise<ExecutionResult[]> {
    logger.info('Executing HTTP requests', { count: artifacts.length, delayMs: this.delayMs })
    const results: ExecutionResult[] = []

    for (const [index, artifactPath] of artifacts.entries()) {
      if (index > 0 && this.delayMs > 0) {
        await this.sleep(this.delayMs)
      }
      const name = path.basename(artifactPath)
      logger.info(`Executing request from ${name}`)
      const result = await this.executor.execute(artifactPath)
      results.push(result)

      if (result.success) {
        logger.info('Request succeeded', { artifact: name })
        logger.debug('Response', { artifact: name, response: result.responseOrError })
      }
      else {
        logger.warn('Request failed', { artifact: name, error: result.responseOrError })
      }
    }

    return results
  }
}
