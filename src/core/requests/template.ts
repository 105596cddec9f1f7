import fs from 'node:fs/promises'
import path from 'node:path'
import type { DiaryEntry, IsoDate, RenderedRequest, UserId } from '../../types/index.js'
import { TemplateIOError } from '../errors.js'
import { logger } from '../../utils/logger.js'

export const DIARY_ID_PLACEHOLDER = 'DIARY_ID'
export const TOKEN_PLACEHOLDER = 'TOKEN_PLACEHOLDER'
export const ARTIFACT_PREFIX = 'diary_request'
export const ARTIFACT_EXTENSION = 'http'

const DATE_FIELD = /"date":\s*"[^"]+"/g
const USER_ID_FIELD = /"userId":\s*0(?!\d)/g

export interface RenderableDiary {
  date: IsoDate
  diaryId: number | string
}

export function artifactFileName(date: IsoDate): string {
  return `${ARTIFACT_PREFIX}_${date}.${ARTIFACT_EXTENSION}`
}

/** Returns the fields a template needs, or `null` when the entry lacks them. */
export function toRenderable(entry: DiaryEntry): RenderableDiary | null {
  if (entry.date === undefined || entry.diaryId === undefined) return null
  return { date: entry.date, diaryId: entry.diaryId }
}

export function renderTemplate(template: string, diary: RenderableDiary, userId: UserId, token: string): RenderedRequest {
  // Function replacers keep `$` sequences in the token literal.
  const content = template
    .replaceAll(DIARY_ID_PLACEHOLDER, () => String(diary.diaryId))
    .replaceAll(TOKEN_PLACEHOLDER, () => token)
    .replace(DATE_FIELD, () => `"date": "${diary.date}"`)
    .replace(USER_ID_FIELD, () => `"userId": ${userId}`)

  return {
    date: diary.date,
    fileName: artifactFileName(diary.date),
    content,
  }
}

export class TemplateProcessor {
  readonly templatePath: string
  private readonly template: string
  private readonly token: string

  constructor(templatePath: string, template: string, token: string) {
    this.templatePath = templatePath
    this.template = template
    this.token = token
  }

  static async load(templatePath: string, token: string): Promise<TemplateProcessor> {
    try {
      const template = await fs.readFile(templatePath, 'utf8')
      logger.debug('Template loaded', { path: templatePath, length: template.length })
      return new TemplateProcessor(templatePath, template, token)
    }
    catch (error) {
      throw new TemplateIOError('Error reading template file', templatePath, error)
    }
  }

  render(diary: RenderableDiary, userId: UserId): RenderedRequest {
    return renderTemplate(this.template, diary, userId, this.token)
  }

  /** Writes the artifact and returns its path; an existing file for the same date is replaced. */
  async write(rendered: RenderedRequest, outputDir: string): Promise<string> {
    const outputPath = path.join(outputDir, rendered.fileName)
    try {
      await fs.writeFile(outputPath, rendered.content, 'utf8')
    }
    catch (error) {
      throw new TemplateIOError('Error writing output file', outputPath, error)
    }
    logger.info('Created HTTP request file', { path: outputPath })
    return outputPath
  }
}
