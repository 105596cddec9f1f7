import path from 'node:path'
import type { ExecutionResult, RunSummary } from '../../types/index.js'
import type { DiaryClassification } from '../diaries/types.js'

export function formatSummaryLines(summary: RunSummary): string[] {
  const lines = [
    `User ID: ${summary.userId}`,
    `Month: ${summary.year}-${String(summary.month).padStart(2, '0')}`,
    `Days in diary: ${summary.totalDays}`,
    `Flexible schedule days: ${summary.actionableDays}`,
    `HTTP request files created: ${summary.artifacts.length}`,
  ]
  if (summary.skipped > 0) {
    lines.push(`Skipped (no diary id): ${summary.skipped}`)
  }
  if (summary.outputDir) {
    lines.push(`Output directory: ${summary.outputDir}`)
  }
  if (summary.executed) {
    lines.push(`Successfully executed: ${summary.succeeded}/${summary.results.length}`)
    if (summary.failed > 0) {
      lines.push(`Failed: ${summary.failed}/${summary.results.length}`)
    }
  }
  return lines
}

export function formatExecutionLine(result: ExecutionResult): string {
  const name = path.basename(result.artifactPath)
  return `${result.success ? 'ok' : 'failed'} ${name}`
}

export function formatClassificationLine(item: DiaryClassification): string {
  const date = item.entry.date ?? '(no date)'
  const codes = `in=${JSON.stringify(item.entry.checkIn ?? null)} out=${JSON.stringify(item.entry.checkOut ?? null)}`
  const missing = item.missing ? ` missing=${item.missing.join(',')}` : ''
  return `${date}  ${item.verdict.padEnd(14)} ${codes}${missing}`
}
