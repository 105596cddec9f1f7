import fs from 'node:fs'
import path from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogMeta = Record<string, unknown> | undefined

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

const REDACTED = '[redacted]'

let currentLevel: LogLevel = 'info'
let summaryStream: fs.WriteStream | null = null
let detailStream: fs.WriteStream | null = null
const secrets = new Set<string>()

export interface LoggerOptions {
  level: LogLevel
  /** Omit to keep console-only output. */
  summaryPath?: string
  detailPath?: string
}

export async function configureLogger(options: LoggerOptions): Promise<void> {
  currentLevel = options.level

  summaryStream?.end()
  detailStream?.end()
  summaryStream = options.summaryPath ? await openAppendStream(options.summaryPath) : null
  detailStream = options.detailPath ? await openAppendStream(options.detailPath) : null
}

async function openAppendStream(filePath: string): Promise<fs.WriteStream> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
  return fs.createWriteStream(filePath, { flags: 'a' })
}

export async function closeLogger(): Promise<void> {
  await Promise.all([endStream(summaryStream), endStream(detailStream)])
  summaryStream = null
  detailStream = null
}

function endStream(stream: fs.WriteStream | null): Promise<void> {
  if (!stream) return Promise.resolve()
  return new Promise(resolve => stream.end(() => resolve()))
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

/** Masks every later occurrence of `value` in emitted lines. */
export function registerSecret(value: string): void {
  if (value.length > 0) secrets.add(value)
}

function redact(line: string): string {
  let result = line
  for (const secret of secrets) {
    result = result.split(secret).join(REDACTED)
  }
  return result
}

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] >= levelOrder[currentLevel]
}

function timestamp(): string {
  return new Date().toISOString()
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function serializeError(error: Error): Record<string, unknown> {
  const cause = error.cause
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    cause: cause instanceof Error ? serializeError(cause) : cause,
  }
}

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) return serializeError(value)
  if (value instanceof Map) return Object.fromEntries(value.entries())
  if (value instanceof Set) return Array.from(value.values())
  if (typeof value === 'bigint') return value.toString()
  return value
}

function safeJson(value: unknown, pretty: boolean): string {
  const seen = new WeakSet<object>()
  const replacer = (_key: string, val: unknown) => {
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return toSerializable(val)
  }
  return JSON.stringify(value, replacer, pretty ? 2 : 0)
}

function formatMeta(meta: LogMeta, detail: boolean): string | null {
  if (!meta) return null
  const payload = isRecord(meta) ? meta : { value: meta }
  const compact = safeJson(payload, false)
  if (!detail) return compact
  if (compact.length > 200 || compact.includes('\\n')) {
    return safeJson(payload, true)
  }
  return compact
}

function indentLines(value: string, prefix = '  '): string {
  return value
    .split('\n')
    .map(line => `${prefix}${line}`)
    .join('\n')
}

export function formatLine(level: LogLevel, message: string, meta: LogMeta, detail: boolean): string {
  const base = `[${timestamp()}] [${level}] ${message}`
  const metaText = formatMeta(meta, detail)
  if (!metaText) return redact(base)
  if (!detail || !metaText.includes('\n')) return redact(`${base} | ${metaText}`)
  return redact(`${base}\n${indentLines(metaText)}`)
}

function writeSummary(line: string, level: LogLevel): void {
  if (level === 'error') {
    console.error(line)
  }
  else if (level === 'warn') {
    console.warn(line)
  }
  else {
    console.log(line)
  }

  summaryStream?.write(`${line}\n`)
}

function writeDetail(line: string): void {
  detailStream?.write(`${line}\n`)
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (!shouldLog(level)) return
  writeSummary(formatLine(level, message, meta, false), level)
  if (detailStream) {
    writeDetail(formatLine(level, message, meta, true))
  }
}

export const logger = {
  debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
  info: (message: string, meta?: LogMeta) => log('info', message, meta),
  warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
  error: (message: string, meta?: LogMeta) => log('error', message, meta),
}
