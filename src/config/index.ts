import path from 'node:path'
import dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

export const DEFAULT_API_BASE_URL = 'https://app.woffu.com/api'
export const DEFAULT_TEMPLATE_PATH = path.join('templates', 'template.http')

const optionalString = z.preprocess((value) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}, z.string().optional())

const boolSchema = (defaultValue: boolean) => z.preprocess((value) => {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (normalized === '') return undefined
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  }
  return value
}, z.boolean().default(defaultValue))

const integerSchema = (defaultValue: number, minValue: number) => z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) return undefined
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return value
}, z.number().int().min(minValue).default(defaultValue))

const logLevelSchema = z.preprocess((value) => {
  if (typeof value === 'string') return value.toLowerCase()
  return value
}, z.enum(['debug', 'info', 'warn', 'error']).default('info'))

export const transportSchema = z.enum(['fetch', 'curl'])
export type DispatchTransport = z.infer<typeof transportSchema>

const envSchema = z.object({
  API_BASE_URL: z.string().url().default(DEFAULT_API_BASE_URL),
  API_TOKEN: optionalString,
  DATA_PATH: z.string().default('.data'),
  TEMPLATE_PATH: optionalString,
  OUTPUT_DIR: optionalString,
  REQUEST_DELAY_MS: integerSchema(1000, 0),
  TLS_INSECURE: boolSchema(false),
  DISPATCH_TRANSPORT: z.preprocess((value) => {
    if (typeof value === 'string') return value.trim().toLowerCase() || undefined
    return value
  }, transportSchema.default('fetch')),
  LOG_LEVEL: logLevelSchema,
  LOG_SUMMARY_PATH: optionalString,
  LOG_DETAIL_PATH: optionalString,
  TZ: optionalString,
})

export type AppConfig = z.infer<typeof envSchema> & {
  templatePath: string
  requestsPath: string
  logSummaryPath: string
  logDetailPath: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env)
  const dataPath = parsed.DATA_PATH
  const logsPath = path.join(dataPath, 'logs')

  return {
    ...parsed,
    API_BASE_URL: parsed.API_BASE_URL.replace(/\/+$/, ''),
    templatePath: parsed.TEMPLATE_PATH ?? DEFAULT_TEMPLATE_PATH,
    requestsPath: path.join(dataPath, 'requests'),
    logSummaryPath: parsed.LOG_SUMMARY_PATH ?? path.join(logsPath, 'summary.log'),
    logDetailPath: parsed.LOG_DETAIL_PATH ?? path.join(logsPath, 'detail.log'),
  }
}
