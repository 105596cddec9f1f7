import path from 'node:path'
import { setTimeout as sleep } from 'node:timers/promises'
import { loadConfig } from '../config/index.js'
import type { AppConfig, DispatchTransport } from '../config/index.js'
import { ConfigError, AuthResolutionError } from '../core/errors.js'
import { classifyDiaries } from '../core/diaries/filter.js'
import { FillService } from '../core/fill/service.js'
import { formatClassificationLine, formatExecutionLine, formatSummaryLines } from '../core/fill/format.js'
import { RequestExecutor } from '../core/requests/executor.js'
import { TemplateProcessor } from '../core/requests/template.js'
import type { RequestDispatcher } from '../core/requests/types.js'
import { CurlDispatcher } from '../integrations/curl/dispatcher.js'
import { FetchDispatcher } from '../integrations/http/dispatcher.js'
import { createFetchTransport } from '../integrations/http/transport.js'
import type { HttpTransport } from '../integrations/http/transport.js'
import { WoffuClient } from '../integrations/woffu/client.js'
import { configureLogger, logger, registerSecret } from '../utils/logger.js'
import type { LogLevel } from '../utils/logger.js'
import { getLocalDate, getLocalYearMonth, runStamp } from '../utils/time.js'
import type { RunSummary } from '../types/index.js'

export interface CommonOptions {
  token?: string
  verbose?: boolean
  debug?: boolean
  insecure?: boolean
}

export interface MonthOptions extends CommonOptions {
  year?: number
  month?: number
}

export interface RunOptions extends MonthOptions {
  template?: string
  outputDir?: string
  execute?: boolean
  transport?: DispatchTransport
  delay?: number
}

interface Session {
  client: WoffuClient
  transport: HttpTransport
  insecureTls: boolean
}

export class App {
  private readonly config: AppConfig

  constructor(config: AppConfig = loadConfig()) {
    this.config = config
  }

  async run(options: RunOptions): Promise<RunSummary> {
    await this.setupLogging(options)
    const token = this.resolveToken(options)
    const templatePath = options.template ?? this.config.templatePath
    const templates = await TemplateProcessor.load(templatePath, token)
    const session = this.openSession(token, options)
    const { year, month } = this.resolveMonth(options)
    const outputDir = options.outputDir
      ?? this.config.OUTPUT_DIR
      ?? path.join(this.config.requestsPath, `requests_${runStamp()}`)

    const transportKind = options.transport ?? this.config.DISPATCH_TRANSPORT
    const service = new FillService({
      client: session.client,
      templates,
      executor: new RequestExecutor(this.createDispatcher(transportKind, session)),
      delayMs: options.delay ?? this.config.REQUEST_DELAY_MS,
      today: () => getLocalDate(new Date(), this.config.TZ),
      sleep: async (ms) => {
        await sleep(ms)
      },
    })

    logger.debug('Run configuration', {
      template: templatePath,
      outputDir,
      year,
      month,
      execute: options.execute === true,
      transport: transportKind,
      insecureTls: session.insecureTls,
    })

    const summary = await service.run({
      year,
      month,
      outputDir,
      execute: options.execute === true,
    })

    if (summary.status === 'completed') {
      logger.info('Summary')
      for (const line of formatSummaryLines(summary)) {
        logger.info(`- ${line}`)
      }
      for (const result of summary.results) {
        logger.info(formatExecutionLine(result))
      }
    }
    return summary
  }

  async whoami(options: CommonOptions): Promise<number> {
    await this.setupLogging(options)
    const { client } = this.openSession(this.resolveToken(options), options)
    const userId = await client.resolveUserId()
    if (userId === null) {
      throw new AuthResolutionError()
    }
    console.log(String(userId))
    return userId
  }

  async diaries(options: MonthOptions): Promise<void> {
    await this.setupLogging(options)
    const { client } = this.openSession(this.resolveToken(options), options)
    const userId = await client.resolveUserId()
    if (userId === null) {
      throw new AuthResolutionError()
    }
    const { year, month } = this.resolveMonth(options)
    const entries = await client.fetchMonthlyDiaries(userId, year, month)
    const today = getLocalDate(new Date(), this.config.TZ)
    for (const item of classifyDiaries(entries, today)) {
      console.log(formatClassificationLine(item))
    }
  }

  async users(options: CommonOptions): Promise<void> {
    await this.setupLogging(options)
    const { client } = this.openSession(this.resolveToken(options), options)
    const users = await client.listUsers()
    for (const user of users) {
      const name = [user.firstName, user.lastName].filter(Boolean).join(' ')
      console.log([user.id, name, user.email].filter(Boolean).join('\t'))
    }
  }

  private async setupLogging(options: CommonOptions): Promise<void> {
    let level: LogLevel = this.config.LOG_LEVEL
    if (options.debug) level = 'debug'
    else if (options.verbose) level = 'info'

    await configureLogger({
      level,
      summaryPath: this.config.logSummaryPath,
      detailPath: this.config.logDetailPath,
    })
  }

  private resolveToken(options: CommonOptions): string {
    const token = options.token?.trim() || this.config.API_TOKEN?.trim()
    if (!token) {
      throw new ConfigError('A bearer token is required (--token or API_TOKEN)')
    }
    registerSecret(token)
    return token
  }

  private resolveMonth(options: MonthOptions): { year: number, month: number } {
    const current = getLocalYearMonth(new Date(), this.config.TZ)
    return {
      year: options.year ?? current.year,
      month: options.month ?? current.month,
    }
  }

  private openSession(token: string, options: CommonOptions): Session {
    const insecureTls = options.insecure === true || this.config.TLS_INSECURE
    const transport = createFetchTransport({ insecureTls })
    const client = new WoffuClient({
      token,
      baseUrl: this.config.API_BASE_URL,
      transport,
    })
    return { client, transport, insecureTls }
  }

  private createDispatcher(kind: DispatchTransport, session: Session): RequestDispatcher {
    if (kind === 'curl') {
      return new CurlDispatcher({ insecureTls: session.insecureTls })
    }
    return new FetchDispatcher(session.transport)
  }
}
