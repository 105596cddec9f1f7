import fs from 'node:fs/promises'
import path from 'node:path'
import type { ExecutionResult } from '../../types/index.js'
import { asErrorMessage } from '../errors.js'
import { logger } from '../../utils/logger.js'
import { parseArtifact } from './parser.js'
import type { RawResponse, RequestDispatcher } from './types.js'

export const SUCCESS_MARKERS = ['200 OK', '201 Created', '204'] as const

/** Status lines of the leading header blocks; scanning stops where the body starts. */
function statusLines(output: string): string[] {
  const lines = output.split(/\r?\n/)
  const found: string[] = []
  let index = 0
  while (index < lines.length && lines[index].startsWith('HTTP/')) {
    found.push(lines[index])
    while (index < lines.length && lines[index] !== '') index++
    index++
  }
  return found
}

/** True when the transport exited cleanly and a status line carries a success marker. */
export function isSuccessfulResponse(response: RawResponse): boolean {
  if (response.exitCode !== 0) return false
  return statusLines(response.stdout)
    .some(line => SUCCESS_MARKERS.some(marker => line.includes(marker)))
}

export class RequestExecutor {
  private readonly dispatcher: RequestDispatcher

  constructor(dispatcher: RequestDispatcher) {
    this.dispatcher = dispatcher
  }

  async execute(artifactPath: string): Promise<ExecutionResult> {
    const name = path.basename(artifactPath)
    const fail = (responseOrError: string): ExecutionResult => ({ artifactPath, success: false, responseOrError })

    let text: string
    try {
      text = await fs.readFile(artifactPath, 'utf8')
    }
    catch (error) {
      logger.error('Could not read request file', { artifact: name, error: asErrorMessage(error) })
      return fail(`Could not read request file: ${asErrorMessage(error)}`)
    }

    const parsed = parseArtifact(text)
    if (!parsed.ok) {
      logger.error('Invalid HTTP request file', { artifact: name, error: parsed.error })
      return fail(parsed.message)
    }

    const { request } = parsed
    logger.debug('Dispatching request', {
      artifact: name,
      method: request.method,
      url: request.url,
      headers: request.headers.length,
    })

    let response: RawResponse
    try {
      response = await this.dispatcher.dispatch(request)
    }
    catch (error) {
      logger.error('Request dispatch threw', { artifact: name, error })
      return fail(asErrorMessage(error))
    }

    if (isSuccessfulResponse(response)) {
      return { artifactPath, success: true, responseOrError: response.stdout }
    }

    const diagnostic = response.stderr || response.stdout
    logger.error('Request failed', { artifact: name, exitCode: response.exitCode })
    return fail(diagnostic)
  }
}
