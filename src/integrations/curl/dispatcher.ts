import { execFile } from 'node:child_process'
import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import type { ParsedRequest, RawResponse, RequestDispatcher } from '../../core/requests/types.js'
import { logger } from '../../utils/logger.js'

export interface CurlDispatcherOptions {
  binary?: string
  insecureTls?: boolean
  /** Directory the per-request body file is created under. Defaults to the OS temp dir. */
  tempRoot?: string
}

export function buildCurlArgs(request: ParsedRequest, bodyPath: string, insecureTls = false): string[] {
  const args = ['-s', '-S', '-i', '-X', request.method]
  if (insecureTls) args.push('-k')
  for (const [name, value] of request.headers) {
    args.push('-H', `${name}: ${value}`)
  }
  args.push('--data-binary', `@${bodyPath}`, request.url)
  return args
}

function run(binary: string, args: string[]): Promise<RawResponse> {
  return new Promise((resolve) => {
    execFile(binary, args, { encoding: 'utf8', maxBuffer: 10 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ exitCode: 0, stdout, stderr })
        return
      }
      const exitCode = typeof error.code === 'number' ? error.code : 1
      resolve({ exitCode, stdout, stderr: stderr || error.message })
    })
  })
}

/** Sends parsed requests through the curl binary, passing the body through a temp file. */
export class CurlDispatcher implements RequestDispatcher {
  private readonly binary: string
  private readonly insecureTls: boolean
  private readonly tempRoot: string

  constructor(options: CurlDispatcherOptions = {}) {
    this.binary = options.binary ?? 'curl'
    this.insecureTls = options.insecureTls === true
    this.tempRoot = options.tempRoot ?? os.tmpdir()
  }

  async dispatch(request: ParsedRequest): Promise<RawResponse> {
    const tempDir = await fs.mkdtemp(path.join(this.tempRoot, 'flexday-body-'))
    try {
      const bodyPath = path.join(tempDir, 'body')
      await fs.writeFile(bodyPath, request.body, 'utf8')
      const args = buildCurlArgs(request, bodyPath, this.insecureTls)
      logger.debug('Executing curl', { method: request.method, url: request.url })
      return await run(this.binary, args)
    }
    finally {
      await fs.rm(tempDir, { recursive: true, force: true })
    }
  }
}
