import { STATUS_CODES } from 'node:http'
import type { ParsedRequest, RawResponse, RequestDispatcher } from '../../core/requests/types.js'
import { asErrorMessage } from '../../core/errors.js'
import type { HttpResponse, HttpTransport } from './transport.js'

/** HTTP/2 responses carry no reason phrase; the standard one stands in. */
function reasonPhrase(response: HttpResponse): string {
  return response.statusText || STATUS_CODES[response.status] || ''
}

export async function renderRawResponse(response: HttpResponse): Promise<string> {
  const lines = [`HTTP/1.1 ${response.status} ${reasonPhrase(response)}`.trimEnd()]
  response.headers.forEach((value, key) => {
    lines.push(`${key}: ${value}`)
  })
  const body = await response.text()
  return `${lines.join('\r\n')}\r\n\r\n${body}`
}

/** Sends parsed requests with fetch and reports them the way `curl -i` would. */
export class FetchDispatcher implements RequestDispatcher {
  private readonly transport: HttpTransport

  constructor(transport: HttpTransport) {
    this.transport = transport
  }

  async dispatch(request: ParsedRequest): Promise<RawResponse> {
    const headers: Record<string, string> = {}
    for (const [name, value] of request.headers) {
      headers[name] = value
    }

    const hasBody = request.method !== 'GET' && request.method !== 'HEAD'
    try {
      const response = await this.transport(request.url, {
        method: request.method,
        headers,
        body: hasBody ? request.body : undefined,
        // A 3xx is the answer to report, not a hop to take.
        redirect: 'manual',
      })
      return { exitCode: 0, stdout: await renderRawResponse(response), stderr: '' }
    }
    catch (error) {
      return { exitCode: 1, stdout: '', stderr: asErrorMessage(error) }
    }
  }
}
