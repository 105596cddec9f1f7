import { Agent, fetch as undiciFetch } from 'undici'
import { logger } from '../../utils/logger.js'

export interface HttpRequest {
  method: string
  headers: Record<string, string>
  body?: string
  redirect?: 'follow' | 'manual' | 'error'
}

/** The slice of a fetch `Response` the rest of the code reads. */
export interface HttpResponse {
  status: number
  statusText: string
  ok: boolean
  headers: {
    forEach(callback: (value: string, key: string) => void): void
  }
  text(): Promise<string>
}

export type HttpTransport = (url: string, request: HttpRequest) => Promise<HttpResponse>

export interface TransportOptions {
  /** Skips TLS certificate verification. Off unless explicitly requested. */
  insecureTls?: boolean
}

export function createFetchTransport(options: TransportOptions = {}): HttpTransport {
  if (!options.insecureTls) {
    return (url, request) => fetch(url, request)
  }

  logger.warn('TLS certificate verification is disabled for this run')
  const dispatcher = new Agent({ connect: { rejectUnauthorized: false } })
  return (url, request) => undiciFetch(url, { ...request, dispatcher })
}
