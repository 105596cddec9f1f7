export class ApiError extends Error {
  readonly status: number
  readonly body: string

  constructor(status: number, body: string, url: string) {
    super(`API error ${status} from ${url}`)
    this.name = 'ApiError'
    this.status = status
    this.body = body
  }
}

export class NetworkError extends Error {
  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Network error calling ${url}: ${reason}`, { cause })
    this.name = 'NetworkError'
  }
}

export class AuthResolutionError extends Error {
  constructor(message = 'Could not resolve user id from token or API') {
    super(message)
    this.name = 'AuthResolutionError'
  }
}

export class EmptyDiarySetError extends Error {
  constructor(year: number, month: number) {
    super(`No diaries found for ${year}-${String(month).padStart(2, '0')}`)
    this.name = 'EmptyDiarySetError'
  }
}

export class TemplateIOError extends Error {
  readonly path: string

  constructor(message: string, path: string, cause?: unknown) {
    super(`${message}: ${path}`, { cause })
    this.name = 'TemplateIOError'
    this.path = path
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
