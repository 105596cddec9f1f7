import type { ApiUser, DiaryEntry, UserId } from '../../types/index.js'
import { ResponseCache } from '../../core/cache.js'
import { ApiError, NetworkError, asErrorMessage } from '../../core/errors.js'
import { resolveMonthWindow } from '../../core/diaries/month.js'
import type { DiaryClient } from '../../core/diaries/types.js'
import type { HttpResponse, HttpTransport } from '../http/transport.js'
import { logger } from '../../utils/logger.js'
import { buildApiHeaders } from './headers.js'
import { parseDiariesResponse, parseUser, parseUsers } from './schemas.js'
import { decodeUserIdClaim } from './token.js'

export interface WoffuCache {
  self: ResponseCache<ApiUser>
  users: ResponseCache<ApiUser[]>
  diaries: ResponseCache<DiaryEntry[]>
}

export function createWoffuCache(): WoffuCache {
  return {
    self: new ResponseCache<ApiUser>(),
    users: new ResponseCache<ApiUser[]>(),
    diaries: new ResponseCache<DiaryEntry[]>(),
  }
}

export interface WoffuClientOptions {
  token: string
  baseUrl: string
  transport: HttpTransport
  cache?: WoffuCache
}

export function monthlyDiariesCacheKey(userId: UserId, year: number, month: number): string {
  return `monthly_diaries_${userId}_${year}_${month}`
}

function preview(text: string): string {
  return text.length > 200 ? `${text.slice(0, 200)}...` : text
}

export class WoffuClient implements DiaryClient {
  readonly token: string
  private readonly baseUrl: string
  private readonly transport: HttpTransport
  private readonly cache: WoffuCache
  private userId: UserId | null = null

  constructor(options: WoffuClientOptions) {
    if (!options.token) {
      throw new Error('Bearer token is required for API authentication')
    }
    this.token = options.token
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.transport = options.transport
    this.cache = options.cache ?? createWoffuCache()
  }

  async resolveUserId(): Promise<UserId | null> {
    if (this.userId !== null) return this.userId

    const decoded = decodeUserIdClaim(this.token)
    if (decoded.ok) {
      logger.debug('User id read from token claim', { userId: decoded.userId })
      this.userId = decoded.userId
      return decoded.userId
    }

    logger.warn('Token claim unusable; asking the API for the current user', { reason: decoded.reason })
    try {
      const self = await this.fetchSelf()
      logger.info('User id retrieved from API', { userId: self.id })
      this.userId = self.id
      return self.id
    }
    catch (error) {
      logger.error('User lookup failed', { error: asErrorMessage(error) })
      return null
    }
  }

  async fetchSelf(): Promise<ApiUser> {
    return this.cache.self.remember('self', async () => {
      const payload = await this.getJson('/users/self')
      const user = parseUser(payload)
      if (!user) {
        throw new Error('User response has no usable id field')
      }
      return user
    })
  }

  async listUsers(): Promise<ApiUser[]> {
    return this.cache.users.remember('users', async () => parseUsers(await this.getJson('/users')))
  }

  async fetchMonthlyDiaries(userId: UserId, year: number, month: number): Promise<DiaryEntry[]> {
    const cacheKey = monthlyDiariesCacheKey(userId, year, month)
    const cached = this.cache.diaries.get(cacheKey)
    if (cached) {
      logger.debug('Monthly diaries served from cache', { cacheKey })
      return cached
    }

    const monthWindow = resolveMonthWindow(year, month)
    const query = new URLSearchParams({
      userId: String(userId),
      fromDate: monthWindow.from,
      toDate: monthWindow.to,
      pageSize: String(monthWindow.days),
      includeHourTypes: 'true',
      includeNotHourTypes: 'true',
      includeDifference: 'true',
    })
    const path = `/svc/core/diariesquery/users/${userId}/diaries/summary/presence?${query.toString()}`

    let payload: unknown
    try {
      payload = await this.getJson(path)
    }
    catch (error) {
      logger.error('Monthly diaries request failed', { userId, year, month, error: asErrorMessage(error) })
      return []
    }

    const diaries = parseDiariesResponse(payload)
    if (!diaries) {
      logger.error('Monthly diaries response has no diaries field', { userId, year, month })
      return []
    }

    logger.debug('Monthly diaries fetched', { userId, year, month, count: diaries.length })
    this.cache.diaries.set(cacheKey, diaries)
    return diaries
  }

  private async getJson(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`
    logger.debug('API request', { method: 'GET', url })

    let response: HttpResponse
    try {
      response = await this.transport(url, {
        method: 'GET',
        headers: buildApiHeaders(this.token),
      })
    }
    catch (error) {
      throw new NetworkError(url, error)
    }
    logger.debug('API response', { status: response.status, ok: response.ok, url })

    const text = await response.text()
    if (!response.ok) {
      throw new ApiError(response.status, text, url)
    }

    try {
      return JSON.parse(text)
    }
    catch {
      throw new ApiError(response.status, `Invalid JSON: ${preview(text)}`, url)
    }
  }
}
