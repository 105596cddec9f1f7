import { afterEach, describe, expect, it, vi } from 'vitest'
import { formatLine, logger, registerSecret, setLogLevel } from './logger.js'

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info')
    vi.restoreAllMocks()
  })

  it('formats metadata as compact JSON after the message', () => {
    const line = formatLine('info', 'Diaries filtered', { total: 31, actionable: 2 }, false)
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[info\] Diaries filtered \| \{"total":31,"actionable":2\}$/)
  })

  it('masks registered secrets', () => {
    registerSecret('test-secret-token')
    const line = formatLine('debug', 'Bearer test-secret-token', { header: 'Bearer test-secret-token' }, false)
    expect(line).toContain('] [debug] Bearer [redacted] | {"header":"Bearer [redacted]"}')
  })

  it('serialises errors with their cause', () => {
    const error = new Error('outer', { cause: new Error('inner') })
    const line = formatLine('error', 'Fatal error', { error }, false)
    expect(line).toContain('"name":"Error","message":"outer"')
    expect(line).toContain('"cause":{"name":"Error","message":"inner"')
  })

  it('drops messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    setLogLevel('warn')

    logger.info('hidden')
    logger.warn('shown')

    expect(log).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn.mock.calls[0][0]).toMatch(/\[warn\] shown$/)
  })
})
