import { describe, expect, it, vi } from 'vitest'
import type { RunSummary } from '../types/index.js'
import { buildProgram } from './cli.js'
import type { CommandHandlers } from './cli.js'

function createHandlers() {
  const handlers = {
    run: vi.fn(async (): Promise<RunSummary> => ({
      status: 'nothing-to-do',
      userId: 1,
      year: 2024,
      month: 3,
      totalDays: 0,
      actionableDays: 0,
      skipped: 0,
      artifacts: [],
      executed: false,
      results: [],
      succeeded: 0,
      failed: 0,
    })),
    whoami: vi.fn(async () => 1),
    diaries: vi.fn(async () => {}),
    users: vi.fn(async () => {}),
  } satisfies CommandHandlers
  return handlers
}

function parse(handlers: CommandHandlers, args: string[]) {
  const program = buildProgram(handlers)
  program.exitOverride()
  program.commands.forEach(command => command.exitOverride())
  program.configureOutput({ writeErr: () => {}, writeOut: () => {} })
  program.commands.forEach(command => command.configureOutput({ writeErr: () => {}, writeOut: () => {} }))
  return program.parseAsync(['node', 'flexday-filler', ...args])
}

describe('buildProgram', () => {
  it('runs the fill pipeline by default', async () => {
    const handlers = createHandlers()

    await parse(handlers, ['-t', 'test-token', '-y', '2024', '-m', '3', '--execute', '--transport', 'curl', '--delay', '0'])

    expect(handlers.run).toHaveBeenCalledTimes(1)
    expect(handlers.run.mock.calls[0]).toEqual([expect.objectContaining({
      token: 'test-token',
      year: 2024,
      month: 3,
      execute: true,
      transport: 'curl',
      delay: 0,
    })])
  })

  it('accepts the explicit run command with output and template paths', async () => {
    const handlers = createHandlers()

    await parse(handlers, ['run', '--template', 'my.http', '-o', 'out', '--insecure', '-d'])

    expect(handlers.run.mock.calls[0]).toEqual([expect.objectContaining({
      template: 'my.http',
      outputDir: 'out',
      insecure: true,
      debug: true,
    })])
  })

  it('rejects a month outside 1-12', async () => {
    const handlers = createHandlers()

    await expect(parse(handlers, ['run', '-m', '13'])).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    })
    expect(handlers.run).not.toHaveBeenCalled()
  })

  it('rejects an unknown transport', async () => {
    const handlers = createHandlers()

    await expect(parse(handlers, ['run', '--transport', 'wget'])).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    })
  })

  it('dispatches the inspection commands', async () => {
    const handlers = createHandlers()

    await parse(handlers, ['whoami', '-t', 'test-token'])
    await parse(handlers, ['diaries', '-m', '2'])
    await parse(handlers, ['users', '-v'])

    expect(handlers.whoami.mock.calls[0]).toEqual([expect.objectContaining({ token: 'test-token' })])
    expect(handlers.diaries.mock.calls[0]).toEqual([expect.objectContaining({ month: 2 })])
    expect(handlers.users.mock.calls[0]).toEqual([expect.objectContaining({ verbose: true })])
  })
})
