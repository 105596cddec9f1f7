#!/usr/bin/env node
import { App } from './App.js'
import { buildProgram } from './cli.js'
import { closeLogger, logger } from '../utils/logger.js'

async function main(): Promise<void> {
  try {
    const program = buildProgram(new App())
    await program.parseAsync(process.argv)
  }
  catch (error) {
    logger.error('Fatal error', { error })
    process.exitCode = 1
  }
  finally {
    await closeLogger()
  }
}

main().catch((error) => {
  console.error(error)
  process.exitCode = 1
})
