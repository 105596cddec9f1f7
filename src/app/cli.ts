import { Command, InvalidArgumentError, Option } from 'commander'
import { transportSchema } from '../config/index.js'
import type { App, CommonOptions, MonthOptions, RunOptions } from './App.js'

function integerOption(min: number, max: number) {
  return (value: string): number => {
    const parsed = Number(value)
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Expected an integer between ${min} and ${max}.`)
    }
    return parsed
  }
}

function addCommonOptions(command: Command): Command {
  return command
    .option('-t, --token <token>', 'JWT bearer token for the Woffu API (defaults to API_TOKEN)')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-d, --debug', 'Enable debug logging')
    .option('--insecure', 'Skip TLS certificate verification')
}

function addMonthOptions(command: Command): Command {
  return command
    .option('-y, --year <year>', 'Year to check (defaults to the current year)', integerOption(1, 9999))
    .option('-m, --month <month>', 'Month to check (defaults to the current month)', integerOption(1, 12))
}

export type CommandHandlers = Pick<App, 'run' | 'whoami' | 'diaries' | 'users'>

export function buildProgram(app: CommandHandlers): Command {
  const program = new Command()

  program
    .name('flexday-filler')
    .description('Generate Woffu requests that fill unclocked flexible-schedule days')
    .version('0.1.0')

  const run = program
    .command('run', { isDefault: true })
    .description('Find unfilled flexible-schedule days and write one request file per day')
  addCommonOptions(run)
  addMonthOptions(run)
  run
    .option('--template <path>', 'Path to the HTTP template file')
    .option('-o, --output-dir <dir>', 'Directory where request files are written')
    .option('-e, --execute', 'Send the generated requests')
    .addOption(new Option('--transport <kind>', 'How requests are sent').choices(transportSchema.options))
    .option('--delay <ms>', 'Pause between sent requests in milliseconds', integerOption(0, 600_000))
    .action(async (options: RunOptions) => {
      await app.run(options)
    })

  const whoami = program
    .command('whoami')
    .description('Print the user id the token belongs to')
  addCommonOptions(whoami)
    .action(async (options: CommonOptions) => {
      await app.whoami(options)
    })

  const diaries = program
    .command('diaries')
    .description('List a month of diaries and how each one is classified')
  addCommonOptions(diaries)
  addMonthOptions(diaries)
    .action(async (options: MonthOptions) => {
      await app.diaries(options)
    })

  const users = program
    .command('users')
    .description('List the users visible to the token')
  addCommonOptions(users)
    .action(async (options: CommonOptions) => {
      await app.users(options)
    })

  return program
}
