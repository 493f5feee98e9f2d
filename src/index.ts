import { Command } from 'commander'
import { registerListenCommand } from './commands/listen'
import { logger } from './utils/logger'
import { isColorMode, setColorMode } from './utils/colors'

const VERSION: string = '0.1.0'

function main(): void {
  const program: Command = new Command()
  program.name('queue-listener')
  program.description('Supervise a queue worker one job at a time and restart it until a memory ceiling is reached')
  program.version(VERSION, '-v, --version', 'output the version number')
  // Global options (parsed by Commander, but applied pre-parse so early logs honor them)
  program.option('--verbose', 'Verbose output')
  program.option('--quiet', 'Error-only output (suppresses info/warn)')
  program.option('--no-emoji', 'Disable emoji prefixes for logs')
  program.option('--timestamps', 'Prefix human logs and JSON with ISO timestamps')
  program.option('--color <mode>', 'Color mode: auto|always|never', 'auto')
  if (process.argv.includes('--verbose')) logger.setLevel('debug')
  if (process.argv.includes('--quiet')) logger.setLevel('error')
  if (process.argv.includes('--no-emoji')) logger.setNoEmoji(true)
  if (process.argv.includes('--timestamps')) logger.setTimestamps(true)
  if (process.argv.includes('--json')) {
    logger.setJsonOnly(true)
    process.env.QL_JSON = '1'
  }
  const colorIx: number = process.argv.findIndex((a: string) => a === '--color')
  const colorArg: string | undefined = colorIx !== -1 ? process.argv[colorIx + 1] : undefined
  setColorMode(colorArg !== undefined && isColorMode(colorArg) ? colorArg : 'auto')
  registerListenCommand(program)
  program.parseAsync(process.argv)
    .then(() => {})
    .catch((err: unknown) => {
      const message: string = err instanceof Error ? err.message : String(err)
      // eslint-disable-next-line no-console
      console.error(`Error: ${message}`)
      process.exitCode = 1
    })
}

main()
