#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander'
import { logger } from '@plate-designer/logger'
import { errorMessage } from '@plate-designer/utils'
import { App, formatDevices } from './app.js'

const program = new Command()

const VALID_COMMANDS = new Set(['start-server', 'list-devices'])

program
  .name('plate-designer')
  .description('Layout validation and device discovery for openHASP plates')
  .version('0.1.0')

function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port <= 0 || port >= 65536) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.')
  }
  return port
}

function parseOrigins(value: string): string[] {
  return value
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean)
}

// plate-designer start-server --host 0.0.0.0 --port 8000
program
  .command('start-server')
  .description('Start the HTTP API')
  .option('--host <host>', 'Interface to bind', '0.0.0.0')
  .option('--port <port>', 'Port to bind', parsePort, 8000)
  .option('--origins <origins>', 'Comma-separated CORS origins', parseOrigins, [
    'http://localhost:3000',
  ])
  .action(async (opts: { host: string; port: number; origins: string[] }) => {
    const server = await App.startServer(`${opts.host}:${opts.port}`, opts.origins)

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down`)
      server.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error(`shutdown failed: ${errorMessage(err)}`)
          process.exit(1)
        },
      )
    }
    process.once('SIGINT', shutdown)
    process.once('SIGTERM', shutdown)
  })

// plate-designer list-devices
program
  .command('list-devices')
  .description('Discover display plates in Home Assistant and print them')
  .action(async () => {
    const devices = await App.listDevices()
    console.log(formatDevices(devices))
  })

const maybeCommand = process.argv[2]

// Only treat it as a command if it's not an option (doesn't start with "-")
if (maybeCommand && !maybeCommand.startsWith('-') && !VALID_COMMANDS.has(maybeCommand)) {
  console.error(
    `Unknown command: "${maybeCommand}".` +
      `\nValid commands are: ${Array.from(VALID_COMMANDS).join(', ')}.`,
  )

  process.exit(1)
}

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.fatal(errorMessage(err))
  process.exit(1)
})
