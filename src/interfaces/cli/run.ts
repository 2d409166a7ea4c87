import { resolve } from 'node:path'
import yargs, { type Argv } from 'yargs'
import { Bridge } from '../../core/bridge.js'
import { ProducerError } from '../../core/errors.js'
import type { Subscribable } from '../../core/ports/subscribable.js'
import { loadAppConfig, parseExtensionList, type AppConfig } from '../../config/appConfig.js'
import { fileWatchSource } from '../../infrastructure/sources/fileWatchSource.js'
import { intervalSource } from '../../infrastructure/sources/intervalSource.js'
import type { IO } from './io.js'

/**
 * CLI adapter: parse commands → build a bridge → print its stream
 *
 * Commands:
 * - tick [--interval <ms>] [--count <n>]
 * - watch [dir] [--interval <ms>] [--ext .md,.ts] [--count <n>] [--initial]
 *
 * Each event is written to stdout as one JSON line.
 */
export async function runCli(opts: {
  argv: string[]
  cwd: string
  io: IO
  env?: Record<string, string | undefined>
}): Promise<number> {
  const { argv, cwd, io } = opts

  let config: AppConfig
  try {
    config = loadAppConfig(opts.env ?? process.env)
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }

  const parser = yargs(argv)
    .scriptName('push-bridge')
    .command(
      'tick',
      'Print a numbered tick on an interval',
      (y: Argv) =>
        y
          .option('interval', { type: 'number', describe: 'milliseconds between ticks' })
          .option('count', { type: 'number', describe: 'stop after this many ticks' }),
      async (args) => {
        const bridge = Bridge.create(
          intervalSource,
          { intervalMs: args.interval ?? config.tickIntervalMs },
          { debug: config.debug }
        )
        await printStream(bridge, io, args.count)
      }
    )
    .command(
      'watch [dir]',
      'Print file changes under a directory',
      (y: Argv) =>
        y
          .positional('dir', { type: 'string', describe: 'directory to watch (default: cwd)' })
          .option('interval', { type: 'number', describe: 'milliseconds between polls' })
          .option('ext', { type: 'string', describe: 'comma-separated extensions, e.g. .md,.ts' })
          .option('count', { type: 'number', describe: 'stop after this many changes' })
          .option('initial', { type: 'boolean', default: false, describe: 'report existing files as created' }),
      async (args) => {
        const bridge = Bridge.create(
          fileWatchSource,
          {
            baseDir: resolve(cwd, args.dir ?? '.'),
            intervalMs: args.interval ?? config.pollIntervalMs,
            includeExtensions: args.ext !== undefined ? parseExtensionList(args.ext) : config.watchExtensions,
            emitInitial: args.initial
          },
          { debug: config.debug }
        )
        await printStream(bridge, io, args.count)
      }
    )
    .demandCommand(1, 'Specify a command: tick or watch')
    .strict()
    .exitProcess(false)
    .fail((msg, err) => {
      throw err ?? new Error(msg)
    })
    .help()

  try {
    await parser.parseAsync()
    return 0
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}

/**
 * Activate the bridge and write events until `count` is reached or the
 * stream terminates. A producer failure rejects as a `ProducerError`.
 */
function printStream<T>(bridge: Bridge<T>, io: IO, count: number | undefined): Promise<void> {
  if (count !== undefined && (!Number.isInteger(count) || count <= 0)) {
    return Promise.reject(new Error(`--count must be a positive integer, got ${count}`))
  }

  return new Promise<void>((resolvePrint, rejectPrint) => {
    let seen = 0
    const stream: Subscribable<T> = bridge.stream()
    const subscription = stream.subscribe(
      (value) => {
        seen++
        io.stdout(`${JSON.stringify(value)}\n`)
        if (count !== undefined && seen >= count) {
          subscription.cancel()
          bridge.deactivate()
          resolvePrint()
        }
      },
      (error) => {
        bridge.deactivate()
        rejectPrint(error instanceof ProducerError ? error : new ProducerError(error))
      },
      () => {
        bridge.deactivate()
        resolvePrint()
      }
    )
    bridge.activate()
  })
}
