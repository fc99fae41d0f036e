/* eslint-disable no-console */
import { readFile } from 'node:fs/promises'
import { createConsoleLogger, parseLocationList, type Location } from '@gas-monitor/pipeline-common'
import { STDOUT_TARGET, generateEvents, type GeneratorConfig } from './generator'
import { createReadingService, startReadingServer } from './reading-server'

const usage = `Usage: event-generator [options]

Options:
  --count <number>            Number of readings to generate (default: 1000)
  --output <file|->           Output NDJSON file, "-" for stdout (default: events.ndjson)
  --locations <file>          Known locations JSON (default: locations.json)
  --seed <number>             RNG seed for reproducible output
  --duplicate-ratio <ratio>   Share of redelivered readings, 0 to 1 (default: 0)
  --invalid-ratio <ratio>     Share of readings at unknown locations, 0 to 1 (default: 0)
  --realtime                  Pace readings by their timestamps
  --serve <host:port>         Serve readings over gRPC instead of writing a file
  -h, --help                  Show this help message
`

interface CliOptions {
  eventCount: number
  outputFile: string
  locationsFile: string
  seed?: number
  duplicateRatio: number
  invalidRatio: number
  realtime: boolean
  serveAddress?: string
}

const parseArgs = (argv: string[]): CliOptions => {
  const options: CliOptions = {
    eventCount: 1000,
    outputFile: 'events.ndjson',
    locationsFile: 'locations.json',
    duplicateRatio: 0,
    invalidRatio: 0,
    realtime: false,
  }

  const getValue = (index: number): string => {
    const value = argv[index]
    if (value == null) {
      throw new Error('Missing value for argument')
    }
    return value
  }

  const getNumber = (index: number, flag: string): number => {
    const value = Number(getValue(index))
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid ${flag} value`)
    }
    return value
  }

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]
    if (arg === '--help' || arg === '-h') {
      console.log(usage)
      process.exit(0)
    }

    if (arg === '--count') {
      options.eventCount = Math.trunc(getNumber(i + 1, arg))
      i += 1
      continue
    }

    if (arg === '--output') {
      options.outputFile = getValue(i + 1)
      i += 1
      continue
    }

    if (arg === '--locations') {
      options.locationsFile = getValue(i + 1)
      i += 1
      continue
    }

    if (arg === '--seed') {
      options.seed = Math.trunc(getNumber(i + 1, arg))
      i += 1
      continue
    }

    if (arg === '--duplicate-ratio') {
      options.duplicateRatio = getNumber(i + 1, arg)
      i += 1
      continue
    }

    if (arg === '--invalid-ratio') {
      options.invalidRatio = getNumber(i + 1, arg)
      i += 1
      continue
    }

    if (arg === '--realtime') {
      options.realtime = true
      continue
    }

    if (arg === '--serve') {
      options.serveAddress = getValue(i + 1)
      i += 1
      continue
    }

    throw new Error(`Unknown argument: ${arg}`)
  }

  return options
}

const loadLocations = async (filePath: string): Promise<Location[]> => {
  const contents = await readFile(filePath, 'utf8')
  const raw: unknown = JSON.parse(contents)
  return parseLocationList(raw)
}

const serve = async (address: string, config: GeneratorConfig, realtime: boolean): Promise<void> => {
  const logger = createConsoleLogger('event-generator')
  const { server, port } = await startReadingServer(
    address,
    createReadingService(config, { realtime, logger })
  )
  logger.info(`Reading service running on port ${port}`)

  const shutdown = (): void => {
    logger.info('Shutting down reading service...')
    server.tryShutdown((error) => {
      if (error) {
        logger.error(`Failed to shut down cleanly: ${error.message}`)
        process.exit(1)
      }
      process.exit(0)
    })
  }

  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

const run = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2))
  const config: GeneratorConfig = {
    eventCount: options.eventCount,
    locations: await loadLocations(options.locationsFile),
    seed: options.seed,
    duplicateRatio: options.duplicateRatio,
    invalidRatio: options.invalidRatio,
  }

  if (options.serveAddress != null) {
    await serve(options.serveAddress, config, options.realtime)
    return
  }

  await generateEvents(config, { outputFile: options.outputFile, realtime: options.realtime })
  if (options.outputFile !== STDOUT_TARGET) {
    console.log(`Generated ${config.eventCount} readings to ${options.outputFile}`)
  }
}

run().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error)
  console.error(message)
  console.error('Use --help to see valid options.')
  process.exitCode = 1
})
