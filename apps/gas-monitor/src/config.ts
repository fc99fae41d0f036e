import { LOG_LEVELS, isLogLevel, type LogLevel } from '@gas-monitor/pipeline-common'

/**
 * Configuration for one bounded gas-monitor run.
 */
export interface GasMonitorConfig {
  /** JSON file listing the known locations. */
  locationsFile: string
  /** NDJSON readings file, or "-" for stdin. */
  inputFile: string
  /** Reading service address; when set, readings are streamed over gRPC instead of read from `inputFile`. */
  grpcAddress?: string
  /** How long to process events for. */
  runTimeSeconds: number
  /** How long an event id is remembered for deduplication. */
  dedupTtlSeconds: number
  /** Width of each moving-average bin. */
  averagePeriodSeconds: number
  /** How long a bin is kept after its end before its average is final. */
  expirySeconds: number
  averagesOutputFile: string
  centroidOutputFile: string
  logLevel: LogLevel
  showHelp: boolean
}

/**
 * Invalid command line or configuration value.
 */
export class ConfigError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export const DEFAULT_CONFIG: GasMonitorConfig = {
  locationsFile: 'locations.json',
  inputFile: 'events.ndjson',
  runTimeSeconds: 60,
  dedupTtlSeconds: 10,
  averagePeriodSeconds: 10,
  expirySeconds: 30,
  averagesOutputFile: 'gas-averages.csv',
  centroidOutputFile: 'gas-centroid.csv',
  logLevel: 'info',
  showHelp: false,
}

export const usage = `Usage: gas-monitor [options]

Options:
  --locations <file>          Known locations JSON (default: ${DEFAULT_CONFIG.locationsFile})
  --input <file|->            NDJSON readings, "-" for stdin (default: ${DEFAULT_CONFIG.inputFile})
  --grpc-address <host:port>  Stream readings from a reading service instead of --input
  --run-time <seconds>        How long to process events (default: ${DEFAULT_CONFIG.runTimeSeconds})
  --dedup-ttl <seconds>       Deduplication window (default: ${DEFAULT_CONFIG.dedupTtlSeconds})
  --average-period <seconds>  Moving-average bin width (default: ${DEFAULT_CONFIG.averagePeriodSeconds})
  --expiry <seconds>          Bin retention before finalizing (default: ${DEFAULT_CONFIG.expirySeconds})
  --averages-output <file>    Averages CSV (default: ${DEFAULT_CONFIG.averagesOutputFile})
  --centroid-output <file>    Centroid CSV (default: ${DEFAULT_CONFIG.centroidOutputFile})
  --log-level <level>         ${LOG_LEVELS.join(' | ')} (default: ${DEFAULT_CONFIG.logLevel})
  -h, --help                  Show this help message
`

const requireValue = (value: string | undefined, flag: string): string => {
  if (value == null || value.length === 0) {
    throw new ConfigError(`Missing value for ${flag}`)
  }
  return value
}

const parseIntegerArg = (value: string, flag: string): number => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Invalid integer value for ${flag}: ${value}`)
  }
  return parsed
}

const parseLogLevel = (value: string): LogLevel => {
  if (!isLogLevel(value)) {
    throw new ConfigError(`Invalid log level: ${value}`)
  }
  return value
}

/**
 * Checks value ranges that argv parsing alone cannot.
 * @throws {ConfigError} When a duration is out of range.
 */
export const validateGasMonitorConfig = (config: GasMonitorConfig): GasMonitorConfig => {
  if (config.runTimeSeconds <= 0) {
    throw new ConfigError('--run-time must be a positive integer')
  }
  if (config.dedupTtlSeconds < 0) {
    throw new ConfigError('--dedup-ttl must be a non-negative integer')
  }
  if (config.averagePeriodSeconds <= 0) {
    throw new ConfigError('--average-period must be a positive integer')
  }
  if (config.expirySeconds <= 0) {
    throw new ConfigError('--expiry must be a positive integer')
  }
  return config
}

/**
 * Parses CLI arguments into a gas-monitor configuration.
 * @param argv CLI arguments (excluding node and script path).
 * @throws {ConfigError} When a flag is unknown, missing its value or out of range.
 */
export const parseGasMonitorArgs = (argv: string[]): GasMonitorConfig => {
  const config: GasMonitorConfig = { ...DEFAULT_CONFIG }

  for (let i = 0; i < argv.length; i += 1) {
    const flag = argv[i]
    const value = argv[i + 1]

    if (flag === '--help' || flag === '-h') {
      config.showHelp = true
    } else if (flag === '--locations') {
      config.locationsFile = requireValue(value, flag)
      i += 1
    } else if (flag === '--input') {
      config.inputFile = requireValue(value, flag)
      i += 1
    } else if (flag === '--grpc-address') {
      config.grpcAddress = requireValue(value, flag)
      i += 1
    } else if (flag === '--run-time') {
      config.runTimeSeconds = parseIntegerArg(requireValue(value, flag), flag)
      i += 1
    } else if (flag === '--dedup-ttl') {
      config.dedupTtlSeconds = parseIntegerArg(requireValue(value, flag), flag)
      i += 1
    } else if (flag === '--average-period') {
      config.averagePeriodSeconds = parseIntegerArg(requireValue(value, flag), flag)
      i += 1
    } else if (flag === '--expiry') {
      config.expirySeconds = parseIntegerArg(requireValue(value, flag), flag)
      i += 1
    } else if (flag === '--averages-output') {
      config.averagesOutputFile = requireValue(value, flag)
      i += 1
    } else if (flag === '--centroid-output') {
      config.centroidOutputFile = requireValue(value, flag)
      i += 1
    } else if (flag === '--log-level') {
      config.logLevel = parseLogLevel(requireValue(value, flag))
      i += 1
    } else {
      throw new ConfigError(`Unknown argument: ${flag}`)
    }
  }

  return validateGasMonitorConfig(config)
}
