/* eslint-disable no-console */
import { createConsoleLogger, type Logger } from '@gas-monitor/pipeline-common'
import { ConfigError, parseGasMonitorArgs, usage, type GasMonitorConfig } from './config'
import { FileLocationProvider } from './locations'
import { runGasMonitor } from './monitor'
import {
  AVERAGE_COLUMNS,
  CENTROID_COLUMNS,
  CsvOutput,
  toAverageWriter,
  toCentroidWriter,
} from './outputs/csv-output'
import type { EventReceiver } from './receivers/event-receiver'
import { GrpcReceiver } from './receivers/grpc-receiver'
import { NdjsonReceiver } from './receivers/ndjson-receiver'

const createReceiver = (config: GasMonitorConfig, logger: Logger): EventReceiver => {
  if (config.grpcAddress != null) {
    return new GrpcReceiver({ address: config.grpcAddress, logger })
  }
  return new NdjsonReceiver(config.inputFile, logger)
}

const run = async (): Promise<void> => {
  const config = parseGasMonitorArgs(process.argv.slice(2))
  if (config.showHelp) {
    console.log(usage)
    return
  }

  const createLogger = (scope: string): Logger => createConsoleLogger(scope, config.logLevel)
  const averagesOutput = await CsvOutput.open(config.averagesOutputFile, AVERAGE_COLUMNS)
  const centroidOutput = await CsvOutput.open(config.centroidOutputFile, CENTROID_COLUMNS)

  try {
    await runGasMonitor(config, {
      locationProvider: new FileLocationProvider(config.locationsFile),
      receiver: createReceiver(config, createLogger('receiver')),
      averageWriter: toAverageWriter(averagesOutput),
      centroidWriter: toCentroidWriter(centroidOutput),
      createLogger,
    })
  } finally {
    await Promise.all([averagesOutput.close(), centroidOutput.close()])
  }

  console.log(
    `Wrote ${averagesOutput.rowCount} averages to ${config.averagesOutputFile} and the centroid to ${config.centroidOutputFile}`
  )
}

run().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error)
  console.error(message)
  if (error instanceof ConfigError) {
    console.error('Use --help to see valid options.')
  }
  process.exitCode = 1
})
