import {
  BoundedDurationStage,
  DeduplicationStage,
  LocationFilterStage,
  SpatialAverager,
  Sink,
  WindowedAverager,
  type AverageWriter,
  type CentroidWriter,
} from '@gas-monitor/pipeline'
import {
  buildRunStatistics,
  formatRunStatistics,
  silentLogger,
  type Centroid,
  type Logger,
  type RunStatistics,
} from '@gas-monitor/pipeline-common'
import type { GasMonitorConfig } from './config'
import type { LocationProvider } from './locations'
import type { EventReceiver } from './receivers/event-receiver'

export type GasMonitorSettings = Pick<
  GasMonitorConfig,
  'runTimeSeconds' | 'dedupTtlSeconds' | 'averagePeriodSeconds' | 'expirySeconds'
>

export interface GasMonitorDependencies {
  locationProvider: LocationProvider
  receiver: EventReceiver
  averageWriter?: AverageWriter
  centroidWriter?: CentroidWriter
  /** Shared clock for every time-based stage and sink. */
  now?: () => number
  createLogger?: (scope: string) => Logger
}

export interface GasMonitorResult {
  statistics: RunStatistics
  centroid: Centroid | null
}

/**
 * Runs one bounded pass: bounded duration, location filter and deduplication
 * feeding the windowed and spatial averagers side by side.
 *
 * The run summary is logged even when a sink fails; the failure is then rethrown.
 */
export const runGasMonitor = async (
  settings: GasMonitorSettings,
  deps: GasMonitorDependencies
): Promise<GasMonitorResult> => {
  const createLogger = deps.createLogger ?? (() => silentLogger)
  const now = deps.now ?? (() => Date.now())
  const logger = createLogger('gas-monitor')

  if (settings.expirySeconds < settings.averagePeriodSeconds) {
    logger.warn(
      `Expiry (${settings.expirySeconds}s) is shorter than the averaging period (${settings.averagePeriodSeconds}s); bins will be retired before they fill`
    )
  }

  const locations = await deps.locationProvider.getLocations()
  logger.info(`Loaded ${locations.length} locations`)

  const boundedDuration = new BoundedDurationStage({
    runTimeSeconds: settings.runTimeSeconds,
    now,
    logger: createLogger('bounded-duration'),
  })
  const locationFilter = new LocationFilterStage(locations, createLogger('location-filter'))
  const deduplicator = new DeduplicationStage({
    ttlSeconds: settings.dedupTtlSeconds,
    now,
    logger: createLogger('deduplicator'),
  })
  const windowedAverager = new WindowedAverager({
    averagingPeriodSeconds: settings.averagePeriodSeconds,
    expirySeconds: settings.expirySeconds,
    output: deps.averageWriter,
    now,
    logger: createLogger('windowed-averager'),
  })
  const spatialAverager = new SpatialAverager(locations, {
    output: deps.centroidWriter,
    logger: createLogger('spatial-averager'),
  })

  const pipeline = boundedDuration.combine(locationFilter).combine(deduplicator)

  const collectStatistics = (): RunStatistics =>
    buildRunStatistics(
      {
        eventsProcessed: boundedDuration.eventsProcessed,
        invalidLocations: locationFilter.invalidEventsFiltered,
        duplicateEvents: deduplicator.duplicateEventsIgnored,
        malformedRecords: deps.receiver.malformedRecords,
        averagesEmitted: windowedAverager.averagesEmitted,
      },
      settings.runTimeSeconds
    )

  try {
    await pipeline
      .sink(Sink.parallel(windowedAverager, spatialAverager))
      .handle(deps.receiver.events())
  } finally {
    formatRunStatistics(collectStatistics()).forEach((line) => logger.info(line))
  }

  return { statistics: collectStatistics(), centroid: spatialAverager.centroid }
}
