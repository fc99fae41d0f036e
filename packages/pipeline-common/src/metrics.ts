/**
 * Counters gathered from the pipeline stages once a bounded run has finished.
 */
export interface RunCounters {
  eventsProcessed: number
  invalidLocations: number
  duplicateEvents: number
  malformedRecords: number
  averagesEmitted: number
}

/**
 * Observational summary of one bounded run.
 */
export interface RunStatistics extends RunCounters {
  runTimeSeconds: number
  eventsPerSecond: number
}

/**
 * Derives throughput over the configured run duration.
 * @param counters Counters read from the stages and sinks.
 * @param runTimeSeconds Configured run duration, not the measured one.
 */
export function buildRunStatistics(counters: RunCounters, runTimeSeconds: number): RunStatistics {
  return {
    ...counters,
    runTimeSeconds,
    eventsPerSecond: runTimeSeconds > 0 ? counters.eventsProcessed / runTimeSeconds : 0,
  }
}

export function formatRunStatistics(stats: RunStatistics): string[] {
  return [
    `Processed ${stats.eventsProcessed} events in ${stats.runTimeSeconds} seconds`,
    `Events/s: ${stats.eventsPerSecond.toFixed(2)}`,
    `Invalid locations skipped: ${stats.invalidLocations}`,
    `Duplicated events skipped: ${stats.duplicateEvents}`,
    `Malformed records skipped: ${stats.malformedRecords}`,
    `Averages emitted: ${stats.averagesEmitted}`,
  ]
}
