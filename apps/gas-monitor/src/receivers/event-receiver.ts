import type { SensorEvent } from '@gas-monitor/pipeline-common'

/**
 * Delivers raw readings to the monitor. Records that fail validation are skipped
 * and counted, never yielded.
 */
export interface EventReceiver {
  events: () => AsyncIterable<SensorEvent>
  readonly malformedRecords: number
}
