import { z } from 'zod'
import type { Location, SensorEvent } from './types'

/**
 * Wire shape of a sensor reading, as published by producers.
 */
export const SensorEventSchema = z.object({
  locationId: z.string().min(1),
  eventId: z.string().min(1),
  timestamp: z.number().int().nonnegative(), // unix ms
  value: z.number().finite(),
}) satisfies z.ZodType<SensorEvent>

export const LocationSchema = z.object({
  id: z.string().min(1),
  x: z.number().finite(),
  y: z.number().finite(),
}) satisfies z.ZodType<Location>

export const LocationListSchema = z.array(LocationSchema)

const describeIssues = (error: z.ZodError): string => {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Validates an untrusted record as a sensor reading.
 * @returns The reading, or null when the record does not match the wire shape.
 */
export const parseSensorEvent = (raw: unknown): SensorEvent | null => {
  const result = SensorEventSchema.safeParse(raw)
  return result.success ? result.data : null
}

/**
 * Validates a location list.
 * @throws When any entry is missing a field or has the wrong type.
 */
export const parseLocationList = (raw: unknown): Location[] => {
  const result = LocationListSchema.safeParse(raw)
  if (!result.success) {
    throw new Error(`Invalid location list: ${describeIssues(result.error)}`)
  }
  return result.data
}
