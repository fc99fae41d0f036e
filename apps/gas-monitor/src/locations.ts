import { readFile } from 'node:fs/promises'
import { parseLocationList, type Location } from '@gas-monitor/pipeline-common'

/**
 * Source of the known sensor locations, read once at startup.
 */
export interface LocationProvider {
  getLocations: () => Promise<Location[]>
}

/**
 * Reads locations from a JSON array of `{ id, x, y }` objects.
 */
export class FileLocationProvider implements LocationProvider {
  public constructor(private readonly filePath: string) {}

  public async getLocations(): Promise<Location[]> {
    const contents = await readFile(this.filePath, 'utf8')
    let raw: unknown
    try {
      raw = JSON.parse(contents)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new Error(`Locations file ${this.filePath} is not valid JSON: ${reason}`)
    }
    return parseLocationList(raw)
  }
}

/**
 * Fixed location list, for tests and embedding.
 */
export class StaticLocationProvider implements LocationProvider {
  public constructor(private readonly locations: readonly Location[]) {}

  public async getLocations(): Promise<Location[]> {
    return [...this.locations]
  }
}
