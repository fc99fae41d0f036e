import { describe, expect, it } from 'vitest'

import { ConfigError, DEFAULT_CONFIG, parseGasMonitorArgs } from './config'

describe('parseGasMonitorArgs', () => {
  it('returns the defaults when no arguments are given', () => {
    expect(parseGasMonitorArgs([])).toEqual(DEFAULT_CONFIG)
  })

  it('reads every option', () => {
    const config = parseGasMonitorArgs([
      '--locations',
      'sites.json',
      '--input',
      '-',
      '--grpc-address',
      '127.0.0.1:50051',
      '--run-time',
      '120',
      '--dedup-ttl',
      '0',
      '--average-period',
      '5',
      '--expiry',
      '15',
      '--averages-output',
      'out/averages.csv',
      '--centroid-output',
      'out/centroid.csv',
      '--log-level',
      'debug',
    ])

    expect(config).toEqual({
      locationsFile: 'sites.json',
      inputFile: '-',
      grpcAddress: '127.0.0.1:50051',
      runTimeSeconds: 120,
      dedupTtlSeconds: 0,
      averagePeriodSeconds: 5,
      expirySeconds: 15,
      averagesOutputFile: 'out/averages.csv',
      centroidOutputFile: 'out/centroid.csv',
      logLevel: 'debug',
      showHelp: false,
    })
  })

  it('sets showHelp for -h', () => {
    expect(parseGasMonitorArgs(['-h']).showHelp).toBe(true)
  })

  it('rejects unknown arguments', () => {
    expect(() => parseGasMonitorArgs(['--verbose'])).toThrow(ConfigError)
    expect(() => parseGasMonitorArgs(['--verbose'])).toThrow('Unknown argument: --verbose')
  })

  it('rejects a flag without a value', () => {
    expect(() => parseGasMonitorArgs(['--input'])).toThrow('Missing value for --input')
  })

  it('rejects non-integer durations', () => {
    expect(() => parseGasMonitorArgs(['--run-time', '1.5'])).toThrow(
      'Invalid integer value for --run-time: 1.5'
    )
    expect(() => parseGasMonitorArgs(['--expiry', 'soon'])).toThrow(
      'Invalid integer value for --expiry: soon'
    )
  })

  it('rejects out-of-range durations', () => {
    expect(() => parseGasMonitorArgs(['--run-time', '0'])).toThrow(
      '--run-time must be a positive integer'
    )
    expect(() => parseGasMonitorArgs(['--dedup-ttl', '-1'])).toThrow(
      '--dedup-ttl must be a non-negative integer'
    )
    expect(() => parseGasMonitorArgs(['--average-period', '0'])).toThrow(
      '--average-period must be a positive integer'
    )
  })

  it('rejects an unknown log level', () => {
    expect(() => parseGasMonitorArgs(['--log-level', 'trace'])).toThrow('Invalid log level: trace')
  })
})
