/* eslint-disable no-console */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

/**
 * Observability collaborator handed to stages, sinks and receivers.
 */
export interface Logger {
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
}

export const isLogLevel = (value: string): value is LogLevel => {
  return LOG_LEVELS.some((level) => level === value)
}

const writers: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
}

/**
 * Creates a logger that prints `ISO-time [LEVEL] [scope] message` lines.
 * @param scope Component name shown in every line.
 * @param level Lowest level that is printed.
 * @param now Clock used for the line timestamp.
 */
export const createConsoleLogger = (
  scope: string,
  level: LogLevel = 'info',
  now: () => number = () => Date.now()
): Logger => {
  const threshold = LOG_LEVELS.indexOf(level)

  const log = (messageLevel: LogLevel) => (message: string) => {
    if (LOG_LEVELS.indexOf(messageLevel) < threshold) {
      return
    }
    const time = new Date(now()).toISOString()
    writers[messageLevel](`${time} [${messageLevel.toUpperCase()}] [${scope}] ${message}`)
  }

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  }
}

const ignore = (): void => {}

export const silentLogger: Logger = {
  debug: ignore,
  info: ignore,
  warn: ignore,
  error: ignore,
}
