import pino, {type DestinationStream, type Logger} from 'pino'

export type {Logger} from 'pino'

export const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = typeof logLevels[number]

export function isLogLevel(value: string): value is LogLevel {
  return (logLevels as readonly string[]).includes(value)
}

/**
 * Creates the engine's root logger. Components derive a child bound to
 * `{module: <name>}` from it.
 * @param options.destination - Alternative sink (defaults to stdout)
 */
export function createLogger(options: {level?: LogLevel; destination?: DestinationStream} = {}): Logger {
  const settings = {name: 'job-engine', level: options.level ?? 'info'}
  return options.destination ? pino(settings, options.destination) : pino(settings)
}
