import type { LogLevel } from './config'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void
  info(message: string, fields?: Record<string, unknown>): void
  warn(message: string, fields?: Record<string, unknown>): void
  error(message: string, fields?: Record<string, unknown>): void
  /** Hono logger middleware 用 */
  print(message: string): void
}

type Sink = (line: string) => void

const defaultSinks: Record<Exclude<LogLevel, 'silent'>, Sink> = {
  debug: line => console.debug(line),
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line)
}

function format(level: string, message: string, fields?: Record<string, unknown>): string {
  const suffix = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : ''
  return `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}${suffix}`
}

/**
 * 閾値付きのコンソールロガー
 */
export function createLogger(
  level: LogLevel = 'info',
  sinks: Partial<Record<Exclude<LogLevel, 'silent'>, Sink>> = {}
): Logger {
  const threshold = LEVEL_ORDER[level]
  const emit = (target: Exclude<LogLevel, 'silent'>, message: string, fields?: Record<string, unknown>) => {
    if (LEVEL_ORDER[target] < threshold) return
    const sink = sinks[target] ?? defaultSinks[target]
    sink(format(target, message, fields))
  }

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    print: message => emit('info', message)
  }
}
