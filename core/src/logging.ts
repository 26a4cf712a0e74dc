/**
 * @file src/logging.ts
 * @description
 * Level-filtered console logging. Every line carries an ISO timestamp,
 * the seconds elapsed since the previous line and the source tag.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface SLPLogger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
}

// bigint token amounts are not JSON-serializable
const safeFormat = (context?: Record<string, unknown>): string => {
  if (!context || Object.keys(context).length === 0) return ''
  try {
    return ' ' + JSON.stringify(context, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    )
  } catch {
    return ' [unserializable context]'
  }
}

/**
 * Create a console logger tagged with `file`.
 */
export function createLogger(file: string, minLevel: LogLevel = 'info'): SLPLogger {
  let lastLogTime = performance.now()

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return

    const now = performance.now()
    const elapsed = (now - lastLogTime) / 1000
    lastLogTime = now

    const line = `[${new Date().toISOString()}] [${elapsed.toFixed(3)}s] [${file}] ${message}${safeFormat(context)}`
    switch (level) {
      case 'debug':
        console.debug(line)
        break
      case 'info':
        console.info(line)
        break
      case 'warn':
        console.warn(line)
        break
      case 'error':
        console.error(line)
        break
    }
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context)
  }
}
