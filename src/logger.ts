/**
 * Leveled logging, passed explicitly to the decoder instead of a global debug flag.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
}

/**
 * Logger writing to the console, dropping messages below `level`
 */
export class ConsoleLogger implements Logger {
  constructor(readonly level: LogLevel = 'info') { }

  enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(`[DEBUG] ${message}`)
  }

  info(message: string): void {
    if (this.enabled('info')) console.log(message)
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(message)
  }

  error(message: string): void {
    if (this.enabled('error')) console.error(message)
  }
}

export const silentLogger: Logger = {
  debug: () => { },
  info: () => { },
  warn: () => { },
  error: () => { }
}
