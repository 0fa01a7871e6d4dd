export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[]

const styles = {
  info: { label: 'INFO', ansi: '\x1b[32m' },
  warn: { label: 'WARN', ansi: '\x1b[33m' },
  error: { label: 'ERROR', ansi: '\x1b[31m' },
  debug: { label: 'DEBUG', ansi: '\x1b[34m' }
}

// stdout carries the branch report, so every level goes to stderr
let sink: (...args: unknown[]) => void = (...args) => console.error(...args)
let threshold: LogLevel = 'warn'

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold)
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  return [`${style.ansi}[${style.label}]\x1b[0m`, message, ...args]
}

function emit(level: LogLevel, message: unknown, args: unknown[]): void {
  if (!isEnabled(level)) return
  sink(...format(level, message, args))
}

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

/**
 * Replaces the output function. Returns the previous one so callers can restore it.
 */
export function setLogSink(
  next: (...args: unknown[]) => void
): (...args: unknown[]) => void {
  const previous = sink
  sink = next
  return previous
}

export const log = {
  info: (message: unknown, ...args: unknown[]) => {
    emit('info', message, args)
  },
  warn: (message: unknown, ...args: unknown[]) => {
    emit('warn', message, args)
  },
  error: (message: unknown, ...args: unknown[]) => {
    emit('error', message, args)
  },
  debug: (message: unknown, ...args: unknown[]) => {
    emit('debug', message, args)
  }
}
