import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from 'fs'
import path from 'path'
import type { LogFn, LogLevel, LogMessage } from './types'

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  success: 20,
  warn: 30,
  error: 40,
}

export interface LogSink {
  minLevel?: LogLevel
  write(message: LogMessage): void
}

// Map CLI / rules level names (DEBUG, INFO, WARNING, ERROR) to our levels
export function parseLogLevel(name: string): LogLevel | null {
  switch (name.trim().toUpperCase()) {
    case 'DEBUG': return 'debug'
    case 'INFO': return 'info'
    case 'WARN':
    case 'WARNING': return 'warn'
    case 'ERROR':
    case 'CRITICAL': return 'error'
    default: return null
  }
}

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel]
}

interface LoggerState {
  sinks: LogSink[]
  level: LogLevel
}

export class Logger {
  private state: LoggerState
  private prefix = ''

  constructor(sinks: LogSink[] = [], level: LogLevel = 'info') {
    this.state = { sinks, level }
  }

  get minLevel(): LogLevel {
    return this.state.level
  }

  setLevel(level: LogLevel) {
    this.state.level = level
  }

  addSink(sink: LogSink) {
    this.state.sinks.push(sink)
  }

  removeSink(sink: LogSink) {
    this.state.sinks = this.state.sinks.filter(s => s !== sink)
  }

  log(level: LogLevel, message: string) {
    if (!isLevelEnabled(level, this.state.level)) return

    const entry: LogMessage = {
      timestamp: new Date().toISOString(),
      level,
      message: this.prefix ? `${this.prefix}: ${message}` : message,
    }
    for (const sink of this.state.sinks) {
      if (sink.minLevel && !isLevelEnabled(level, sink.minLevel)) continue
      sink.write(entry)
    }
  }

  // Child shares sinks and level with its parent, only the message prefix differs
  child(prefix: string): Logger {
    const child = new Logger()
    child.state = this.state
    child.prefix = this.prefix ? `${this.prefix}: ${prefix}` : prefix
    return child
  }

  // Plain callback form, as drivers and workflows take it
  get fn(): LogFn {
    return (level, message) => this.log(level, message)
  }

  debug(message: string) { this.log('debug', message) }
  info(message: string) { this.log('info', message) }
  success(message: string) { this.log('success', message) }
  warn(message: string) { this.log('warn', message) }
  error(message: string) { this.log('error', message) }
}

function clockTime(timestamp: string): string {
  return new Date(timestamp).toTimeString().slice(0, 8)
}

export function consoleSink(minLevel?: LogLevel): LogSink {
  return {
    minLevel,
    write({ timestamp, level, message }) {
      const line = `[${clockTime(timestamp)}] ${level.toUpperCase().padEnd(7)} ${message}`
      if (level === 'error') console.error(line)
      else if (level === 'warn') console.warn(line)
      else console.log(line)
    },
  }
}

export function formatFileLine({ timestamp, level, message }: LogMessage): string {
  return `${timestamp} - ${level.toUpperCase()} - ${message}\n`
}

// Expand {timestamp} in a log file name to YYYYMMDD-HHMMSS
export function expandLogFileName(fileName: string, now = new Date()): string {
  if (!fileName.includes('{timestamp}')) return fileName
  const pad = (n: number) => String(n).padStart(2, '0')
  const stamp = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `-${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  return fileName.split('{timestamp}').join(stamp)
}

/**
 * Size-rotated log file: file -> file.1 -> ... -> file.N
 * Writes are synchronous so nothing is lost when the CLI exits.
 */
export class RotatingFileSink implements LogSink {
  readonly filePath: string
  minLevel?: LogLevel
  private maxBytes: number
  private backupCount: number
  private size: number

  constructor(filePath: string, maxBytes: number, backupCount: number, minLevel?: LogLevel) {
    this.filePath = filePath
    this.maxBytes = maxBytes
    this.backupCount = backupCount
    this.minLevel = minLevel

    mkdirSync(path.dirname(filePath), { recursive: true })
    this.size = existsSync(filePath) ? statSync(filePath).size : 0
  }

  write(message: LogMessage) {
    const line = formatFileLine(message)
    const bytes = Buffer.byteLength(line)
    if (this.size > 0 && this.size + bytes > this.maxBytes) {
      this.rotate()
    }
    appendFileSync(this.filePath, line)
    this.size += bytes
  }

  private rotate() {
    if (this.backupCount <= 0) {
      rmSync(this.filePath, { force: true })
    } else {
      for (let i = this.backupCount - 1; i >= 1; i--) {
        const source = `${this.filePath}.${i}`
        if (existsSync(source)) renameSync(source, `${this.filePath}.${i + 1}`)
      }
      renameSync(this.filePath, `${this.filePath}.1`)
    }
    this.size = 0
  }
}
