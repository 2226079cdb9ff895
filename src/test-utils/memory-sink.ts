import { Logger, type LogSink } from '../services/logger'
import type { LogLevel, LogMessage } from '../services/types'

export interface MemorySink extends LogSink {
  messages: LogMessage[]
  lines(level?: LogLevel): string[]
}

export function memorySink(): MemorySink {
  const messages: LogMessage[] = []
  return {
    messages,
    write(message) {
      messages.push(message)
    },
    lines(level) {
      return messages.filter(m => !level || m.level === level).map(m => m.message)
    },
  }
}

export function memoryLogger(level: LogLevel = 'debug'): { logger: Logger; sink: MemorySink } {
  const sink = memorySink()
  return { logger: new Logger([sink], level), sink }
}
