import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'

import type { LogLevel, LogPayload, LogRecord, Logger } from './types.js'

export interface LogEntry {
  level: LogLevel
  at: Date
  /** The record serialised once, shared by every sink. */
  line: string
}

export interface LogSink {
  write(entry: LogEntry): void
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

/** Local-time `YYYY-MM-DD HH:mm:ss,SSS`. */
export function formatConsoleTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time},${pad(date.getMilliseconds(), 3)}`
}

/** Appends one JSON object per line to `path`. */
export function createFileSink(path: string): LogSink {
  mkdirSync(dirname(path), { recursive: true })
  return {
    write(entry) {
      appendFileSync(path, `${entry.line}\n`, 'utf8')
    }
  }
}

export function createConsoleSink(): LogSink {
  return {
    write(entry) {
      const text = `${formatConsoleTimestamp(entry.at)} - ${entry.level} - ${entry.line}`
      // eslint-disable-next-line no-console
      if (entry.level === 'ERROR') console.error(text)
      // eslint-disable-next-line no-console
      else console.log(text)
    }
  }
}

/**
 * JSON turn logger. Records are stamped and serialised here so that every sink
 * receives identical content. A failing sink is reported and skipped.
 */
export function createLogger(sinks: readonly LogSink[]): Logger {
  function emit(level: LogLevel, payload: LogPayload): void {
    const at = new Date()
    const record: LogRecord = {
      timestamp: at.toISOString(),
      level,
      ...payload
    }
    const line = JSON.stringify(record)
    for (const sink of sinks) {
      try {
        sink.write({ level, at, line })
      } catch (error) {
        // eslint-disable-next-line no-console
        console.error(`Log sink failed: ${error instanceof Error ? error.message : String(error)}`)
      }
    }
  }

  return {
    info(payload) {
      emit('INFO', payload)
    },
    error(payload) {
      emit('ERROR', payload)
    }
  }
}
