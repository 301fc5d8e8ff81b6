import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { toLoggable } from './serialize.js'
import type { DatabaseConfig } from '../types/config.js'
import type { QueryKind, QueryLogEntry } from '../types/query-log.js'

/**
 * Event data for one executed statement.
 */
export interface QueryEvent {
  model: string
  kind: QueryKind
  sql: string
  args: readonly unknown[]
}

/** Receives every statement a model runs, before it is sent to the driver. */
export interface QueryLogger {
  append(event: QueryEvent): QueryLogEntry
}

/**
 * Append-only JSONL query logger.
 *
 * Each line carries a monotonically increasing sequence number. Opening
 * an existing file resumes numbering after its last valid entry.
 */
export class JsonlQueryLogger implements QueryLogger {
  private sequence: number
  private readonly logPath: string

  /**
   * @param logPath - Path to the JSONL query log file; parent directories are created
   */
  constructor(logPath: string) {
    this.logPath = logPath
    this.sequence = 0

    if (existsSync(logPath)) {
      const content = readFileSync(logPath, 'utf-8').trim()
      if (content.length > 0) {
        const lines = content.split('\n')
        // Last parseable line wins; a torn final write is skipped
        for (let i = lines.length - 1; i >= 0; i--) {
          const sequence = readSequence(lines[i])
          if (sequence !== undefined) {
            this.sequence = sequence
            break
          }
        }
      }
    } else {
      mkdirSync(dirname(logPath), { recursive: true })
    }
  }

  append(event: QueryEvent): QueryLogEntry {
    this.sequence++

    const entry: QueryLogEntry = {
      sequence: this.sequence,
      timestamp: new Date().toISOString(),
      model: event.model,
      kind: event.kind,
      sql: event.sql,
      args: event.args.map((arg) => toLoggable(arg)),
    }

    appendFileSync(this.logPath, JSON.stringify(entry) + '\n')
    return entry
  }
}

function readSequence(line: string): number | undefined {
  try {
    const parsed: unknown = JSON.parse(line)
    if (parsed !== null && typeof parsed === 'object' && 'sequence' in parsed && typeof parsed.sequence === 'number') {
      return parsed.sequence
    }
    return undefined
  } catch {
    return undefined
  }
}

/**
 * In-memory logger, keeping entries for inspection.
 */
export class MemoryQueryLogger implements QueryLogger {
  readonly entries: QueryLogEntry[] = []

  append(event: QueryEvent): QueryLogEntry {
    const entry: QueryLogEntry = {
      sequence: this.entries.length + 1,
      timestamp: new Date().toISOString(),
      model: event.model,
      kind: event.kind,
      sql: event.sql,
      args: event.args.map((arg) => toLoggable(arg)),
    }
    this.entries.push(entry)
    return entry
  }
}

/** The JSONL logger a configuration enables, or undefined when query logging is off. */
export function createQueryLogger(config: DatabaseConfig): QueryLogger | undefined {
  return config.queryLog.enabled ? new JsonlQueryLogger(config.queryLog.path) : undefined
}
