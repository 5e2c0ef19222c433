/**
 * SQLite Adapter
 *
 * Production implementation of the record store using better-sqlite3.
 * Implements the canonical Adapter interface over three tables.
 */
import Database from 'better-sqlite3'
import type { Adapter } from './adapter'
import { DuplicateKeyError, InvalidDataError, NotFoundError } from './errors'
import { instantToEpochMs, nowInstant, type Instant, type LocalDate } from './time-date'
import type {
  Task, Event, JournalEntry, JsonValue,
  NewTask, NewEvent, NewJournalEntry,
  TaskChanges, EventChanges, JournalEntryChanges,
} from './types'

// Re-export errors for callers that only import the store
export { DuplicateKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getTableColumns(table: string): Promise<string[]>
  listIndices(table: string): Promise<string[]>
  getSchemaVersion(): Promise<number>
  inTransaction(): Promise<boolean>
  close(): Promise<void>
}

export type SqliteAdapter = Adapter & SqliteExtras

// ============================================================================
// Schema DDL
// ============================================================================

export const SCHEMA_VERSION = 1

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS task (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL CHECK (length(title) > 0),
    description TEXT,
    is_recurring INTEGER NOT NULL DEFAULT 0,
    recurrence_type TEXT,
    is_completed INTEGER NOT NULL DEFAULT 0,
    due_date TEXT,
    start_time TEXT,
    end_time TEXT,
    time_tracked_seconds INTEGER NOT NULL DEFAULT 0 CHECK (time_tracked_seconds >= 0),
    created_at TEXT NOT NULL,
    recurrence_group_id TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_task_group_due ON task(recurrence_group_id, due_date);

  CREATE TABLE IF NOT EXISTS event (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT,
    start_time TEXT NOT NULL,
    end_time TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS journal_entry (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    entry_type TEXT NOT NULL,
    content TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    timestamp_ms INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_journal_entry_timestamp ON journal_entry(timestamp_ms);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/(CHECK|NOT NULL) constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type TaskRow = {
  id: number
  title: string
  description: string | null
  is_recurring: number
  recurrence_type: string | null
  is_completed: number
  due_date: string | null
  start_time: string | null
  end_time: string | null
  time_tracked_seconds: number
  created_at: string
  recurrence_group_id: string | null
}

type EventRow = {
  id: number
  title: string
  description: string | null
  start_time: string
  end_time: string | null
  created_at: string
}

type JournalEntryRow = {
  id: number
  entry_type: string
  content: string
  timestamp: string
  timestamp_ms: number
}

type SchemaVersionRow = {
  v: number | null
}

type NameRow = {
  name: string
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

// Columns are only ever written from validated LocalDate / Instant values.
function asDate(value: string | null): LocalDate | null {
  return value as LocalDate | null
}

function asInstant(value: string): Instant {
  return value as Instant
}

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    isRecurring: row.is_recurring === 1,
    recurrenceType: row.recurrence_type,
    isCompleted: row.is_completed === 1,
    dueDate: asDate(row.due_date),
    startTime: row.start_time != null ? asInstant(row.start_time) : null,
    endTime: row.end_time != null ? asInstant(row.end_time) : null,
    timeTrackedSeconds: row.time_tracked_seconds,
    createdAt: asInstant(row.created_at),
    recurrenceGroupId: row.recurrence_group_id,
  }
}

function toEvent(row: EventRow): Event {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    startTime: asInstant(row.start_time),
    endTime: row.end_time != null ? asInstant(row.end_time) : null,
    createdAt: asInstant(row.created_at),
  }
}

function toJournalEntry(row: JournalEntryRow): JournalEntry {
  const content: JsonValue = JSON.parse(row.content)
  return {
    id: row.id,
    entryType: row.entry_type,
    content,
    timestamp: asInstant(row.timestamp),
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.exec(SCHEMA_SQL)

  // Seed initial schema version if empty
  const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, nowInstant(),
    )
  }

  let _inTx = false

  const selectTask = db.prepare<[number], TaskRow>('SELECT * FROM task WHERE id = ?')
  const selectEvent = db.prepare<[number], EventRow>('SELECT * FROM event WHERE id = ?')
  const selectJournalEntry = db.prepare<[number], JournalEntryRow>('SELECT * FROM journal_entry WHERE id = ?')

  function requireTask(id: number): Task {
    const row = selectTask.get(id)
    if (!row) throw new NotFoundError(`Task '${id}' not found`)
    return toTask(row)
  }

  function requireEvent(id: number): Event {
    const row = selectEvent.get(id)
    if (!row) throw new NotFoundError(`Event '${id}' not found`)
    return toEvent(row)
  }

  function requireJournalEntry(id: number): JournalEntry {
    const row = selectJournalEntry.get(id)
    if (!row) throw new NotFoundError(`Journal entry '${id}' not found`)
    return toJournalEntry(row)
  }

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Task
    // ================================================================
    async insertTask(task: NewTask) {
      const info = safe(() =>
        db.prepare(
          `INSERT INTO task (title, description, is_recurring, recurrence_type, is_completed, due_date,
            start_time, end_time, time_tracked_seconds, created_at, recurrence_group_id)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        ).run(
          task.title,
          task.description,
          task.isRecurring ? 1 : 0,
          task.recurrenceType,
          task.isCompleted ? 1 : 0,
          task.dueDate,
          task.startTime,
          task.endTime,
          task.timeTrackedSeconds,
          nowInstant(),
          task.recurrenceGroupId,
        ),
      )
      return requireTask(Number(info.lastInsertRowid))
    },

    async getTask(id: number) {
      const row = selectTask.get(id)
      return row ? toTask(row) : null
    },

    async getAllTasks() {
      return db.prepare<[], TaskRow>('SELECT * FROM task ORDER BY id').all().map(toTask)
    },

    async updateTask(id: number, changes: TaskChanges) {
      const merged = { ...requireTask(id), ...changes }
      safe(() =>
        db.prepare(
          'UPDATE task SET title = ?, description = ?, is_completed = ?, time_tracked_seconds = ? WHERE id = ?',
        ).run(
          merged.title,
          merged.description,
          merged.isCompleted ? 1 : 0,
          merged.timeTrackedSeconds,
          id,
        ),
      )
      return requireTask(id)
    },

    async deleteTask(id: number) {
      db.prepare('DELETE FROM task WHERE id = ?').run(id)
    },

    async deleteTasksInGroupFrom(groupId: string, fromDate: LocalDate) {
      const info = db.prepare(
        'DELETE FROM task WHERE recurrence_group_id = ? AND due_date >= ?',
      ).run(groupId, fromDate)
      return info.changes
    },

    // ================================================================
    // Event
    // ================================================================
    async insertEvent(event: NewEvent) {
      const info = safe(() =>
        db.prepare(
          'INSERT INTO event (title, description, start_time, end_time, created_at) VALUES (?, ?, ?, ?, ?)',
        ).run(
          event.title,
          event.description,
          event.startTime,
          event.endTime,
          nowInstant(),
        ),
      )
      return requireEvent(Number(info.lastInsertRowid))
    },

    async getEvent(id: number) {
      const row = selectEvent.get(id)
      return row ? toEvent(row) : null
    },

    async getAllEvents() {
      return db.prepare<[], EventRow>('SELECT * FROM event ORDER BY id').all().map(toEvent)
    },

    async updateEvent(id: number, changes: EventChanges) {
      const merged = { ...requireEvent(id), ...changes }
      safe(() =>
        db.prepare(
          'UPDATE event SET title = ?, description = ?, start_time = ?, end_time = ? WHERE id = ?',
        ).run(
          merged.title,
          merged.description,
          merged.startTime,
          merged.endTime,
          id,
        ),
      )
      return requireEvent(id)
    },

    async deleteEvent(id: number) {
      db.prepare('DELETE FROM event WHERE id = ?').run(id)
    },

    // ================================================================
    // Journal
    // ================================================================
    async insertJournalEntry(entry: NewJournalEntry) {
      const info = safe(() =>
        db.prepare(
          'INSERT INTO journal_entry (entry_type, content, timestamp, timestamp_ms) VALUES (?, ?, ?, ?)',
        ).run(
          entry.entryType,
          JSON.stringify(entry.content),
          entry.timestamp,
          instantToEpochMs(entry.timestamp),
        ),
      )
      return requireJournalEntry(Number(info.lastInsertRowid))
    },

    async getJournalEntry(id: number) {
      const row = selectJournalEntry.get(id)
      return row ? toJournalEntry(row) : null
    },

    async getAllJournalEntries() {
      return db.prepare<[], JournalEntryRow>(
        'SELECT * FROM journal_entry ORDER BY timestamp_ms DESC, id DESC',
      ).all().map(toJournalEntry)
    },

    async updateJournalEntry(id: number, changes: JournalEntryChanges) {
      const merged = { ...requireJournalEntry(id), ...changes }
      safe(() =>
        db.prepare(
          'UPDATE journal_entry SET content = ?, timestamp = ?, timestamp_ms = ? WHERE id = ?',
        ).run(
          JSON.stringify(merged.content),
          merged.timestamp,
          instantToEpochMs(merged.timestamp),
          id,
        ),
      )
      return requireJournalEntry(id)
    },

    async deleteJournalEntry(id: number) {
      db.prepare('DELETE FROM journal_entry WHERE id = ?').run(id)
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras (introspection)
    // ================================================================
    async listTables() {
      const rows = db.prepare<[], NameRow>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all()
      return rows.map((r) => r.name)
    },

    async getTableColumns(table: string) {
      const rows = db.prepare<[], NameRow>(`PRAGMA table_info("${table}")`).all()
      return rows.map((r) => r.name)
    },

    async listIndices(table: string) {
      const rows = db.prepare<[], NameRow>(`PRAGMA index_list("${table}")`).all()
      return rows.map((r) => r.name)
    },

    async getSchemaVersion() {
      const row = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },

    async inTransaction() {
      return _inTx
    },
  }

  return adapter
}
