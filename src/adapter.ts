/**
 * Adapter
 *
 * Record store interface + in-memory mock implementation.
 * All methods are async so the interface fits both in-process and networked stores.
 */

import { instantToEpochMs, nowInstant, type LocalDate } from './time-date'
import { InvalidDataError, NotFoundError } from './errors'
import type {
  Task, Event, JournalEntry,
  NewTask, NewEvent, NewJournalEntry,
  TaskChanges, EventChanges, JournalEntryChanges,
} from './types'

// Re-export errors for callers that only import the adapter
export { DuplicateKeyError, NotFoundError, InvalidDataError } from './errors'

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  /**
   * Runs `fn` atomically: every write inside it is kept, or none is.
   * Nested calls join the outermost transaction.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // Task
  insertTask(task: NewTask): Promise<Task>
  getTask(id: number): Promise<Task | null>
  getAllTasks(): Promise<Task[]>
  updateTask(id: number, changes: TaskChanges): Promise<Task>
  deleteTask(id: number): Promise<void>
  /** Deletes every task in `groupId` due on or after `fromDate`; returns the count. */
  deleteTasksInGroupFrom(groupId: string, fromDate: LocalDate): Promise<number>

  // Event
  insertEvent(event: NewEvent): Promise<Event>
  getEvent(id: number): Promise<Event | null>
  getAllEvents(): Promise<Event[]>
  updateEvent(id: number, changes: EventChanges): Promise<Event>
  deleteEvent(id: number): Promise<void>

  // Journal
  insertJournalEntry(entry: NewJournalEntry): Promise<JournalEntry>
  getJournalEntry(id: number): Promise<JournalEntry | null>
  /** Most recent timestamp first; equal timestamps by descending id. */
  getAllJournalEntries(): Promise<JournalEntry[]>
  updateJournalEntry(id: number, changes: JournalEntryChanges): Promise<JournalEntry>
  deleteJournalEntry(id: number): Promise<void>

  // Lifecycle: persistent adapters release their handle here
  close?(): Promise<void>
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): Adapter {
  // ---- State ----
  const state = {
    tasks: new Map<number, Task>(),
    events: new Map<number, Event>(),
    journal: new Map<number, JournalEntry>(),
    sequences: { task: 0, event: 0, journal: 0 },
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: typeof state | null = null

  function restoreState(snap: typeof state) {
    Object.assign(state, snap)
  }

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function checkTask(task: Pick<Task, 'title' | 'timeTrackedSeconds'>) {
    if (task.title.length === 0) {
      throw new InvalidDataError('task.title must not be empty')
    }
    if (!Number.isInteger(task.timeTrackedSeconds) || task.timeTrackedSeconds < 0) {
      throw new InvalidDataError('task.time_tracked_seconds must be a non-negative integer')
    }
  }

  // ---- Adapter implementation ----
  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      const isOutermost = txDepth === 0
      if (isOutermost) {
        snapshot = clone(state)
      }
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          restoreState(snapshot)
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // Task
    // ================================================================
    async insertTask(task: NewTask) {
      checkTask(task)
      const id = ++state.sequences.task
      const row: Task = { ...clone(task), id, createdAt: nowInstant() }
      state.tasks.set(id, row)
      return clone(row)
    },

    async getTask(id: number) {
      const t = state.tasks.get(id)
      return t ? clone(t) : null
    },

    async getAllTasks() {
      return [...state.tasks.values()].sort((a, b) => a.id - b.id).map(clone)
    },

    async updateTask(id: number, changes: TaskChanges) {
      const existing = state.tasks.get(id)
      if (!existing) throw new NotFoundError(`Task '${id}' not found`)
      const updated: Task = { ...existing, ...clone(changes) }
      checkTask(updated)
      state.tasks.set(id, updated)
      return clone(updated)
    },

    async deleteTask(id: number) {
      state.tasks.delete(id)
    },

    async deleteTasksInGroupFrom(groupId: string, fromDate: LocalDate) {
      let deleted = 0
      for (const [id, t] of state.tasks) {
        if (t.recurrenceGroupId === groupId && t.dueDate !== null && t.dueDate >= fromDate) {
          state.tasks.delete(id)
          deleted++
        }
      }
      return deleted
    },

    // ================================================================
    // Event
    // ================================================================
    async insertEvent(event: NewEvent) {
      const id = ++state.sequences.event
      const row: Event = { ...clone(event), id, createdAt: nowInstant() }
      state.events.set(id, row)
      return clone(row)
    },

    async getEvent(id: number) {
      const e = state.events.get(id)
      return e ? clone(e) : null
    },

    async getAllEvents() {
      return [...state.events.values()].sort((a, b) => a.id - b.id).map(clone)
    },

    async updateEvent(id: number, changes: EventChanges) {
      const existing = state.events.get(id)
      if (!existing) throw new NotFoundError(`Event '${id}' not found`)
      const updated: Event = { ...existing, ...clone(changes) }
      state.events.set(id, updated)
      return clone(updated)
    },

    async deleteEvent(id: number) {
      state.events.delete(id)
    },

    // ================================================================
    // Journal
    // ================================================================
    async insertJournalEntry(entry: NewJournalEntry) {
      const id = ++state.sequences.journal
      const row: JournalEntry = { ...clone(entry), id }
      state.journal.set(id, row)
      return clone(row)
    },

    async getJournalEntry(id: number) {
      const j = state.journal.get(id)
      return j ? clone(j) : null
    },

    async getAllJournalEntries() {
      return [...state.journal.values()]
        .sort((a, b) => instantToEpochMs(b.timestamp) - instantToEpochMs(a.timestamp) || b.id - a.id)
        .map(clone)
    },

    async updateJournalEntry(id: number, changes: JournalEntryChanges) {
      const existing = state.journal.get(id)
      if (!existing) throw new NotFoundError(`Journal entry '${id}' not found`)
      const updated: JournalEntry = { ...existing, ...clone(changes) }
      state.journal.set(id, updated)
      return clone(updated)
    },

    async deleteJournalEntry(id: number) {
      state.journal.delete(id)
    },
  }

  return adapter
}
