/**
 * Planner entity types
 *
 * Canonical shapes for the three record kinds as the store hands them back.
 * Absent values are `null`, matching the nullable columns they come from.
 */

import type { LocalDate, Instant } from './time-date'

export type { LocalDate, Instant } from './time-date'

// ============================================================================
// JSON payloads
// ============================================================================

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

// ============================================================================
// Recurrence
// ============================================================================

/** Cadences the expander knows how to generate. */
export type RecurrenceCadence = 'daily' | 'weekly'

export const DELETE_SCOPES = ['single', 'series_from_here'] as const

/** Scope of a task deletion */
export type DeleteScope = (typeof DELETE_SCOPES)[number]

// ============================================================================
// Entities
// ============================================================================

export type Task = {
  id: number
  title: string
  description: string | null
  isRecurring: boolean
  /** Stored as given; only RecurrenceCadence values are expanded. */
  recurrenceType: string | null
  isCompleted: boolean
  dueDate: LocalDate | null
  startTime: Instant | null
  endTime: Instant | null
  timeTrackedSeconds: number
  createdAt: Instant
  /** Shared by a template and its siblings; null outside a series. */
  recurrenceGroupId: string | null
}

export type Event = {
  id: number
  title: string
  description: string | null
  startTime: Instant
  endTime: Instant | null
  createdAt: Instant
}

export type JournalEntry = {
  id: number
  entryType: string
  content: JsonValue
  timestamp: Instant
}

// ============================================================================
// Store inputs
// ============================================================================

/** A task row before the store assigns its id and creation instant. */
export type NewTask = Omit<Task, 'id' | 'createdAt'>

export type NewEvent = Omit<Event, 'id' | 'createdAt'>

export type NewJournalEntry = Omit<JournalEntry, 'id'>

export type TaskChanges = Partial<Pick<Task, 'title' | 'description' | 'isCompleted' | 'timeTrackedSeconds'>>

export type EventChanges = Partial<Pick<Event, 'title' | 'description' | 'startTime' | 'endTime'>>

export type JournalEntryChanges = Partial<Pick<JournalEntry, 'content' | 'timestamp'>>
