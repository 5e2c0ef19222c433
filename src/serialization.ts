/**
 * Wire Serialization
 *
 * Explicit mapping from stored entities to their external JSON shape. Field
 * names are snake_case. Adding a field to an entity does not change the wire
 * contract until it is added here and the version is bumped.
 */

import type { Event, JournalEntry, JsonValue, Task } from './types'

export const SERIALIZATION_VERSION = 1

export const SCHEMA_VERSION_HEADER = 'X-Planner-Schema-Version'

// ============================================================================
// Version 1 shapes
// ============================================================================

export type TaskV1 = {
  id: number
  title: string
  description: string | null
  is_recurring: boolean
  recurrence_type: string | null
  is_completed: boolean
  due_date: string | null
  start_time: string | null
  end_time: string | null
  time_tracked_seconds: number
  created_at: string
  recurrence_group_id: string | null
}

export type EventV1 = {
  id: number
  title: string
  description: string | null
  start_time: string
  end_time: string | null
  created_at: string
}

export type JournalEntryV1 = {
  id: number
  entry_type: string
  content: JsonValue
  timestamp: string
}

// ============================================================================
// Mappers
// ============================================================================

export function serializeTask(task: Task): TaskV1 {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    is_recurring: task.isRecurring,
    recurrence_type: task.recurrenceType,
    is_completed: task.isCompleted,
    due_date: task.dueDate,
    start_time: task.startTime,
    end_time: task.endTime,
    time_tracked_seconds: task.timeTrackedSeconds,
    created_at: task.createdAt,
    recurrence_group_id: task.recurrenceGroupId,
  }
}

export function serializeEvent(event: Event): EventV1 {
  return {
    id: event.id,
    title: event.title,
    description: event.description,
    start_time: event.startTime,
    end_time: event.endTime,
    created_at: event.createdAt,
  }
}

export function serializeJournalEntry(entry: JournalEntry): JournalEntryV1 {
  return {
    id: entry.id,
    entry_type: entry.entryType,
    content: entry.content,
    timestamp: entry.timestamp,
  }
}
