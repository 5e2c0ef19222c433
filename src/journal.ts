/**
 * Journal Entries
 *
 * Typed log records (meal, mood, sleep, ...) with an opaque JSON payload.
 * Listing is newest first by timestamp.
 */

import type { Adapter } from './adapter'
import { NotFoundError, ValidationError } from './errors'
import { instantField, requireText } from './internal/fields'
import { logger } from './logger'
import { nowInstant } from './time-date'
import type { JournalEntry, JournalEntryChanges, JsonValue, NewJournalEntry } from './types'

// ============================================================================
// Types
// ============================================================================

export type JournalEntryInput = {
  entryType?: string | null
  content?: JsonValue
  /** Defaults to the creation time when null, empty or absent */
  timestamp?: string | null
}

export type JournalEntryUpdate = {
  content?: JsonValue
  /** null or empty leaves the stored timestamp as it is */
  timestamp?: string | null
}

// ============================================================================
// Field Resolution
// ============================================================================

/** Falsy scalars, [] and {} carry nothing to record. */
export function isEmptyContent(content: JsonValue | undefined): boolean {
  if (content === undefined || content === null || content === '' || content === 0 || content === false) return true
  if (Array.isArray(content)) return content.length === 0
  if (typeof content === 'object') return Object.keys(content).length === 0
  return false
}

function buildJournalEntry(input: JournalEntryInput): NewJournalEntry {
  const entryType = requireText(input.entryType, 'entry_type')
  const content = input.content
  if (content === undefined || isEmptyContent(content)) {
    throw new ValidationError('content is required')
  }
  return {
    entryType,
    content,
    timestamp: instantField(input.timestamp, 'timestamp') ?? nowInstant(),
  }
}

export function resolveJournalEntryChanges(update: JournalEntryUpdate): JournalEntryChanges {
  const changes: JournalEntryChanges = {}
  if (update.content !== undefined) {
    if (update.content === null) {
      throw new ValidationError('content must not be null')
    }
    changes.content = update.content
  }

  const timestamp = instantField(update.timestamp, 'timestamp')
  if (timestamp !== null) {
    changes.timestamp = timestamp
  }
  return changes
}

// ============================================================================
// CRUD Operations
// ============================================================================

export async function createJournalEntry(
  adapter: Adapter,
  input: JournalEntryInput
): Promise<JournalEntry> {
  const entry = await adapter.insertJournalEntry(buildJournalEntry(input))
  logger.info('[journal] Entry created:', { id: entry.id, entryType: entry.entryType })
  return entry
}

export async function getJournalEntry(adapter: Adapter, id: number): Promise<JournalEntry> {
  const entry = await adapter.getJournalEntry(id)
  if (!entry) {
    throw new NotFoundError(`Journal entry '${id}' not found`)
  }
  return entry
}

export async function listJournalEntries(adapter: Adapter): Promise<JournalEntry[]> {
  return adapter.getAllJournalEntries()
}

export async function updateJournalEntry(
  adapter: Adapter,
  id: number,
  update: JournalEntryUpdate
): Promise<JournalEntry> {
  const changes = resolveJournalEntryChanges(update)
  const entry = await adapter.updateJournalEntry(id, changes)
  logger.info('[journal] Entry updated:', { id, fields: Object.keys(changes) })
  return entry
}

export async function deleteJournalEntry(adapter: Adapter, id: number): Promise<void> {
  await adapter.transaction(async () => {
    await getJournalEntry(adapter, id)
    await adapter.deleteJournalEntry(id)
  })
  logger.info('[journal] Entry deleted:', { id })
}
