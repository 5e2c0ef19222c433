/**
 * Event CRUD
 *
 * Start time is required and can never be cleared by an update; end time is
 * nullable and an update that names it explicitly, even as null, replaces it.
 */

import type { Adapter } from './adapter'
import { NotFoundError, ValidationError } from './errors'
import { hasOwn, instantField, requireText } from './internal/fields'
import { logger } from './logger'
import type { Event, EventChanges, NewEvent } from './types'

// ============================================================================
// Types
// ============================================================================

export type EventInput = {
  title?: string | null
  description?: string | null
  startTime?: string | null
  endTime?: string | null
}

export type EventUpdate = {
  title?: string
  description?: string | null
  /** null or empty leaves the stored start time as it is */
  startTime?: string | null
  /** present (even as null) replaces the stored end time; absent leaves it */
  endTime?: string | null
}

// ============================================================================
// Field Resolution
// ============================================================================

function buildEvent(input: EventInput): NewEvent {
  const title = requireText(input.title, 'title')
  const startTime = instantField(input.startTime, 'start_time')
  if (startTime === null) {
    throw new ValidationError('start_time is required')
  }
  return {
    title,
    description: input.description ?? null,
    startTime,
    endTime: instantField(input.endTime, 'end_time'),
  }
}

export function resolveEventChanges(update: EventUpdate): EventChanges {
  const changes: EventChanges = {}
  if (update.title !== undefined) {
    changes.title = requireText(update.title, 'title')
  }
  if (update.description !== undefined) {
    changes.description = update.description
  }

  const startTime = instantField(update.startTime, 'start_time')
  if (startTime !== null) {
    changes.startTime = startTime
  }

  if (hasOwn(update, 'endTime')) {
    changes.endTime = instantField(update.endTime, 'end_time')
  }
  return changes
}

// ============================================================================
// CRUD Operations
// ============================================================================

export async function createEvent(adapter: Adapter, input: EventInput): Promise<Event> {
  const event = await adapter.insertEvent(buildEvent(input))
  logger.info('[events] Event created:', { id: event.id })
  return event
}

export async function getEvent(adapter: Adapter, id: number): Promise<Event> {
  const event = await adapter.getEvent(id)
  if (!event) {
    throw new NotFoundError(`Event '${id}' not found`)
  }
  return event
}

export async function listEvents(adapter: Adapter): Promise<Event[]> {
  return adapter.getAllEvents()
}

export async function updateEvent(adapter: Adapter, id: number, update: EventUpdate): Promise<Event> {
  const changes = resolveEventChanges(update)
  const event = await adapter.updateEvent(id, changes)
  logger.info('[events] Event updated:', { id, fields: Object.keys(changes) })
  return event
}

export async function deleteEvent(adapter: Adapter, id: number): Promise<void> {
  await adapter.transaction(async () => {
    await getEvent(adapter, id)
    await adapter.deleteEvent(id)
  })
  logger.info('[events] Event deleted:', { id })
}
