/**
 * Task CRUD
 *
 * Creation fans a recurring template out into its whole series inside one
 * transaction. Only title, description, completion and tracked time change
 * after creation; due date and recurrence fields are fixed.
 */

import type { Adapter } from './adapter'
import { NotFoundError, ValidationError } from './errors'
import { dueDateField, instantField, requireText } from './internal/fields'
import { logger } from './logger'
import {
  expandRecurringTask, isRecurrenceCadence, MAX_DUE_DATE, newRecurrenceGroupId, seriesFitsCalendar,
} from './recurrence'
import type { NewTask, Task, TaskChanges } from './types'

// ============================================================================
// Types
// ============================================================================

export type TaskInput = {
  title?: string | null
  description?: string | null
  /** `YYYY-MM-DD` or an offset-aware instant */
  dueDate?: string | null
  startTime?: string | null
  endTime?: string | null
  isRecurring?: boolean
  recurrenceType?: string | null
}

export type TaskUpdate = {
  title?: string
  description?: string | null
  isCompleted?: boolean
  timeTrackedSeconds?: number
}

// ============================================================================
// Validation
// ============================================================================

function buildTemplate(input: TaskInput): NewTask {
  const title = requireText(input.title, 'title')
  const dueDate = dueDateField(input.dueDate, 'due_date')
  if (dueDate === null) {
    throw new ValidationError('due_date is required')
  }

  const isRecurring = input.isRecurring ?? false
  const recurrenceType = input.recurrenceType ?? null
  if (isRecurring && isRecurrenceCadence(recurrenceType) && !seriesFitsCalendar(dueDate, recurrenceType)) {
    throw new ValidationError(`due_date is too late: the ${recurrenceType} series would run past ${MAX_DUE_DATE}`)
  }

  return {
    title,
    description: input.description ?? null,
    isRecurring,
    recurrenceType,
    isCompleted: false,
    dueDate,
    startTime: instantField(input.startTime, 'start_time'),
    endTime: instantField(input.endTime, 'end_time'),
    timeTrackedSeconds: 0,
    recurrenceGroupId: isRecurring ? newRecurrenceGroupId() : null,
  }
}

export function resolveTaskChanges(update: TaskUpdate): TaskChanges {
  const changes: TaskChanges = {}
  if (update.title !== undefined) {
    changes.title = requireText(update.title, 'title')
  }
  if (update.description !== undefined) {
    changes.description = update.description
  }
  if (update.isCompleted !== undefined) {
    changes.isCompleted = update.isCompleted
  }
  if (update.timeTrackedSeconds !== undefined) {
    const seconds = update.timeTrackedSeconds
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new ValidationError('time_tracked_seconds must be a non-negative integer')
    }
    changes.timeTrackedSeconds = seconds
  }
  return changes
}

// ============================================================================
// CRUD Operations
// ============================================================================

/**
 * Stores a task. A recurring task with a known cadence also stores its
 * generated siblings; the template and siblings commit together or not at all.
 * Returns the template.
 */
export async function createTask(adapter: Adapter, input: TaskInput): Promise<Task> {
  logger.debug('[tasks] Creating task:', { title: input.title, isRecurring: input.isRecurring })
  const draft = buildTemplate(input)

  const { template, siblingCount } = await adapter.transaction(async () => {
    const template = await adapter.insertTask(draft)
    const siblings = expandRecurringTask(template)
    for (const sibling of siblings) {
      await adapter.insertTask(sibling)
    }
    return { template, siblingCount: siblings.length }
  })

  logger.info('[tasks] Task created:', {
    id: template.id,
    recurrenceGroupId: template.recurrenceGroupId,
    siblings: siblingCount,
  })
  return template
}

export async function getTask(adapter: Adapter, id: number): Promise<Task> {
  const task = await adapter.getTask(id)
  if (!task) {
    throw new NotFoundError(`Task '${id}' not found`)
  }
  return task
}

export async function listTasks(adapter: Adapter): Promise<Task[]> {
  return adapter.getAllTasks()
}

export async function updateTask(adapter: Adapter, id: number, update: TaskUpdate): Promise<Task> {
  const changes = resolveTaskChanges(update)
  const task = await adapter.updateTask(id, changes)
  logger.info('[tasks] Task updated:', { id, fields: Object.keys(changes) })
  return task
}
