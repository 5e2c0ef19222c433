import type { Express, NextFunction, Request, Response } from 'express'
import { z } from 'zod'
import type { Adapter } from '../adapter'
import { NotFoundError, ValidationError } from '../errors'
import { createEvent, deleteEvent, getEvent, listEvents, updateEvent, type EventUpdate } from '../events'
import { hasOwn } from '../internal/fields'
import {
  createJournalEntry, deleteJournalEntry, getJournalEntry, listJournalEntries,
  updateJournalEntry, type JournalEntryUpdate,
} from '../journal'
import { deleteTask } from '../series-deletion'
import { serializeEvent, serializeJournalEntry, serializeTask } from '../serialization'
import { createTask, getTask, listTasks, updateTask, type TaskUpdate } from '../tasks'
import { DELETE_SCOPES, type DeleteScope, type JsonValue } from '../types'

/** Async route wrapper */
function wrap(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next)
  }
}

// ============================================================================
// Request Schemas
// ============================================================================

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
)

const TaskCreateSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  due_date: z.string().nullish(),
  start_time: z.string().nullish(),
  end_time: z.string().nullish(),
  is_recurring: z.boolean().optional(),
  recurrence_type: z.string().nullish(),
})

const TaskUpdateSchema = z.object({
  title: z.string().optional(),
  description: z.string().nullable().optional(),
  is_completed: z.boolean().optional(),
  time_tracked_seconds: z.number().int().min(0).optional(),
})

const TaskDeleteQuerySchema = z.object({
  scope: z.enum(DELETE_SCOPES).optional(),
  // Older clients ask for series deletion with apply_to=all_future
  apply_to: z.string().optional(),
})

const EventCreateSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  start_time: z.string().nullish(),
  end_time: z.string().nullish(),
})

const EventUpdateSchema = z.object({
  title: z.string().optional(),
  description: z.string().nullable().optional(),
  start_time: z.string().nullable().optional(),
  end_time: z.string().nullable().optional(),
})

const JournalCreateSchema = z.object({
  entry_type: z.string().nullish(),
  content: JsonValueSchema.optional(),
  timestamp: z.string().nullish(),
})

const JournalUpdateSchema = z.object({
  content: JsonValueSchema.optional(),
  timestamp: z.string().nullable().optional(),
})

// ============================================================================
// Helpers
// ============================================================================

function parseRequest<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(value ?? {})
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
    )
    throw new ValidationError(`Invalid ${what}: ${problems.join('; ')}`)
  }
  return parsed.data
}

/** Ids are positive integers; anything else names no resource. */
function parseId(raw: string | undefined, kind: string): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new NotFoundError(`${kind} '${raw ?? ''}' not found`)
  }
  return Number(raw)
}

function resolveScope(query: z.infer<typeof TaskDeleteQuerySchema>): DeleteScope {
  if (query.scope !== undefined) return query.scope
  return query.apply_to === 'all_future' ? 'series_from_here' : 'single'
}

// ============================================================================
// Routes
// ============================================================================

export function registerRoutes(app: Express, adapter: Adapter) {
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' })
  })

  // -----------------------------
  // Tasks
  // -----------------------------
  app.get(
    '/tasks',
    wrap(async (_req, res) => {
      const tasks = await listTasks(adapter)
      res.json(tasks.map(serializeTask))
    }),
  )

  app.get(
    '/tasks/:id',
    wrap(async (req, res) => {
      const task = await getTask(adapter, parseId(req.params.id, 'Task'))
      res.json(serializeTask(task))
    }),
  )

  app.post(
    '/tasks',
    wrap(async (req, res) => {
      const body = parseRequest(TaskCreateSchema, req.body, 'task')
      const task = await createTask(adapter, {
        title: body.title,
        description: body.description,
        dueDate: body.due_date,
        startTime: body.start_time,
        endTime: body.end_time,
        isRecurring: body.is_recurring,
        recurrenceType: body.recurrence_type,
      })
      res.status(201).json(serializeTask(task))
    }),
  )

  app.put(
    '/tasks/:id',
    wrap(async (req, res) => {
      const id = parseId(req.params.id, 'Task')
      const body = parseRequest(TaskUpdateSchema, req.body, 'task update')
      const update: TaskUpdate = {}
      if (body.title !== undefined) update.title = body.title
      if (body.description !== undefined) update.description = body.description
      if (body.is_completed !== undefined) update.isCompleted = body.is_completed
      if (body.time_tracked_seconds !== undefined) update.timeTrackedSeconds = body.time_tracked_seconds
      const task = await updateTask(adapter, id, update)
      res.json(serializeTask(task))
    }),
  )

  app.delete(
    '/tasks/:id',
    wrap(async (req, res) => {
      const id = parseId(req.params.id, 'Task')
      const query = parseRequest(TaskDeleteQuerySchema, req.query, 'delete scope')
      await deleteTask(adapter, id, resolveScope(query))
      res.status(204).end()
    }),
  )

  // -----------------------------
  // Events
  // -----------------------------
  app.get(
    '/events',
    wrap(async (_req, res) => {
      const events = await listEvents(adapter)
      res.json(events.map(serializeEvent))
    }),
  )

  app.get(
    '/events/:id',
    wrap(async (req, res) => {
      const event = await getEvent(adapter, parseId(req.params.id, 'Event'))
      res.json(serializeEvent(event))
    }),
  )

  app.post(
    '/events',
    wrap(async (req, res) => {
      const body = parseRequest(EventCreateSchema, req.body, 'event')
      const event = await createEvent(adapter, {
        title: body.title,
        description: body.description,
        startTime: body.start_time,
        endTime: body.end_time,
      })
      res.status(201).json(serializeEvent(event))
    }),
  )

  app.put(
    '/events/:id',
    wrap(async (req, res) => {
      const id = parseId(req.params.id, 'Event')
      const body = parseRequest(EventUpdateSchema, req.body, 'event update')
      const update: EventUpdate = {}
      if (body.title !== undefined) update.title = body.title
      if (body.description !== undefined) update.description = body.description
      if (body.start_time !== undefined) update.startTime = body.start_time
      // Presence, not value: an explicit null end_time clears it
      if (hasOwn(body, 'end_time')) update.endTime = body.end_time ?? null
      const event = await updateEvent(adapter, id, update)
      res.json(serializeEvent(event))
    }),
  )

  app.delete(
    '/events/:id',
    wrap(async (req, res) => {
      await deleteEvent(adapter, parseId(req.params.id, 'Event'))
      res.status(204).end()
    }),
  )

  // -----------------------------
  // Journal
  // -----------------------------
  app.get(
    '/journal',
    wrap(async (_req, res) => {
      const entries = await listJournalEntries(adapter)
      res.json(entries.map(serializeJournalEntry))
    }),
  )

  app.get(
    '/journal/:id',
    wrap(async (req, res) => {
      const entry = await getJournalEntry(adapter, parseId(req.params.id, 'Journal entry'))
      res.json(serializeJournalEntry(entry))
    }),
  )

  app.post(
    '/journal',
    wrap(async (req, res) => {
      const body = parseRequest(JournalCreateSchema, req.body, 'journal entry')
      const entry = await createJournalEntry(adapter, {
        entryType: body.entry_type,
        content: body.content,
        timestamp: body.timestamp,
      })
      res.status(201).json(serializeJournalEntry(entry))
    }),
  )

  app.put(
    '/journal/:id',
    wrap(async (req, res) => {
      const id = parseId(req.params.id, 'Journal entry')
      const body = parseRequest(JournalUpdateSchema, req.body, 'journal entry update')
      const update: JournalEntryUpdate = {}
      if (body.content !== undefined) update.content = body.content
      if (body.timestamp !== undefined) update.timestamp = body.timestamp
      const entry = await updateJournalEntry(adapter, id, update)
      res.json(serializeJournalEntry(entry))
    }),
  )

  app.delete(
    '/journal/:id',
    wrap(async (req, res) => {
      await deleteJournalEntry(adapter, parseId(req.params.id, 'Journal entry'))
      res.status(204).end()
    }),
  )
}
