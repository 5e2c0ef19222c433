/**
 * planner-backend
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  PlannerError, PlannerErrorCode,
  DuplicateKeyError, NotFoundError, InvalidDataError,
  ValidationError, ParseError,
  isPlannerError,
} from './errors'
export type { PlannerErrorCode as PlannerErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date (branded types + utilities)
export type { LocalDate, Instant } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, parseInstant, parseDueDate, parseInstantInput,
  makeDate, yearOf, monthOf, dayOf, dateOf, offsetMinutesOf,
  instantFromDate, nowInstant,
  addDays, daysBetween, instantToEpochMs,
  compareDates, compareInstants,
} from './time-date'

// Entities
export type {
  Task, Event, JournalEntry,
  NewTask, NewEvent, NewJournalEntry,
  TaskChanges, EventChanges, JournalEntryChanges,
  JsonPrimitive, JsonValue,
  RecurrenceCadence, DeleteScope,
} from './types'
export { DELETE_SCOPES } from './types'

// Record store
export type { Adapter } from './adapter'
export { createMockAdapter } from './adapter'
export type { SqliteAdapter, SqliteExtras } from './sqlite-adapter'
export { createSqliteAdapter, SCHEMA_VERSION } from './sqlite-adapter'

// Recurrence
export type { CadenceRule } from './recurrence'
export { CADENCE_RULES, isRecurrenceCadence, newRecurrenceGroupId, expandRecurringTask } from './recurrence'

// Tasks
export type { TaskInput, TaskUpdate } from './tasks'
export { createTask, getTask, listTasks, updateTask, resolveTaskChanges } from './tasks'
export type { DeletionPlan } from './series-deletion'
export { deleteTask, resolveDeletion } from './series-deletion'

// Events
export type { EventInput, EventUpdate } from './events'
export { createEvent, getEvent, listEvents, updateEvent, deleteEvent, resolveEventChanges } from './events'

// Journal
export type { JournalEntryInput, JournalEntryUpdate } from './journal'
export {
  createJournalEntry, getJournalEntry, listJournalEntries,
  updateJournalEntry, deleteJournalEntry,
  resolveJournalEntryChanges, isEmptyContent,
} from './journal'

// Wire format
export type { TaskV1, EventV1, JournalEntryV1 } from './serialization'
export {
  SERIALIZATION_VERSION, SCHEMA_VERSION_HEADER,
  serializeTask, serializeEvent, serializeJournalEntry,
} from './serialization'

// HTTP
export type { AppOptions } from './http/app'
export { createApp } from './http/app'
export { errorHandler, notFoundHandler, statusForCode } from './http/errors'
export { registerRoutes } from './http/routes'

// Ambient
export type { Logger, LogLevel } from './logger'
export { LOG_LEVELS, createLogger, defaultLogLevel, isLogLevel, logger, setLogLevel, getLogLevel } from './logger'
export type { PlannerConfig } from './config'
export { loadConfig } from './config'
