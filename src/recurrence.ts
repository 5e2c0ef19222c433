/**
 * Recurrence Expansion
 *
 * Turns a recurring template task into a bounded, eagerly materialized series
 * of sibling tasks. Each cadence has a fixed period and a fixed horizon of
 * roughly three months; nothing is generated lazily later.
 */

import { randomUUID } from 'crypto'
import { addDays, compareDates, type LocalDate } from './time-date'
import type { NewTask, RecurrenceCadence, Task } from './types'

// ============================================================================
// Cadence Table
// ============================================================================

export type CadenceRule = {
  periodDays: number
  count: number
}

export const CADENCE_RULES: Readonly<Record<RecurrenceCadence, CadenceRule>> = {
  daily: { periodDays: 1, count: 90 },
  weekly: { periodDays: 7, count: 12 },
}

export function isRecurrenceCadence(value: string | null): value is RecurrenceCadence {
  return value !== null && Object.prototype.hasOwnProperty.call(CADENCE_RULES, value)
}

/** Last date a stored due date may hold; later dates no longer sort or parse as YYYY-MM-DD. */
export const MAX_DUE_DATE = '9999-12-31' as LocalDate

/** Due date of the last sibling a template due on `dueDate` would generate. */
export function seriesEndDate(dueDate: LocalDate, cadence: RecurrenceCadence): LocalDate {
  const rule = CADENCE_RULES[cadence]
  return addDays(dueDate, rule.periodDays * rule.count)
}

export function seriesFitsCalendar(dueDate: LocalDate, cadence: RecurrenceCadence): boolean {
  const end = seriesEndDate(dueDate, cadence)
  return end.length === MAX_DUE_DATE.length && compareDates(end, MAX_DUE_DATE) <= 0
}

/** Fresh opaque identity for a new series. */
export function newRecurrenceGroupId(): string {
  return randomUUID()
}

// ============================================================================
// Expansion
// ============================================================================

/**
 * Siblings for `template`, ordered by due date.
 *
 * Returns an empty list unless the template is flagged recurring, has a known
 * cadence and has a due date. An unknown cadence such as `monthly` is not an
 * error: the template is simply stored alone.
 */
export function expandRecurringTask(template: Task | NewTask): NewTask[] {
  if (!template.isRecurring || !isRecurrenceCadence(template.recurrenceType)) return []
  const baseDate = template.dueDate
  if (baseDate === null) return []

  const rule = CADENCE_RULES[template.recurrenceType]
  const siblings: NewTask[] = []
  for (let i = 1; i <= rule.count; i++) {
    siblings.push({
      title: template.title,
      description: template.description,
      isRecurring: template.isRecurring,
      recurrenceType: template.recurrenceType,
      recurrenceGroupId: template.recurrenceGroupId,
      startTime: template.startTime,
      endTime: template.endTime,
      dueDate: addDays(baseDate, rule.periodDays * i),
      isCompleted: false,
      timeTrackedSeconds: 0,
    })
  }
  return siblings
}
