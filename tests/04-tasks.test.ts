/**
 * Segment 04: Task CRUD Tests
 *
 * Creation validates input, assigns series identity and stores a recurring
 * template together with its siblings in one transaction.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { createMockAdapter, type Adapter } from '../src/adapter'
import { NotFoundError, ValidationError } from '../src/errors'
import { createTask, getTask, listTasks, resolveTaskChanges, updateTask } from '../src/tasks'

let adapter: Adapter

beforeEach(() => {
  adapter = createMockAdapter()
})

// ============================================================================
// 1. CREATION
// ============================================================================

describe('createTask', () => {
  it('stores a one-off task with defaults', async () => {
    const task = await createTask(adapter, { title: 'File taxes', dueDate: '2025-04-15' })
    expect(task).toMatchObject({
      id: 1,
      title: 'File taxes',
      description: null,
      isRecurring: false,
      recurrenceType: null,
      isCompleted: false,
      dueDate: '2025-04-15',
      startTime: null,
      endTime: null,
      timeTrackedSeconds: 0,
      recurrenceGroupId: null,
    })
    expect(await listTasks(adapter)).toHaveLength(1)
  })

  it('expands a daily task into 91 rows sharing one group', async () => {
    const template = await createTask(adapter, {
      title: 'Stretch',
      dueDate: '2025-01-01',
      isRecurring: true,
      recurrenceType: 'daily',
    })
    const all = await listTasks(adapter)
    expect(all).toHaveLength(91)
    expect(template.recurrenceGroupId).not.toBeNull()
    expect(new Set(all.map((t) => t.recurrenceGroupId))).toEqual(new Set([template.recurrenceGroupId]))
    expect(all[0]?.id).toBe(template.id)
    expect(all[90]?.dueDate).toBe('2025-04-01')
  })

  it('expands a weekly task into 13 rows', async () => {
    await createTask(adapter, { title: 'Review', dueDate: '2025-01-06', isRecurring: true, recurrenceType: 'weekly' })
    const all = await listTasks(adapter)
    expect(all).toHaveLength(13)
    expect(all[12]?.dueDate).toBe('2025-03-31')
  })

  it('stores an unknown cadence alone but still in a group', async () => {
    const task = await createTask(adapter, {
      title: 'Pay rent',
      dueDate: '2025-01-01',
      isRecurring: true,
      recurrenceType: 'monthly',
    })
    expect(await listTasks(adapter)).toHaveLength(1)
    expect(task.recurrenceType).toBe('monthly')
    expect(task.recurrenceGroupId).toMatch(/^[0-9a-f-]{36}$/)
  })

  it('gives separate series distinct groups', async () => {
    const a = await createTask(adapter, { title: 'A', dueDate: '2025-01-01', isRecurring: true, recurrenceType: 'weekly' })
    const b = await createTask(adapter, { title: 'B', dueDate: '2025-01-01', isRecurring: true, recurrenceType: 'weekly' })
    expect(a.recurrenceGroupId).not.toBe(b.recurrenceGroupId)
  })

  it('takes the calendar date of an instant due date', async () => {
    const task = await createTask(adapter, { title: 'Call', dueDate: '2025-03-10T23:30:00-05:00' })
    expect(task.dueDate).toBe('2025-03-10')
  })

  it('normalizes start and end instants', async () => {
    const task = await createTask(adapter, {
      title: 'Gym',
      dueDate: '2025-03-10',
      startTime: '2025-03-10T18:00:00Z',
      endTime: '2025-03-10 19:00:00+0100',
    })
    expect(task.startTime).toBe('2025-03-10T18:00:00+00:00')
    expect(task.endTime).toBe('2025-03-10T19:00:00+01:00')
  })

  it('requires a title', async () => {
    await expect(createTask(adapter, { dueDate: '2025-01-01' })).rejects.toThrow(
      new ValidationError('title is required')
    )
    await expect(createTask(adapter, { title: '   ', dueDate: '2025-01-01' })).rejects.toThrow('title is required')
  })

  it('requires a due date', async () => {
    await expect(createTask(adapter, { title: 'Loose end' })).rejects.toThrow('due_date is required')
  })

  it('rejects an unparseable due date', async () => {
    await expect(createTask(adapter, { title: 'X', dueDate: 'tomorrow' })).rejects.toThrow(
      "Invalid due_date: Invalid date: 'tomorrow'"
    )
  })

  it('rejects a naive start time', async () => {
    const attempt = createTask(adapter, { title: 'X', dueDate: '2025-01-01', startTime: '2025-01-01T10:00:00' })
    await expect(attempt).rejects.toBeInstanceOf(ValidationError)
    expect(await listTasks(adapter)).toEqual([])
  })

  it('rejects a series that would run past 9999-12-31', async () => {
    await expect(
      createTask(adapter, { title: 'Stretch', dueDate: '9999-12-30', isRecurring: true, recurrenceType: 'daily' })
    ).rejects.toThrow(new ValidationError('due_date is too late: the daily series would run past 9999-12-31'))
    await expect(
      createTask(adapter, { title: 'Review', dueDate: '9999-10-09', isRecurring: true, recurrenceType: 'weekly' })
    ).rejects.toThrow('due_date is too late: the weekly series would run past 9999-12-31')
    expect(await listTasks(adapter)).toEqual([])
  })

  it('accepts a series ending on 9999-12-31', async () => {
    await createTask(adapter, { title: 'Stretch', dueDate: '9999-10-02', isRecurring: true, recurrenceType: 'daily' })
    const all = await listTasks(adapter)
    expect(all).toHaveLength(91)
    expect(all[90]?.dueDate).toBe('9999-12-31')
  })

  it('still accepts late dates outside a cadenced series', async () => {
    await createTask(adapter, { title: 'Far off', dueDate: '9999-12-31' })
    await createTask(adapter, { title: 'Rent', dueDate: '9999-12-31', isRecurring: true, recurrenceType: 'monthly' })
    expect((await listTasks(adapter)).map((t) => t.dueDate)).toEqual(['9999-12-31', '9999-12-31'])
  })

  it('stores nothing when a sibling insert fails', async () => {
    const insert = adapter.insertTask.bind(adapter)
    let calls = 0
    vi.spyOn(adapter, 'insertTask').mockImplementation(async (task) => {
      calls++
      if (calls === 5) throw new Error('disk full')
      return insert(task)
    })

    await expect(
      createTask(adapter, { title: 'Stretch', dueDate: '2025-01-01', isRecurring: true, recurrenceType: 'daily' })
    ).rejects.toThrow('disk full')
    expect(await listTasks(adapter)).toEqual([])
  })
})

// ============================================================================
// 2. READ & UPDATE
// ============================================================================

describe('getTask', () => {
  it('throws NotFoundError for a missing id', async () => {
    await expect(getTask(adapter, 999)).rejects.toThrow(new NotFoundError("Task '999' not found"))
  })
})

describe('updateTask', () => {
  it('applies the mutable fields', async () => {
    const task = await createTask(adapter, { title: 'Draft', description: 'v1', dueDate: '2025-01-01' })
    const updated = await updateTask(adapter, task.id, {
      title: 'Final',
      description: null,
      isCompleted: true,
      timeTrackedSeconds: 1800,
    })
    expect(updated).toMatchObject({
      title: 'Final',
      description: null,
      isCompleted: true,
      timeTrackedSeconds: 1800,
      dueDate: '2025-01-01',
    })
  })

  it('touches only the addressed sibling', async () => {
    await createTask(adapter, { title: 'Review', dueDate: '2025-01-06', isRecurring: true, recurrenceType: 'weekly' })
    await updateTask(adapter, 3, { isCompleted: true })
    const completed = (await listTasks(adapter)).filter((t) => t.isCompleted).map((t) => t.id)
    expect(completed).toEqual([3])
  })

  it('throws NotFoundError for a missing id', async () => {
    await expect(updateTask(adapter, 999, { isCompleted: true })).rejects.toThrow(NotFoundError)
  })
})

describe('resolveTaskChanges', () => {
  it('omits fields that were not given', () => {
    expect(resolveTaskChanges({ isCompleted: false })).toEqual({ isCompleted: false })
  })

  it('rejects a blank title', () => {
    expect(() => resolveTaskChanges({ title: '' })).toThrow('title is required')
  })

  it.each([[-1], [1.5], [Number.NaN]])('rejects tracked seconds %d', (seconds) => {
    expect(() => resolveTaskChanges({ timeTrackedSeconds: seconds })).toThrow(
      'time_tracked_seconds must be a non-negative integer'
    )
  })
})
