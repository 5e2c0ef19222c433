/**
 * Series-Scoped Deletion
 *
 * A task delete either removes one row or, for a member of a recurring series,
 * that member and every later one. "Later" is decided purely by due date within
 * the group, so no links between siblings are stored.
 */

import type { Adapter } from './adapter'
import { NotFoundError } from './errors'
import { logger } from './logger'
import type { DeleteScope, LocalDate, Task } from './types'

export type DeletionPlan =
  | { kind: 'single'; id: number }
  | { kind: 'series'; groupId: string; fromDate: LocalDate }

/**
 * Decides what a delete of `task` under `scope` removes. A task outside a
 * series, or without a due date to threshold on, always degrades to a single
 * delete. The series threshold is inclusive of the task's own due date.
 */
export function resolveDeletion(task: Task, scope: DeleteScope): DeletionPlan {
  if (scope === 'series_from_here' && task.recurrenceGroupId !== null && task.dueDate !== null) {
    return { kind: 'series', groupId: task.recurrenceGroupId, fromDate: task.dueDate }
  }
  return { kind: 'single', id: task.id }
}

/** Returns the number of tasks removed. */
export async function deleteTask(
  adapter: Adapter,
  id: number,
  scope: DeleteScope = 'single'
): Promise<number> {
  const deleted = await adapter.transaction(async () => {
    const task = await adapter.getTask(id)
    if (!task) {
      throw new NotFoundError(`Task '${id}' not found`)
    }

    const plan = resolveDeletion(task, scope)
    if (plan.kind === 'series') {
      return adapter.deleteTasksInGroupFrom(plan.groupId, plan.fromDate)
    }
    await adapter.deleteTask(plan.id)
    return 1
  })

  logger.info('[tasks] Task deleted:', { id, scope, deleted })
  return deleted
}
