/**
 * Task Queue
 *
 * Read-only ordering of pending tasks: earliest deadline first, then
 * higher priority, then id.
 */

import type { Task } from '../types.js'

export function compareTasks(a: Task, b: Task): number {
  const byDeadline = a.deadline.getTime() - b.deadline.getTime()
  if (byDeadline !== 0) return byDeadline

  const byPriority = b.priority - a.priority
  if (byPriority !== 0) return byPriority

  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

/**
 * Pending tasks in allocation order. Returns a new array; the input and
 * the tasks themselves are left untouched.
 */
export function orderPendingTasks(tasks: readonly Task[]): Task[] {
  return tasks.filter((task) => task.status === 'pending').sort(compareTasks)
}
