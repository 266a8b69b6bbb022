/**
 * Scheduling System: Collaborator and Result Types
 */

import type { CategoryId } from '../categories.js'
import type { FinalTaskStatus, LogEntry, ScheduleWindow, Task } from '../types.js'
import type { Placement } from './allocator.js'

/**
 * What the scheduler needs from persistence. SchedulerDatabase implements it
 * over SQLite; tests may supply an in-memory fake.
 */
export interface SchedulingStore {
  /** Pending, non-template tasks, optionally limited to one category */
  listPendingTasks(category?: CategoryId): Task[]

  listScheduleWindows(category: CategoryId): ScheduleWindow[]

  /** Write start_time on a pending task. False if the task is missing or no longer pending. */
  assign(taskId: string, startTime: Date): boolean

  /** Move a pending task to a final status. False if the task is missing or no longer pending. */
  markStatus(taskId: string, status: FinalTaskStatus): boolean

  appendLog(taskId: string, message: string): LogEntry
}

export interface FailedTask {
  taskId: string
  reason: string
}

/**
 * Outcome of one allocation pass over a category
 */
export interface SchedulingRunResult {
  category: CategoryId
  startedAt: Date
  scheduled: Placement[]
  failed: FailedTask[]
  /** Placements the store refused because the task changed during the pass */
  skipped: string[]
}
