/**
 * Scheduling Domain Types
 *
 * Row-level shapes of the five tables (tasks, users, logs, schedules,
 * recurring_settings) as the rest of the system sees them.
 */

import type { CategoryId } from './categories.js'

/**
 * Task lifecycle status. A task leaves `pending` exactly once.
 */
export type TaskStatus = 'pending' | 'completed' | 'failed'

/** Terminal statuses a pending task can move to */
export type FinalTaskStatus = Exclude<TaskStatus, 'pending'>

/**
 * `template` rows are the task definitions recurring settings point at.
 * They are never scheduled themselves.
 */
export type TaskKind = 'task' | 'template'

export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const

export type Weekday = (typeof WEEKDAYS)[number]

export interface Task {
  /** Unique identifier: task-{ulid} */
  id: string

  name: string

  kind: TaskKind

  category: CategoryId

  /** Assigned by the allocator, null until scheduled */
  startTime: Date | null

  /** Earliest permitted start, null when unconstrained */
  notBefore: Date | null

  deadline: Date

  /** Length of the slot in minutes */
  duration: number

  /** 0.0 to 1.0, higher wins ties on deadline */
  priority: number

  status: TaskStatus

  /** Recurring setting this instance was expanded from */
  recurrenceId: string | null

  /** yyyy-MM-dd of the occurrence, for recurring instances */
  occurrenceDate: string | null

  createdAt: Date
  updatedAt: Date
}

export interface CreateTaskInput {
  name: string
  category: CategoryId
  deadline: Date
  duration: number
  priority: number
  notBefore?: Date | null
  kind?: TaskKind
  recurrenceId?: string | null
  occurrenceDate?: string | null
}

export interface ListTasksFilter {
  status?: TaskStatus | TaskStatus[]
  category?: CategoryId
  kind?: TaskKind
}

export interface User {
  /** Unique identifier: user-{ulid} */
  id: string
  email: string
  name: string | null
  createdAt: Date
  updatedAt: Date
}

export interface CreateUserInput {
  email: string
  name?: string | null
}

/**
 * One row of the `schedules` table: a weekly window during which tasks
 * of a category may run. Hours are wall-clock `HH:MM[:SS]` strings.
 */
export interface ScheduleWindow {
  /** Unique identifier: sched-{ulid} */
  id: string
  category: CategoryId
  dayOfWeek: Weekday
  startHour: string
  endHour: string
}

export type CreateScheduleWindowInput = Omit<ScheduleWindow, 'id'>

export interface RecurringSetting {
  /** Unique identifier: rec-{ulid} */
  id: string
  userId: string
  /** Template task the instances inherit from */
  taskId: string
  /** e.g. "weekly, Monday" */
  pattern: string
  createdAt: Date
}

export type CreateRecurringSettingInput = Pick<RecurringSetting, 'userId' | 'taskId' | 'pattern'>

/**
 * Append-only log line attached to a task
 */
export interface LogEntry {
  id: number
  taskId: string
  message: string
  loggedAt: Date
}
