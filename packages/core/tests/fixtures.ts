/**
 * Shared builders for scheduling tests.
 *
 * All dates are UTC. 2025-01-20 is a Monday.
 */

import { CategoryRegistry } from '../src/categories.js'
import type { CategoryId } from '../src/categories.js'
import type { ScheduleWindow, Task, Weekday } from '../src/types.js'

export const categories = new CategoryRegistry(['work', 'private', 'exercise'])
export const WORK: CategoryId = categories.resolve('work')
export const PRIVATE: CategoryId = categories.resolve('private')

export const MONDAY = '2025-01-20'
export const TUESDAY = '2025-01-21'

export function at(day: string, time: string): Date {
  return new Date(`${day}T${time}:00.000Z`)
}

export function makeTask(id: string, overrides: Partial<Task> = {}): Task {
  const epoch = new Date(0)
  return {
    id,
    name: id,
    kind: 'task',
    category: WORK,
    startTime: null,
    notBefore: null,
    deadline: at(MONDAY, '17:00'),
    duration: 60,
    priority: 0.5,
    status: 'pending',
    recurrenceId: null,
    occurrenceDate: null,
    createdAt: epoch,
    updatedAt: epoch,
    ...overrides,
  }
}

let windowSeq = 0

export function makeWindow(
  dayOfWeek: Weekday,
  startHour: string,
  endHour: string,
  category: CategoryId = WORK,
): ScheduleWindow {
  windowSeq += 1
  return { id: `sched-${windowSeq}`, category, dayOfWeek, startHour, endHour }
}
