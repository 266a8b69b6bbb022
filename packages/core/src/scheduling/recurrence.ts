/**
 * Recurrence Expander
 *
 * Expands a recurring setting into concrete task instances over a horizon.
 * Supported patterns: "daily" and "weekly, <Weekday>[, <Weekday>...]".
 */

import { DateTime } from 'luxon'
import { ValidationError } from '../errors.js'
import { WEEKDAYS } from '../types.js'
import type { CreateTaskInput, RecurringSetting, Task, Weekday } from '../types.js'

export type RecurrencePattern =
  | { frequency: 'daily' }
  | { frequency: 'weekly'; weekdays: Weekday[] }

export interface ExpansionOptions {
  /** First day of the horizon (its time of day is ignored) */
  start: Date
  /** Horizon length in weeks */
  weeks: number
  /** Zone in which occurrence days begin and end */
  zone: string
}

/** A task instance ready to be inserted */
export type TaskInstance = CreateTaskInput & {
  notBefore: Date
  recurrenceId: string
  occurrenceDate: string
}

const WEEKDAY_LOOKUP = new Map<string, Weekday>(WEEKDAYS.map((day) => [day.toLowerCase(), day]))

export function parseRecurrencePattern(pattern: string): RecurrencePattern {
  const parts = pattern
    .split(',')
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0)

  const [frequency, ...rest] = parts

  if (frequency === 'daily' && rest.length === 0) {
    return { frequency: 'daily' }
  }

  if (frequency === 'weekly' && rest.length > 0) {
    const weekdays: Weekday[] = []
    for (const name of rest) {
      const day = WEEKDAY_LOOKUP.get(name)
      if (!day) {
        throw new ValidationError(`Unknown weekday "${name}" in recurring pattern "${pattern}"`)
      }
      if (!weekdays.includes(day)) weekdays.push(day)
    }
    return { frequency: 'weekly', weekdays }
  }

  throw new ValidationError(
    `Unsupported recurring pattern "${pattern}" (expected "daily" or "weekly, <Weekday>")`,
  )
}

function matches(pattern: RecurrencePattern, weekday: Weekday): boolean {
  return pattern.frequency === 'daily' || pattern.weekdays.includes(weekday)
}

/**
 * Lazily yield one instance per matching day in [start day, start day + weeks).
 * Each instance may run any time on its day. The same options always yield
 * the same sequence.
 */
export function* expandRecurrence(
  setting: RecurringSetting,
  template: Task,
  options: ExpansionOptions,
): Generator<TaskInstance, void, undefined> {
  if (!Number.isInteger(options.weeks) || options.weeks <= 0) {
    throw new ValidationError(`Horizon must be a positive number of weeks (got ${options.weeks})`)
  }
  if (setting.taskId !== template.id) {
    throw new ValidationError(
      `Recurring setting ${setting.id} points at task ${setting.taskId}, not ${template.id}`,
    )
  }

  const pattern = parseRecurrencePattern(setting.pattern)
  const first: DateTime = DateTime.fromJSDate(options.start, { zone: options.zone }).startOf('day')
  const end = first.plus({ weeks: options.weeks }).toMillis()

  for (let day = first; day.toMillis() < end; day = day.plus({ days: 1 })) {
    const weekday = WEEKDAYS[day.weekday - 1]
    if (!matches(pattern, weekday)) continue

    const occurrenceDate = day.toFormat('yyyy-MM-dd')
    yield {
      name: `${template.name} (${occurrenceDate})`,
      category: template.category,
      duration: template.duration,
      priority: template.priority,
      kind: 'task',
      notBefore: day.toJSDate(),
      deadline: day.plus({ days: 1 }).startOf('day').toJSDate(),
      recurrenceId: setting.id,
      occurrenceDate,
    }
  }
}
