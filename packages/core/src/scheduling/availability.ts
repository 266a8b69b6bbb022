/**
 * Availability Index
 *
 * Turns the `schedules` rows of one category into merged weekly intervals,
 * and materialises those into dated windows for an allocation pass.
 */

import { DateTime } from 'luxon'
import { ConfigError } from '../errors.js'
import { WEEKDAYS } from '../types.js'
import type { CategoryId } from '../categories.js'
import type { ScheduleWindow, Weekday } from '../types.js'

const MINUTES_PER_DAY = 24 * 60

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/

/** Half-open [start, end) interval in minutes after local midnight */
export interface MinuteInterval {
  start: number
  end: number
}

export interface AvailabilityIndex {
  category: CategoryId
  days: ReadonlyMap<Weekday, readonly MinuteInterval[]>
}

/** A weekly interval pinned to a calendar day */
export interface DatedWindow {
  weekday: Weekday
  start: Date
  end: Date
}

/**
 * Parse `HH:MM` or `HH:MM:SS` into minutes after midnight.
 * `24:00` is the only accepted value past 23:59.
 */
export function parseClockTime(value: string): number {
  const match = CLOCK_PATTERN.exec(value.trim())
  if (!match) {
    throw new ConfigError(`Invalid time "${value}" (expected HH:MM or HH:MM:SS)`)
  }

  const hours = Number(match[1])
  const minutes = Number(match[2])
  const seconds = match[3] === undefined ? 0 : Number(match[3])

  if (minutes > 59 || seconds > 59) {
    throw new ConfigError(`Invalid time "${value}"`)
  }
  if (seconds !== 0) {
    throw new ConfigError(`Invalid time "${value}": windows have minute precision`)
  }

  const total = hours * 60 + minutes
  if (total > MINUTES_PER_DAY) {
    throw new ConfigError(`Invalid time "${value}": past the end of the day`)
  }
  return total
}

/**
 * Merge overlapping and adjacent intervals. Input order does not matter.
 */
export function mergeIntervals(intervals: readonly MinuteInterval[]): MinuteInterval[] {
  const sorted = [...intervals].sort((a, b) => a.start - b.start || a.end - b.end)
  const merged: MinuteInterval[] = []

  for (const interval of sorted) {
    const last = merged[merged.length - 1]
    if (last && interval.start <= last.end) {
      last.end = Math.max(last.end, interval.end)
    } else {
      merged.push({ ...interval })
    }
  }

  return merged
}

/**
 * Build the weekly availability of one category.
 *
 * @throws ConfigError if a row has start_hour >= end_hour or belongs to another category
 */
export function buildAvailabilityIndex(
  category: CategoryId,
  windows: readonly ScheduleWindow[],
): AvailabilityIndex {
  const byDay = new Map<Weekday, MinuteInterval[]>()

  for (const window of windows) {
    if (window.category !== category) {
      throw new ConfigError(
        `Schedule window ${window.id} belongs to "${window.category}", not "${category}"`,
      )
    }

    const start = parseClockTime(window.startHour)
    const end = parseClockTime(window.endHour)
    if (start >= end) {
      throw new ConfigError(
        `Schedule window ${window.id} (${window.dayOfWeek} ${window.startHour}-${window.endHour}): start must be before end`,
      )
    }

    const list = byDay.get(window.dayOfWeek) ?? []
    list.push({ start, end })
    byDay.set(window.dayOfWeek, list)
  }

  const days = new Map<Weekday, readonly MinuteInterval[]>()
  for (const day of WEEKDAYS) {
    const intervals = byDay.get(day)
    if (intervals) {
      days.set(day, mergeIntervals(intervals))
    }
  }

  return { category, days }
}

export function isEmptyIndex(index: AvailabilityIndex): boolean {
  return index.days.size === 0
}

/**
 * Concrete windows that overlap [from, to), in chronological order.
 * Wall-clock hours are read in `zone`, so DST days keep their local hours.
 */
export function openWindowsBetween(
  index: AvailabilityIndex,
  from: Date,
  to: Date,
  zone: string,
): DatedWindow[] {
  const result: DatedWindow[] = []
  if (to.getTime() <= from.getTime()) {
    return result
  }

  const lastDay = DateTime.fromJSDate(to, { zone }).startOf('day').toMillis()
  let day: DateTime = DateTime.fromJSDate(from, { zone }).startOf('day')

  while (day.toMillis() <= lastDay) {
    const weekday = WEEKDAYS[day.weekday - 1]
    const intervals = index.days.get(weekday) ?? []

    for (const interval of intervals) {
      const start = atMinute(day, interval.start).toJSDate()
      const end = atMinute(day, interval.end).toJSDate()
      if (end.getTime() > from.getTime() && start.getTime() < to.getTime()) {
        result.push({ weekday, start, end })
      }
    }

    day = day.plus({ days: 1 })
  }

  return result
}

function atMinute(day: DateTime, minutes: number): DateTime {
  if (minutes >= MINUTES_PER_DAY) {
    return day.plus({ days: 1 }).startOf('day')
  }
  return day.set({ hour: Math.floor(minutes / 60), minute: minutes % 60 })
}
