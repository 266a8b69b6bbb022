/**
 * Slot Allocator
 *
 * Places pending tasks of one category into that category's availability
 * windows, earliest fitting slot first, in Task Queue order.
 *
 * The allocator is a pure function of its request. Free capacity lives in
 * a ledger created for the pass and dropped when it returns; the Scheduling
 * Service applies the resulting assignments.
 */

import { UnschedulableError } from '../errors.js'
import { isEmptyIndex, openWindowsBetween } from './availability.js'
import { orderPendingTasks } from './queue.js'
import type { AvailabilityIndex, DatedWindow } from './availability.js'
import type { Task } from '../types.js'

const MS_PER_MINUTE = 60_000

export const DEFAULT_SLOT_MINUTES = 5

export interface AllocationRequest {
  availability: AvailabilityIndex
  /** Pending tasks of the category. Tasks with a startTime are kept where they are. */
  tasks: readonly Task[]
  /** Nothing is placed before this instant */
  now: Date
  /** IANA zone the weekly windows are written in */
  zone: string
  /** Start-time grid, measured from each window's start */
  slotMinutes?: number
}

export interface Placement {
  taskId: string
  start: Date
  end: Date
}

export interface AllocationResult {
  placements: Placement[]
  failures: UnschedulableError[]
  /** Minutes still open between now and the latest deadline; null when no windows were opened */
  freeMinutes: number | null
}

interface Span {
  start: number
  end: number
}

interface LedgerWindow {
  window: DatedWindow
  free: Span[]
}

/**
 * Remaining free time per dated window for a single allocation pass.
 */
export class CapacityLedger {
  private readonly windows: LedgerWindow[]

  constructor(windows: readonly DatedWindow[]) {
    this.windows = windows.map((window) => ({
      window,
      free: [{ start: window.start.getTime(), end: window.end.getTime() }],
    }))
  }

  /**
   * Remove [start, end) from every window it touches.
   */
  reserve(start: number, end: number): void {
    for (const entry of this.windows) {
      const next: Span[] = []
      for (const span of entry.free) {
        if (end <= span.start || start >= span.end) {
          next.push(span)
          continue
        }
        if (span.start < start) next.push({ start: span.start, end: start })
        if (end < span.end) next.push({ start: end, end: span.end })
      }
      entry.free = next
    }
  }

  /**
   * Earliest grid-aligned start in [earliest, latest - duration], or null.
   */
  findSlot(earliest: number, latest: number, durationMs: number, slotMs: number): number | null {
    for (const entry of this.windows) {
      const origin = entry.window.start.getTime()
      if (origin >= latest) break

      for (const span of entry.free) {
        let candidate = Math.max(span.start, earliest)
        candidate = origin + Math.ceil((candidate - origin) / slotMs) * slotMs
        if (candidate + durationMs <= Math.min(span.end, latest)) {
          return candidate
        }
      }
    }
    return null
  }

  /** Total free minutes left, across all windows */
  freeMinutes(): number {
    let total = 0
    for (const entry of this.windows) {
      for (const span of entry.free) total += span.end - span.start
    }
    return total / MS_PER_MINUTE
  }
}

export function allocateSlots(request: AllocationRequest): AllocationResult {
  const { availability, now, zone } = request
  const slotMs = (request.slotMinutes ?? DEFAULT_SLOT_MINUTES) * MS_PER_MINUTE
  const result: AllocationResult = { placements: [], failures: [], freeMinutes: null }

  const queue = orderPendingTasks(request.tasks)
  const placed = queue.filter((task) => task.startTime !== null)
  const unplaced = queue.filter((task) => task.startTime === null)

  if (unplaced.length === 0) {
    return result
  }

  if (isEmptyIndex(availability)) {
    for (const task of unplaced) {
      result.failures.push(
        new UnschedulableError(
          task.id,
          `No availability windows configured for category "${availability.category}"`,
        ),
      )
    }
    return result
  }

  let latestDeadline = -Infinity
  for (const task of unplaced) {
    latestDeadline = Math.max(latestDeadline, task.deadline.getTime())
  }
  const horizon = new Date(latestDeadline)
  const ledger = new CapacityLedger(openWindowsBetween(availability, now, horizon, zone))

  for (const task of placed) {
    if (task.startTime) {
      const start = task.startTime.getTime()
      ledger.reserve(start, start + task.duration * MS_PER_MINUTE)
    }
  }

  for (const task of unplaced) {
    const earliest = Math.max(now.getTime(), task.notBefore?.getTime() ?? 0)
    const latest = task.deadline.getTime()
    const durationMs = task.duration * MS_PER_MINUTE

    if (earliest + durationMs > latest) {
      result.failures.push(
        new UnschedulableError(
          task.id,
          `Not enough time left before deadline ${task.deadline.toISOString()} for ${task.duration} minutes`,
        ),
      )
      continue
    }

    const start = ledger.findSlot(earliest, latest, durationMs, slotMs)
    if (start === null) {
      result.failures.push(
        new UnschedulableError(
          task.id,
          `No "${availability.category}" window before ${task.deadline.toISOString()} has ${task.duration} free minutes`,
        ),
      )
      continue
    }

    ledger.reserve(start, start + durationMs)
    result.placements.push({
      taskId: task.id,
      start: new Date(start),
      end: new Date(start + durationMs),
    })
  }

  result.freeMinutes = ledger.freeMinutes()
  return result
}
