/**
 * Scheduling Service
 *
 * Runs allocation passes against a SchedulingStore and applies the
 * results: start times for placed tasks, `failed` for the rest, and one
 * log entry per outcome. Passes over the same category never overlap.
 */

import { ConfigError, ConflictError, ValidationError } from '../errors.js'
import { silentLogger } from '../logger.js'
import { KeyedMutex } from '../utils/keyed-mutex.js'
import { allocateSlots, DEFAULT_SLOT_MINUTES } from './allocator.js'
import { buildAvailabilityIndex } from './availability.js'
import { validateTask } from './validation.js'
import type { AvailabilityIndex } from './availability.js'
import type { CategoryId, CategoryRegistry } from '../categories.js'
import type { Logger } from '../logger.js'
import type { FinalTaskStatus } from '../types.js'
import type { SchedulingRunResult, SchedulingStore } from './types.js'

export interface SchedulingServiceConfig {
  store: SchedulingStore
  categories: CategoryRegistry
  /** IANA zone schedule windows are written in */
  zone: string
  slotMinutes?: number
  logger?: Logger
  clock?: () => Date
  /** Shared lock, when several services front the same store */
  mutex?: KeyedMutex
}

export class SchedulingService {
  private store: SchedulingStore
  private categories: CategoryRegistry
  private zone: string
  private slotMinutes: number
  private logger: Logger
  private clock: () => Date
  private mutex: KeyedMutex

  constructor(config: SchedulingServiceConfig) {
    this.store = config.store
    this.categories = config.categories
    this.zone = config.zone
    this.slotMinutes = config.slotMinutes ?? DEFAULT_SLOT_MINUTES
    this.logger = config.logger ?? silentLogger()
    this.clock = config.clock ?? (() => new Date())
    this.mutex = config.mutex ?? new KeyedMutex()
  }

  /**
   * Allocate every unscheduled pending task of one category.
   *
   * @throws ConfigError if the category's windows are malformed
   * @throws ValidationError if a pending task breaks a constraint (logged against that task)
   */
  async runCategory(category: CategoryId): Promise<SchedulingRunResult> {
    const key = `category:${category}`
    if (this.mutex.isLocked(key)) {
      this.logger.debug({ category }, 'Waiting for the running scheduling pass')
    }
    return this.mutex.runExclusive(key, () => this.allocate(category))
  }

  /**
   * Run every registered category in order. Stops at the first batch error.
   */
  async runAll(): Promise<SchedulingRunResult[]> {
    const results: SchedulingRunResult[] = []
    for (const category of this.categories.list()) {
      results.push(await this.runCategory(category))
    }
    return results
  }

  /**
   * Complete or fail a pending task by hand.
   *
   * @throws ConflictError if the task is missing or already final
   */
  markStatus(taskId: string, status: FinalTaskStatus): void {
    if (!this.store.markStatus(taskId, status)) {
      throw new ConflictError(`Task ${taskId} is not pending`)
    }
    this.store.appendLog(taskId, `Marked ${status}`)
    this.logger.info({ taskId, status }, 'Task status changed')
  }

  private allocate(category: CategoryId): SchedulingRunResult {
    const startedAt = this.clock()
    const log = this.logger.child({ category })

    const availability = this.loadAvailability(category, log)

    const tasks = this.store.listPendingTasks(category)
    for (const task of tasks) {
      try {
        validateTask(task)
      } catch (err) {
        if (err instanceof ValidationError) {
          this.store.appendLog(task.id, `Scheduling aborted: ${err.message}`)
          log.error({ taskId: task.id, err }, 'Aborting scheduling run: invalid task')
        }
        throw err
      }
    }

    const allocation = allocateSlots({
      availability,
      tasks,
      now: startedAt,
      zone: this.zone,
      slotMinutes: this.slotMinutes,
    })

    const result: SchedulingRunResult = {
      category,
      startedAt,
      scheduled: [],
      failed: [],
      skipped: [],
    }

    for (const placement of allocation.placements) {
      if (!this.store.assign(placement.taskId, placement.start)) {
        log.warn({ taskId: placement.taskId }, 'Task changed during scheduling run, skipped')
        result.skipped.push(placement.taskId)
        continue
      }
      this.store.appendLog(
        placement.taskId,
        `Scheduled ${placement.start.toISOString()} - ${placement.end.toISOString()}`,
      )
      result.scheduled.push(placement)
    }

    for (const failure of allocation.failures) {
      if (!this.store.markStatus(failure.taskId, 'failed')) {
        log.warn({ taskId: failure.taskId }, 'Task changed during scheduling run, skipped')
        result.skipped.push(failure.taskId)
        continue
      }
      this.store.appendLog(failure.taskId, `Unschedulable: ${failure.message}`)
      result.failed.push({ taskId: failure.taskId, reason: failure.message })
    }

    log.info(
      {
        scheduled: result.scheduled.length,
        failed: result.failed.length,
        skipped: result.skipped.length,
        freeMinutes: allocation.freeMinutes,
      },
      'Scheduling run finished',
    )

    return result
  }

  private loadAvailability(category: CategoryId, log: Logger): AvailabilityIndex {
    try {
      return buildAvailabilityIndex(category, this.store.listScheduleWindows(category))
    } catch (err) {
      if (err instanceof ConfigError) {
        log.error({ err }, 'Aborting scheduling run: invalid schedule windows')
      }
      throw err
    }
  }
}
