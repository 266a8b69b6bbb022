/**
 * Scheduler Errors
 *
 * ConfigError and ValidationError abort a scheduling batch.
 * UnschedulableError is recovered per task.
 */

export type SchedulerErrorCode = 'CONFIG' | 'VALIDATION' | 'UNSCHEDULABLE' | 'NOT_FOUND' | 'CONFLICT'

export abstract class SchedulerError extends Error {
  abstract readonly code: SchedulerErrorCode

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Malformed schedule window, unknown category, or bad configuration file.
 */
export class ConfigError extends SchedulerError {
  readonly code = 'CONFIG'
}

/**
 * Input that breaks a task, window or pattern constraint.
 */
export class ValidationError extends SchedulerError {
  readonly code = 'VALIDATION'

  constructor(
    message: string,
    readonly taskId?: string,
  ) {
    super(message)
  }
}

/**
 * No window before the deadline has room for the task.
 */
export class UnschedulableError extends SchedulerError {
  readonly code = 'UNSCHEDULABLE'

  constructor(
    readonly taskId: string,
    message: string,
  ) {
    super(message)
  }
}

export class NotFoundError extends SchedulerError {
  readonly code = 'NOT_FOUND'
}

/**
 * Write rejected because of the current state (duplicate email, task no
 * longer pending).
 */
export class ConflictError extends SchedulerError {
  readonly code = 'CONFLICT'
}

export function isSchedulerError(err: unknown): err is SchedulerError {
  return err instanceof SchedulerError
}
