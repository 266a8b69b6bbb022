import { ValidationError } from '../errors.js'
import type { Task } from '../types.js'

/**
 * Check the constraints a task must satisfy before it can be allocated.
 *
 * @throws ValidationError naming the offending task
 */
export function validateTask(task: Task): void {
  if (task.name.trim().length === 0) {
    throw new ValidationError(`Task ${task.id}: name must not be empty`, task.id)
  }
  if (!Number.isInteger(task.duration) || task.duration <= 0) {
    throw new ValidationError(
      `Task ${task.id}: duration must be a positive number of minutes (got ${task.duration})`,
      task.id,
    )
  }
  if (!Number.isFinite(task.priority) || task.priority < 0 || task.priority > 1) {
    throw new ValidationError(
      `Task ${task.id}: priority must be between 0 and 1 (got ${task.priority})`,
      task.id,
    )
  }
  if (Number.isNaN(task.deadline.getTime())) {
    throw new ValidationError(`Task ${task.id}: deadline is not a valid date`, task.id)
  }
  if (task.notBefore && task.deadline.getTime() <= task.notBefore.getTime()) {
    throw new ValidationError(
      `Task ${task.id}: deadline ${task.deadline.toISOString()} must be after notBefore ${task.notBefore.toISOString()}`,
      task.id,
    )
  }
}
