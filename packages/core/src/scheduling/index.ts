/**
 * Scheduling System: Module Exports
 */

export {
  buildAvailabilityIndex,
  openWindowsBetween,
  mergeIntervals,
  parseClockTime,
  isEmptyIndex,
} from './availability.js'
export type { AvailabilityIndex, DatedWindow, MinuteInterval } from './availability.js'
export { compareTasks, orderPendingTasks } from './queue.js'
export { allocateSlots, CapacityLedger, DEFAULT_SLOT_MINUTES } from './allocator.js'
export type { AllocationRequest, AllocationResult, Placement } from './allocator.js'
export { expandRecurrence, parseRecurrencePattern } from './recurrence.js'
export type { ExpansionOptions, RecurrencePattern, TaskInstance } from './recurrence.js'
export { validateTask } from './validation.js'
export { SchedulingService } from './service.js'
export type { SchedulingServiceConfig } from './service.js'
export type { SchedulingStore, SchedulingRunResult, FailedTask } from './types.js'
