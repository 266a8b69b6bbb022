// Public API for consumption by other packages (server)

export type {
  Task,
  TaskStatus,
  FinalTaskStatus,
  TaskKind,
  Weekday,
  CreateTaskInput,
  ListTasksFilter,
  User,
  CreateUserInput,
  ScheduleWindow,
  CreateScheduleWindowInput,
  RecurringSetting,
  CreateRecurringSettingInput,
  LogEntry,
} from './types.js'
export { WEEKDAYS } from './types.js'

export { CategoryRegistry, DEFAULT_CATEGORIES } from './categories.js'
export type { CategoryId } from './categories.js'

export {
  SchedulerError,
  ConfigError,
  ValidationError,
  UnschedulableError,
  NotFoundError,
  ConflictError,
  isSchedulerError,
} from './errors.js'
export type { SchedulerErrorCode } from './errors.js'

export { loadConfig, findDataDir } from './config.js'
export type { TimeslotConfig } from './config.js'

export { createLogger, silentLogger } from './logger.js'
export type { Logger, LoggerOptions } from './logger.js'

// Scheduling
export * from './scheduling/index.js'

// Persistence
export * from './store/index.js'

// Input parsing
export {
  parseCategory,
  parseTaskInput,
  parseListTasksQuery,
  parseStatusInput,
  parseUserInput,
  parseScheduleWindowInput,
  parseRecurringSettingInput,
  parseExpandInput,
} from './schemas.js'
export type { ExpandInput } from './schemas.js'

export { KeyedMutex } from './utils/keyed-mutex.js'
