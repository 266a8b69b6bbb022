export { SchedulerDatabase, IN_MEMORY } from './database.js'
export type { SchedulerDatabaseOptions } from './database.js'
