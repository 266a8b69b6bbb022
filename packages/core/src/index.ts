/**
 * timeslot-schedule: run one scheduling pass and print the placements.
 *
 * Usage: timeslot-schedule [category]
 */

import { DateTime } from 'luxon'
import { CategoryRegistry } from './categories.js'
import { loadConfig } from './config.js'
import { isSchedulerError } from './errors.js'
import { createLogger } from './logger.js'
import { SchedulingService } from './scheduling/service.js'
import { SchedulerDatabase } from './store/database.js'
import type { SchedulingRunResult } from './scheduling/types.js'

function formatRange(start: Date, end: Date, zone: string): string {
  const from = DateTime.fromJSDate(start, { zone })
  const to = DateTime.fromJSDate(end, { zone })
  return `${from.toFormat('ccc yyyy-MM-dd HH:mm')} - ${to.toFormat('HH:mm')}`
}

function printResult(result: SchedulingRunResult, db: SchedulerDatabase, zone: string): void {
  console.log(`${result.category}:`)
  if (result.scheduled.length === 0 && result.failed.length === 0) {
    console.log('  nothing to schedule')
  }
  for (const placement of result.scheduled) {
    const name = db.getTask(placement.taskId)?.name ?? placement.taskId
    console.log(`  ${name}: ${formatRange(placement.start, placement.end, zone)}`)
  }
  for (const failure of result.failed) {
    const name = db.getTask(failure.taskId)?.name ?? failure.taskId
    console.log(`  ${name}: FAILED (${failure.reason})`)
  }
}

async function main(): Promise<void> {
  const config = loadConfig()
  const logger = createLogger({
    name: 'timeslot',
    level: config.log.level,
    pretty: config.log.pretty,
  })
  const categories = new CategoryRegistry(config.categories)
  const db = new SchedulerDatabase(config.dbPath, categories)

  try {
    const service = new SchedulingService({
      store: db,
      categories,
      zone: config.timezone,
      slotMinutes: config.scheduling.slotMinutes,
      logger,
    })

    const requested = process.argv[2]
    const results = requested
      ? [await service.runCategory(categories.resolve(requested))]
      : await service.runAll()

    for (const result of results) {
      printResult(result, db, config.timezone)
    }
  } finally {
    db.close()
  }
}

main().catch((err) => {
  if (isSchedulerError(err)) {
    console.error(`Error (${err.code}): ${err.message}`)
  } else {
    console.error('Fatal error:', err)
  }
  process.exit(1)
})
