/**
 * Integration Tests: Scheduling Service
 *
 * Runs full passes against an in-memory SchedulerDatabase.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { pino } from 'pino'
import { SchedulerDatabase, IN_MEMORY } from '../src/store/database.js'
import { SchedulingService } from '../src/scheduling/service.js'
import { ConfigError, ConflictError, ValidationError } from '../src/errors.js'
import { at, categories, MONDAY, PRIVATE, WORK } from './fixtures.js'
import type { CreateTaskInput } from '../src/types.js'

const clock = () => at(MONDAY, '08:00')

function taskInput(overrides: Partial<CreateTaskInput> = {}): CreateTaskInput {
  return {
    name: 'Task',
    category: WORK,
    deadline: at(MONDAY, '13:00'),
    duration: 60,
    priority: 0.5,
    ...overrides,
  }
}

describe('SchedulingService', () => {
  let db: SchedulerDatabase
  let service: SchedulingService

  beforeEach(() => {
    db = new SchedulerDatabase(IN_MEMORY, categories, { clock })
    service = new SchedulingService({ store: db, categories, zone: 'UTC', clock })
    db.createScheduleWindow({
      category: WORK,
      dayOfWeek: 'Monday',
      startHour: '09:00',
      endHour: '13:00',
    })
  })

  afterEach(() => {
    db.close()
  })

  it('assigns start times and logs each placement', async () => {
    const a = db.createTask(taskInput({ name: 'A', duration: 120, deadline: at(MONDAY, '12:00') }))
    const b = db.createTask(taskInput({ name: 'B', duration: 90, priority: 0.9 }))

    const result = await service.runCategory(WORK)

    expect(result.category).toBe('work')
    expect(result.startedAt).toEqual(clock())
    expect(result.failed).toEqual([])
    expect(result.scheduled.map((p) => p.taskId)).toEqual([a.id, b.id])

    expect(db.getTask(a.id)?.startTime?.toISOString()).toBe('2025-01-20T09:00:00.000Z')
    expect(db.getTask(b.id)?.startTime?.toISOString()).toBe('2025-01-20T11:00:00.000Z')
    expect(db.listLogs(b.id).map((l) => l.message)).toEqual([
      'Scheduled 2025-01-20T11:00:00.000Z - 2025-01-20T12:30:00.000Z',
    ])
  })

  it('fails a task that does not fit and carries on with the rest', async () => {
    const big = db.createTask(taskInput({ name: 'Big', duration: 300, deadline: at(MONDAY, '14:00') }))
    const small = db.createTask(taskInput({ name: 'Small', duration: 30 }))

    const result = await service.runCategory(WORK)

    expect(result.failed).toEqual([
      {
        taskId: big.id,
        reason: 'No "work" window before 2025-01-20T14:00:00.000Z has 300 free minutes',
      },
    ])
    expect(result.scheduled.map((p) => p.taskId)).toEqual([small.id])

    const failed = db.getTask(big.id)
    expect(failed?.status).toBe('failed')
    expect(failed?.startTime).toBeNull()
    expect(db.listLogs(big.id).map((l) => l.message)).toEqual([
      'Unschedulable: No "work" window before 2025-01-20T14:00:00.000Z has 300 free minutes',
    ])
  })

  it('fails every task of a category without windows', async () => {
    const task = db.createTask(taskInput({ category: PRIVATE }))

    const result = await service.runCategory(PRIVATE)

    expect(result.scheduled).toEqual([])
    expect(result.failed.map((f) => f.taskId)).toEqual([task.id])
    expect(db.getTask(task.id)?.status).toBe('failed')
  })

  it('leaves scheduled tasks alone on a second run', async () => {
    const task = db.createTask(taskInput())
    await service.runCategory(WORK)

    const second = await service.runCategory(WORK)

    expect(second.scheduled).toEqual([])
    expect(second.failed).toEqual([])
    expect(db.getTask(task.id)?.startTime?.toISOString()).toBe('2025-01-20T09:00:00.000Z')
    expect(db.listLogs(task.id)).toHaveLength(1)
  })

  it('never schedules templates', async () => {
    const template = db.createTask(taskInput({ kind: 'template' }))

    const result = await service.runCategory(WORK)

    expect(result.scheduled).toEqual([])
    expect(db.getTask(template.id)?.startTime).toBeNull()
  })

  it('aborts the whole batch on an invalid task and logs against it', async () => {
    const good = db.createTask(taskInput({ name: 'Good' }))
    const bad = db.createTask(taskInput({ name: 'Bad', priority: 1.5 }))

    await expect(service.runCategory(WORK)).rejects.toThrow(ValidationError)

    expect(db.getTask(good.id)?.startTime).toBeNull()
    expect(db.listLogs(good.id)).toEqual([])
    expect(db.listLogs(bad.id).map((l) => l.message)).toEqual([
      `Scheduling aborted: Task ${bad.id}: priority must be between 0 and 1 (got 1.5)`,
    ])
  })

  it('aborts on malformed schedule windows', async () => {
    const task = db.createTask(taskInput())
    db.createScheduleWindow({
      category: WORK,
      dayOfWeek: 'Tuesday',
      startHour: '15:00',
      endHour: '10:00',
    })

    await expect(service.runCategory(WORK)).rejects.toThrow(ConfigError)
    expect(db.getTask(task.id)?.startTime).toBeNull()
    expect(db.listLogs(task.id)).toEqual([])
  })

  it('serialises concurrent runs of the same category', async () => {
    db.createTask(taskInput({ name: 'One' }))
    db.createTask(taskInput({ name: 'Two' }))

    const results = await Promise.all([service.runCategory(WORK), service.runCategory(WORK)])

    expect(results[0].scheduled).toHaveLength(2)
    expect(results[1].scheduled).toHaveLength(0)
    const starts = db.listTasks().map((t) => t.startTime?.toISOString())
    expect(starts.sort()).toEqual(['2025-01-20T09:00:00.000Z', '2025-01-20T10:00:00.000Z'])
  })

  it('logs queued runs and the minutes left open', async () => {
    const lines: string[] = []
    const logger = pino({ level: 'debug' }, { write: (line: string) => void lines.push(line) })
    const logged = new SchedulingService({ store: db, categories, zone: 'UTC', clock, logger })
    db.createTask(taskInput({ name: 'One' }))
    db.createTask(taskInput({ name: 'Two' }))

    await Promise.all([logged.runCategory(WORK), logged.runCategory(WORK)])

    expect(lines.filter((l) => l.includes('"msg":"Waiting for the running scheduling pass"'))).toHaveLength(1)
    const summaries = lines.filter((l) => l.includes('"msg":"Scheduling run finished"'))
    expect(summaries).toHaveLength(2)
    expect(summaries[0]).toContain('"freeMinutes":120')
    expect(summaries[1]).toContain('"freeMinutes":null')
  })

  it('runs every registered category', async () => {
    const results = await service.runAll()
    expect(results.map((r) => r.category)).toEqual(['work', 'private', 'exercise'])
  })

  describe('markStatus', () => {
    it('completes a pending task once', () => {
      const task = db.createTask(taskInput())

      service.markStatus(task.id, 'completed')

      expect(db.getTask(task.id)?.status).toBe('completed')
      expect(db.listLogs(task.id).map((l) => l.message)).toEqual(['Marked completed'])
      expect(() => service.markStatus(task.id, 'failed')).toThrow(ConflictError)
      expect(() => service.markStatus(task.id, 'failed')).toThrow(`Task ${task.id} is not pending`)
    })
  })
})
