/**
 * Integration Tests: Scheduler Database
 *
 * - task, user, schedule window, recurring setting and log CRUD
 * - status transitions happen once
 * - cascade deletes
 * - category resolution at load time
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { SchedulerDatabase, IN_MEMORY } from '../src/store/database.js'
import { CategoryRegistry } from '../src/categories.js'
import { ConfigError, ConflictError, NotFoundError, ValidationError } from '../src/errors.js'
import { expandRecurrence } from '../src/scheduling/recurrence.js'
import { at, categories, MONDAY, PRIVATE, WORK } from './fixtures.js'
import type { CreateTaskInput } from '../src/types.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

const fixedNow = new Date('2025-01-19T12:00:00.000Z')

function taskInput(overrides: Partial<CreateTaskInput> = {}): CreateTaskInput {
  return {
    name: 'Write report',
    category: WORK,
    deadline: at(MONDAY, '17:00'),
    duration: 90,
    priority: 0.6,
    ...overrides,
  }
}

describe('SchedulerDatabase', () => {
  let db: SchedulerDatabase

  beforeEach(() => {
    db = new SchedulerDatabase(IN_MEMORY, categories, { clock: () => fixedNow })
  })

  afterEach(() => {
    db.close()
  })

  // -----------------------------------------------------------------
  // Tasks
  // -----------------------------------------------------------------

  it('creates a pending task with a task-{ulid} id', () => {
    const task = db.createTask(taskInput())

    expect(task.id).toMatch(/^task-[0-9A-Z]{26}$/)
    expect(task).toMatchObject({
      name: 'Write report',
      kind: 'task',
      category: 'work',
      startTime: null,
      notBefore: null,
      duration: 90,
      priority: 0.6,
      status: 'pending',
      recurrenceId: null,
      occurrenceDate: null,
    })
    expect(task.deadline.toISOString()).toBe('2025-01-20T17:00:00.000Z')
    expect(task.createdAt).toEqual(fixedNow)
  })

  it('returns null for a missing task', () => {
    expect(db.getTask('task-NONEXISTENT')).toBeNull()
    expect(() => db.requireTask('task-NONEXISTENT')).toThrow(NotFoundError)
  })

  it('lists only pending non-template tasks as pending', () => {
    const open = db.createTask(taskInput({ name: 'open' }))
    const done = db.createTask(taskInput({ name: 'done' }))
    db.createTask(taskInput({ name: 'template', kind: 'template' }))
    db.createTask(taskInput({ name: 'home', category: PRIVATE }))
    db.markStatus(done.id, 'completed')

    expect(db.listPendingTasks(WORK).map((t) => t.id)).toEqual([open.id])
    expect(db.listPendingTasks()).toHaveLength(2)
  })

  it('filters tasks by status list and kind', () => {
    const a = db.createTask(taskInput())
    const b = db.createTask(taskInput())
    db.createTask(taskInput())
    db.markStatus(a.id, 'completed')
    db.markStatus(b.id, 'failed')

    expect(db.listTasks({ status: ['completed', 'failed'] }).map((t) => t.id).sort()).toEqual(
      [a.id, b.id].sort(),
    )
    expect(db.listTasks({ kind: 'template' })).toEqual([])
  })

  it('assigns a start time only while the task is pending', () => {
    const task = db.createTask(taskInput())

    expect(db.assign(task.id, at(MONDAY, '09:00'))).toBe(true)
    expect(db.getTask(task.id)?.startTime?.toISOString()).toBe('2025-01-20T09:00:00.000Z')

    db.markStatus(task.id, 'completed')
    expect(db.assign(task.id, at(MONDAY, '10:00'))).toBe(false)
    expect(db.assign('task-NONEXISTENT', at(MONDAY, '10:00'))).toBe(false)
  })

  it('moves a task out of pending exactly once', () => {
    const task = db.createTask(taskInput())

    expect(db.markStatus(task.id, 'completed')).toBe(true)
    expect(db.markStatus(task.id, 'failed')).toBe(false)
    expect(db.getTask(task.id)?.status).toBe('completed')
  })

  // -----------------------------------------------------------------
  // Logs
  // -----------------------------------------------------------------

  it('appends log entries in order', () => {
    const task = db.createTask(taskInput())
    db.appendLog(task.id, 'first')
    db.appendLog(task.id, 'second')

    const logs = db.listLogs(task.id)
    expect(logs.map((l) => l.message)).toEqual(['first', 'second'])
    expect(logs[0].loggedAt).toEqual(fixedNow)
    expect(logs[0].taskId).toBe(task.id)
  })

  it('deletes logs with their task', () => {
    const task = db.createTask(taskInput())
    db.appendLog(task.id, 'note')

    expect(db.deleteTask(task.id)).toBe(true)
    expect(db.listLogs(task.id)).toEqual([])
    expect(db.deleteTask(task.id)).toBe(false)
  })

  // -----------------------------------------------------------------
  // Users
  // -----------------------------------------------------------------

  it('rejects a second user with the same email', () => {
    const user = db.createUser({ email: 'Ada@Example.com', name: 'Ada' })
    expect(user.email).toBe('ada@example.com')
    expect(user.id).toMatch(/^user-/)

    expect(() => db.createUser({ email: 'ada@example.com' })).toThrow(ConflictError)
    expect(db.listUsers()).toHaveLength(1)
  })

  // -----------------------------------------------------------------
  // Schedule windows
  // -----------------------------------------------------------------

  it('stores schedule windows per category', () => {
    const window = db.createScheduleWindow({
      category: WORK,
      dayOfWeek: 'Monday',
      startHour: '09:00',
      endHour: '13:00',
    })
    db.createScheduleWindow({
      category: PRIVATE,
      dayOfWeek: 'Saturday',
      startHour: '10:00',
      endHour: '12:00',
    })

    expect(db.listScheduleWindows(WORK)).toEqual([window])
    expect(db.listScheduleWindows()).toHaveLength(2)
    expect(db.deleteScheduleWindow(window.id)).toBe(true)
    expect(db.listScheduleWindows(WORK)).toEqual([])
  })

  // -----------------------------------------------------------------
  // Recurring settings
  // -----------------------------------------------------------------

  describe('recurring settings', () => {
    it('requires an existing user and a template task', () => {
      const user = db.createUser({ email: 'sam@example.com' })
      const plain = db.createTask(taskInput())

      expect(() =>
        db.createRecurringSetting({ userId: 'user-NONE', taskId: plain.id, pattern: 'daily' }),
      ).toThrow(NotFoundError)
      expect(() =>
        db.createRecurringSetting({ userId: user.id, taskId: plain.id, pattern: 'daily' }),
      ).toThrow(ValidationError)
    })

    it('cascades from users and template tasks', () => {
      const user = db.createUser({ email: 'sam@example.com' })
      const template = db.createTask(taskInput({ kind: 'template' }))
      const setting = db.createRecurringSetting({
        userId: user.id,
        taskId: template.id,
        pattern: 'weekly, Monday',
      })
      expect(db.listRecurringSettings(user.id)).toEqual([setting])

      db.deleteUser(user.id)
      expect(db.getRecurringSetting(setting.id)).toBeNull()

      const owner = db.createUser({ email: 'kim@example.com' })
      const second = db.createRecurringSetting({
        userId: owner.id,
        taskId: template.id,
        pattern: 'daily',
      })
      db.deleteTask(template.id)
      expect(db.getRecurringSetting(second.id)).toBeNull()
    })

    it('inserts each occurrence once and detaches instances when the setting goes', () => {
      const user = db.createUser({ email: 'sam@example.com' })
      const template = db.createTask(taskInput({ name: 'Standup', kind: 'template', duration: 15 }))
      const setting = db.createRecurringSetting({
        userId: user.id,
        taskId: template.id,
        pattern: 'weekly, Monday',
      })
      const options = { start: new Date('2025-01-20T00:00:00.000Z'), weeks: 8, zone: 'UTC' }

      const created = db.insertTaskInstances(expandRecurrence(setting, template, options))
      const again = db.insertTaskInstances(expandRecurrence(setting, template, options))

      expect(created).toHaveLength(8)
      expect(again).toEqual([])
      expect(created[0]).toMatchObject({
        name: 'Standup (2025-01-20)',
        kind: 'task',
        duration: 15,
        recurrenceId: setting.id,
        occurrenceDate: '2025-01-20',
      })

      db.deleteRecurringSetting(setting.id)
      const instance = db.getTask(created[0].id)
      expect(instance).not.toBeNull()
      expect(instance?.recurrenceId).toBeNull()
    })
  })
})

// -------------------------------------------------------------------
// Category resolution on load
// -------------------------------------------------------------------

describe('SchedulerDatabase category resolution', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'timeslot-db-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('fails loudly on rows whose category is no longer configured', () => {
    const dbPath = path.join(tempDir, 'data', 'timeslot.db')
    const wide = new CategoryRegistry(['work', 'garden'])
    const first = new SchedulerDatabase(dbPath, wide)
    first.createTask(taskInput({ category: wide.resolve('garden') }))
    first.close()

    const narrow = new SchedulerDatabase(dbPath, new CategoryRegistry(['work']))
    try {
      expect(() => narrow.listTasks()).toThrow(ConfigError)
      expect(() => narrow.listTasks()).toThrow('Unknown category "garden"')
    } finally {
      narrow.close()
    }
  })
})
