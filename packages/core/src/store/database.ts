/**
 * Scheduler Database
 *
 * SQLite storage for tasks, users, logs, schedule windows and recurring
 * settings. Uses better-sqlite3 with WAL mode and foreign keys on, so the
 * cascade rules live in the schema:
 * - deleting a user removes its recurring settings
 * - deleting a task removes its logs and the recurring settings built on it
 * - deleting a recurring setting detaches (not deletes) its instances
 *
 * @module store/database
 */

import Database from 'better-sqlite3'
import fs from 'node:fs'
import path from 'node:path'
import { ulid } from 'ulid'
import { ConflictError, NotFoundError, ValidationError } from '../errors.js'
import type { CategoryId, CategoryRegistry } from '../categories.js'
import type { SchedulingStore } from '../scheduling/types.js'
import type {
  CreateRecurringSettingInput,
  CreateScheduleWindowInput,
  CreateTaskInput,
  CreateUserInput,
  FinalTaskStatus,
  ListTasksFilter,
  LogEntry,
  RecurringSetting,
  ScheduleWindow,
  Task,
  TaskKind,
  TaskStatus,
  User,
  Weekday,
} from '../types.js'

export const IN_MEMORY = ':memory:'

interface TaskRow {
  id: string
  name: string
  kind: TaskKind
  category: string
  start_time: string | null
  not_before: string | null
  deadline: string
  duration: number
  priority: number
  status: TaskStatus
  recurrence_id: string | null
  occurrence_date: string | null
  created_at: string
  updated_at: string
}

interface UserRow {
  id: string
  email: string
  name: string | null
  created_at: string
  updated_at: string
}

interface ScheduleRow {
  id: string
  category: string
  day_of_week: Weekday
  start_hour: string
  end_hour: string
}

interface RecurringRow {
  id: string
  user_id: string
  task_id: string
  pattern: string
  created_at: string
}

interface LogRow {
  id: number
  task_id: string
  message: string
  logged_at: string
}

export interface SchedulerDatabaseOptions {
  /** Source of timestamps for created_at, updated_at and log_time */
  clock?: () => Date
}

function toDate(value: string): Date {
  return new Date(value)
}

function toOptionalDate(value: string | null): Date | null {
  return value === null ? null : new Date(value)
}

export class SchedulerDatabase implements SchedulingStore {
  private db: Database.Database
  private categories: CategoryRegistry
  private clock: () => Date

  /**
   * @param dbPath - File path, or ":memory:" for a throwaway database
   */
  constructor(dbPath: string, categories: CategoryRegistry, options: SchedulerDatabaseOptions = {}) {
    if (dbPath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true })
    }

    this.db = new Database(dbPath)
    this.categories = categories
    this.clock = options.clock ?? (() => new Date())

    this.db.pragma('journal_mode = WAL')
    this.db.pragma('busy_timeout = 5000')
    this.db.pragma('foreign_keys = ON')

    this.initSchema()
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        email TEXT NOT NULL UNIQUE,
        name TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        kind TEXT NOT NULL DEFAULT 'task' CHECK (kind IN ('task', 'template')),
        category TEXT NOT NULL,
        start_time TEXT,
        not_before TEXT,
        deadline TEXT NOT NULL,
        duration INTEGER NOT NULL,
        priority REAL NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending'
          CHECK (status IN ('pending', 'completed', 'failed')),
        recurrence_id TEXT REFERENCES recurring_settings(id) ON DELETE SET NULL,
        occurrence_date TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        task_id TEXT NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
        message TEXT NOT NULL,
        logged_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS schedules (
        id TEXT PRIMARY KEY,
        category TEXT NOT NULL,
        day_of_week TEXT NOT NULL CHECK (day_of_week IN (
          'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'
        )),
        start_hour TEXT NOT NULL,
        end_hour TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS recurring_settings (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        task_id TEXT NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
        pattern TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_status_category ON tasks(status, category);
      CREATE UNIQUE INDEX IF NOT EXISTS idx_tasks_occurrence
        ON tasks(recurrence_id, occurrence_date)
        WHERE recurrence_id IS NOT NULL;
      CREATE INDEX IF NOT EXISTS idx_logs_task ON logs(task_id);
      CREATE INDEX IF NOT EXISTS idx_schedules_category ON schedules(category);
      CREATE INDEX IF NOT EXISTS idx_recurring_user ON recurring_settings(user_id);
    `)
  }

  private now(): string {
    return this.clock().toISOString()
  }

  // ─── Tasks ───

  createTask(input: CreateTaskInput): Task {
    const id = `task-${ulid()}`
    const now = this.now()

    this.db
      .prepare(
        `
      INSERT INTO tasks (
        id, name, kind, category, start_time, not_before, deadline, duration,
        priority, status, recurrence_id, occurrence_date, created_at, updated_at
      ) VALUES (?, ?, ?, ?, NULL, ?, ?, ?, ?, 'pending', ?, ?, ?, ?)
    `,
      )
      .run(
        id,
        input.name,
        input.kind ?? 'task',
        input.category,
        input.notBefore?.toISOString() ?? null,
        input.deadline.toISOString(),
        input.duration,
        input.priority,
        input.recurrenceId ?? null,
        input.occurrenceDate ?? null,
        now,
        now,
      )

    return this.requireTask(id)
  }

  /**
   * Insert recurring instances, skipping occurrences that already exist.
   * Returns the tasks actually created.
   */
  insertTaskInstances(instances: Iterable<CreateTaskInput>): Task[] {
    const stmt = this.db.prepare(`
      INSERT OR IGNORE INTO tasks (
        id, name, kind, category, start_time, not_before, deadline, duration,
        priority, status, recurrence_id, occurrence_date, created_at, updated_at
      ) VALUES (?, ?, 'task', ?, NULL, ?, ?, ?, ?, 'pending', ?, ?, ?, ?)
    `)

    const insertAll = this.db.transaction((items: Iterable<CreateTaskInput>): string[] => {
      const created: string[] = []
      for (const item of items) {
        const id = `task-${ulid()}`
        const now = this.now()
        const info = stmt.run(
          id,
          item.name,
          item.category,
          item.notBefore?.toISOString() ?? null,
          item.deadline.toISOString(),
          item.duration,
          item.priority,
          item.recurrenceId ?? null,
          item.occurrenceDate ?? null,
          now,
          now,
        )
        if (info.changes === 1) created.push(id)
      }
      return created
    })

    return insertAll(instances).map((id) => this.requireTask(id))
  }

  getTask(id: string): Task | null {
    const row = this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id)
    return row ? this.rowToTask(row) : null
  }

  requireTask(id: string): Task {
    const task = this.getTask(id)
    if (!task) {
      throw new NotFoundError(`Task ${id} not found`)
    }
    return task
  }

  listTasks(filter: ListTasksFilter = {}): Task[] {
    const clauses: string[] = []
    const params: string[] = []

    if (filter.status) {
      const statuses = Array.isArray(filter.status) ? filter.status : [filter.status]
      clauses.push(`status IN (${statuses.map(() => '?').join(', ')})`)
      params.push(...statuses)
    }
    if (filter.category) {
      clauses.push('category = ?')
      params.push(filter.category)
    }
    if (filter.kind) {
      clauses.push('kind = ?')
      params.push(filter.kind)
    }

    let sql = 'SELECT * FROM tasks'
    if (clauses.length > 0) {
      sql += ` WHERE ${clauses.join(' AND ')}`
    }
    sql += ' ORDER BY deadline ASC, priority DESC, id ASC'

    const rows = this.db.prepare<string[], TaskRow>(sql).all(...params)
    return rows.map((row) => this.rowToTask(row))
  }

  listPendingTasks(category?: CategoryId): Task[] {
    return this.listTasks({ status: 'pending', kind: 'task', category })
  }

  assign(taskId: string, startTime: Date): boolean {
    const info = this.db
      .prepare<[string, string, string]>(
        `UPDATE tasks SET start_time = ?, updated_at = ?
         WHERE id = ? AND status = 'pending' AND kind = 'task'`,
      )
      .run(startTime.toISOString(), this.now(), taskId)
    return info.changes === 1
  }

  markStatus(taskId: string, status: FinalTaskStatus): boolean {
    const info = this.db
      .prepare<[string, string, string]>(
        `UPDATE tasks SET status = ?, updated_at = ? WHERE id = ? AND status = 'pending'`,
      )
      .run(status, this.now(), taskId)
    return info.changes === 1
  }

  deleteTask(id: string): boolean {
    const info = this.db.prepare<[string]>('DELETE FROM tasks WHERE id = ?').run(id)
    return info.changes === 1
  }

  // ─── Users ───

  createUser(input: CreateUserInput): User {
    const email = input.email.trim().toLowerCase()
    if (this.getUserByEmail(email)) {
      throw new ConflictError(`A user with email ${email} already exists`)
    }

    const id = `user-${ulid()}`
    const now = this.now()
    this.db
      .prepare<[string, string, string | null, string, string]>(
        'INSERT INTO users (id, email, name, created_at, updated_at) VALUES (?, ?, ?, ?, ?)',
      )
      .run(id, email, input.name ?? null, now, now)

    return this.requireUser(id)
  }

  getUser(id: string): User | null {
    const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE id = ?').get(id)
    return row ? this.rowToUser(row) : null
  }

  getUserByEmail(email: string): User | null {
    const row = this.db
      .prepare<[string], UserRow>('SELECT * FROM users WHERE email = ?')
      .get(email.trim().toLowerCase())
    return row ? this.rowToUser(row) : null
  }

  requireUser(id: string): User {
    const user = this.getUser(id)
    if (!user) {
      throw new NotFoundError(`User ${id} not found`)
    }
    return user
  }

  listUsers(): User[] {
    return this.db
      .prepare<[], UserRow>('SELECT * FROM users ORDER BY created_at ASC, id ASC')
      .all()
      .map((row) => this.rowToUser(row))
  }

  deleteUser(id: string): boolean {
    const info = this.db.prepare<[string]>('DELETE FROM users WHERE id = ?').run(id)
    return info.changes === 1
  }

  // ─── Schedule windows ───

  createScheduleWindow(input: CreateScheduleWindowInput): ScheduleWindow {
    const id = `sched-${ulid()}`
    this.db
      .prepare<[string, string, string, string, string]>(
        `INSERT INTO schedules (id, category, day_of_week, start_hour, end_hour)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(id, input.category, input.dayOfWeek, input.startHour, input.endHour)
    return { id, ...input }
  }

  listScheduleWindows(category?: CategoryId): ScheduleWindow[] {
    const rows = category
      ? this.db
          .prepare<[string], ScheduleRow>('SELECT * FROM schedules WHERE category = ? ORDER BY id')
          .all(category)
      : this.db.prepare<[], ScheduleRow>('SELECT * FROM schedules ORDER BY category, id').all()
    return rows.map((row) => this.rowToScheduleWindow(row))
  }

  deleteScheduleWindow(id: string): boolean {
    const info = this.db.prepare<[string]>('DELETE FROM schedules WHERE id = ?').run(id)
    return info.changes === 1
  }

  // ─── Recurring settings ───

  /**
   * @throws NotFoundError if the user or task is missing
   * @throws ValidationError if the task is not a template
   */
  createRecurringSetting(input: CreateRecurringSettingInput): RecurringSetting {
    this.requireUser(input.userId)
    const task = this.requireTask(input.taskId)
    if (task.kind !== 'template') {
      throw new ValidationError(`Task ${task.id} is not a template`, task.id)
    }

    const id = `rec-${ulid()}`
    const createdAt = this.now()
    this.db
      .prepare<[string, string, string, string, string]>(
        `INSERT INTO recurring_settings (id, user_id, task_id, pattern, created_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(id, input.userId, input.taskId, input.pattern, createdAt)

    return { id, ...input, createdAt: toDate(createdAt) }
  }

  getRecurringSetting(id: string): RecurringSetting | null {
    const row = this.db
      .prepare<[string], RecurringRow>('SELECT * FROM recurring_settings WHERE id = ?')
      .get(id)
    return row ? this.rowToRecurringSetting(row) : null
  }

  requireRecurringSetting(id: string): RecurringSetting {
    const setting = this.getRecurringSetting(id)
    if (!setting) {
      throw new NotFoundError(`Recurring setting ${id} not found`)
    }
    return setting
  }

  listRecurringSettings(userId?: string): RecurringSetting[] {
    const rows = userId
      ? this.db
          .prepare<[string], RecurringRow>(
            'SELECT * FROM recurring_settings WHERE user_id = ? ORDER BY id',
          )
          .all(userId)
      : this.db.prepare<[], RecurringRow>('SELECT * FROM recurring_settings ORDER BY id').all()
    return rows.map((row) => this.rowToRecurringSetting(row))
  }

  deleteRecurringSetting(id: string): boolean {
    const info = this.db.prepare<[string]>('DELETE FROM recurring_settings WHERE id = ?').run(id)
    return info.changes === 1
  }

  // ─── Logs ───

  appendLog(taskId: string, message: string): LogEntry {
    const loggedAt = this.now()
    const info = this.db
      .prepare<[string, string, string]>(
        'INSERT INTO logs (task_id, message, logged_at) VALUES (?, ?, ?)',
      )
      .run(taskId, message, loggedAt)
    return {
      id: Number(info.lastInsertRowid),
      taskId,
      message,
      loggedAt: toDate(loggedAt),
    }
  }

  listLogs(taskId: string): LogEntry[] {
    return this.db
      .prepare<[string], LogRow>('SELECT * FROM logs WHERE task_id = ? ORDER BY id ASC')
      .all(taskId)
      .map((row) => ({
        id: row.id,
        taskId: row.task_id,
        message: row.message,
        loggedAt: toDate(row.logged_at),
      }))
  }

  close(): void {
    this.db.close()
  }

  // ─── Row mapping ───

  private rowToTask(row: TaskRow): Task {
    return {
      id: row.id,
      name: row.name,
      kind: row.kind,
      category: this.categories.resolve(row.category),
      startTime: toOptionalDate(row.start_time),
      notBefore: toOptionalDate(row.not_before),
      deadline: toDate(row.deadline),
      duration: row.duration,
      priority: row.priority,
      status: row.status,
      recurrenceId: row.recurrence_id,
      occurrenceDate: row.occurrence_date,
      createdAt: toDate(row.created_at),
      updatedAt: toDate(row.updated_at),
    }
  }

  private rowToUser(row: UserRow): User {
    return {
      id: row.id,
      email: row.email,
      name: row.name,
      createdAt: toDate(row.created_at),
      updatedAt: toDate(row.updated_at),
    }
  }

  private rowToScheduleWindow(row: ScheduleRow): ScheduleWindow {
    return {
      id: row.id,
      category: this.categories.resolve(row.category),
      dayOfWeek: row.day_of_week,
      startHour: row.start_hour,
      endHour: row.end_hour,
    }
  }

  private rowToRecurringSetting(row: RecurringRow): RecurringSetting {
    return {
      id: row.id,
      userId: row.user_id,
      taskId: row.task_id,
      pattern: row.pattern,
      createdAt: toDate(row.created_at),
    }
  }
}
