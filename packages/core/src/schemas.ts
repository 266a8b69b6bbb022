/**
 * Input Schemas
 *
 * zod schemas for data arriving from outside (HTTP bodies, CLI flags).
 * Each parse function returns domain input or throws ValidationError.
 */

import { z } from 'zod'
import { ConfigError, ValidationError } from './errors.js'
import { parseClockTime } from './scheduling/availability.js'
import { parseRecurrencePattern } from './scheduling/recurrence.js'
import { WEEKDAYS } from './types.js'
import type { CategoryId, CategoryRegistry } from './categories.js'
import type {
  CreateRecurringSettingInput,
  CreateScheduleWindowInput,
  CreateTaskInput,
  CreateUserInput,
  FinalTaskStatus,
  ListTasksFilter,
} from './types.js'

// ISO 8601 with an explicit offset, or epoch milliseconds
const IsoDate = z
  .union([z.string().datetime({ offset: true }), z.number().int()])
  .pipe(z.coerce.date())

export const TaskInputSchema = z
  .object({
    name: z.string().trim().min(1).max(255),
    category: z.string().min(1),
    deadline: IsoDate,
    duration: z.number().int().positive(),
    priority: z.number().min(0).max(1),
    notBefore: IsoDate.nullish(),
    kind: z.enum(['task', 'template']).default('task'),
  })
  .refine((input) => !input.notBefore || input.deadline > input.notBefore, {
    message: 'deadline must be after notBefore',
    path: ['deadline'],
  })

const TaskStatusSchema = z.enum(['pending', 'completed', 'failed'])

export const ListTasksQuerySchema = z.object({
  // Comma-separated list, e.g. "completed,failed"
  status: z
    .string()
    .transform((value) => value.split(',').map((part) => part.trim()))
    .pipe(z.array(TaskStatusSchema).min(1))
    .optional(),
  category: z.string().min(1).optional(),
  kind: z.enum(['task', 'template']).optional(),
})

export const StatusInputSchema = z.object({
  status: z.enum(['completed', 'failed']),
})

export const UserInputSchema = z.object({
  email: z.string().trim().email().max(255),
  name: z.string().trim().max(255).nullish(),
})

function clockMinutes(value: string): number | null {
  try {
    return parseClockTime(value)
  } catch (err) {
    if (err instanceof ConfigError) return null
    throw err
  }
}

const ClockTime = z
  .string()
  .refine((value) => clockMinutes(value) !== null, { message: 'expected HH:MM or HH:MM:SS' })

export const ScheduleWindowInputSchema = z
  .object({
    category: z.string().min(1),
    dayOfWeek: z.enum(WEEKDAYS),
    startHour: ClockTime,
    endHour: ClockTime,
  })
  .refine(
    (input) => {
      const start = clockMinutes(input.startHour)
      const end = clockMinutes(input.endHour)
      return start === null || end === null || start < end
    },
    { message: 'startHour must be before endHour', path: ['endHour'] },
  )

export const RecurringSettingInputSchema = z.object({
  userId: z.string().min(1),
  taskId: z.string().min(1),
  pattern: z.string().min(1).max(255),
})

export const ExpandInputSchema = z.object({
  start: IsoDate.optional(),
  weeks: z.number().int().min(1).max(104).optional(),
})

export type ExpandInput = z.infer<typeof ExpandInputSchema>

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || what}: ${issue.message}`)
      .join('; ')
    throw new ValidationError(`Invalid ${what}: ${detail}`)
  }
  return result.data
}

/**
 * Category names outside the registry are rejected as ValidationError here,
 * since they come from a request rather than from configuration.
 */
export function parseCategory(categories: CategoryRegistry, raw: string): CategoryId {
  if (!categories.has(raw)) {
    throw new ValidationError(
      `Invalid category "${raw}" (expected one of: ${categories.list().join(', ')})`,
    )
  }
  return categories.resolve(raw)
}

export function parseTaskInput(raw: unknown, categories: CategoryRegistry): CreateTaskInput {
  const input = parseOrThrow(TaskInputSchema, raw, 'task')
  return {
    name: input.name,
    category: parseCategory(categories, input.category),
    deadline: input.deadline,
    duration: input.duration,
    priority: input.priority,
    notBefore: input.notBefore ?? null,
    kind: input.kind,
  }
}

export function parseListTasksQuery(raw: unknown, categories: CategoryRegistry): ListTasksFilter {
  const query = parseOrThrow(ListTasksQuerySchema, raw ?? {}, 'task query')
  return {
    status: query.status,
    category: query.category === undefined ? undefined : parseCategory(categories, query.category),
    kind: query.kind,
  }
}

export function parseStatusInput(raw: unknown): FinalTaskStatus {
  return parseOrThrow(StatusInputSchema, raw, 'status update').status
}

export function parseUserInput(raw: unknown): CreateUserInput {
  const input = parseOrThrow(UserInputSchema, raw, 'user')
  return { email: input.email, name: input.name ?? null }
}

export function parseScheduleWindowInput(
  raw: unknown,
  categories: CategoryRegistry,
): CreateScheduleWindowInput {
  const input = parseOrThrow(ScheduleWindowInputSchema, raw, 'schedule window')
  return {
    category: parseCategory(categories, input.category),
    dayOfWeek: input.dayOfWeek,
    startHour: input.startHour,
    endHour: input.endHour,
  }
}

export function parseRecurringSettingInput(raw: unknown): CreateRecurringSettingInput {
  const input = parseOrThrow(RecurringSettingInputSchema, raw, 'recurring setting')
  // Reject patterns the expander cannot read before they are stored
  parseRecurrencePattern(input.pattern)
  return input
}

export function parseExpandInput(raw: unknown): ExpandInput {
  return parseOrThrow(ExpandInputSchema, raw ?? {}, 'expansion')
}
