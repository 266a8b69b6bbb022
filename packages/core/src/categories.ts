/**
 * Category Registry
 *
 * The closed set of categories tasks and schedule windows may use.
 * Raw strings are resolved once, when rows or requests are loaded, so a
 * typo in `tasks.category` fails loudly instead of never matching a window.
 */

import { z } from 'zod'
import { ConfigError } from './errors.js'

export const DEFAULT_CATEGORIES = ['work', 'private', 'exercise'] as const

const CategoryNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(50)
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'lowercase letters, digits, "-" and "_" only')

const CategoryIdSchema = CategoryNameSchema.brand<'CategoryId'>()

export type CategoryId = z.infer<typeof CategoryIdSchema>

export class CategoryRegistry {
  private readonly ids: readonly CategoryId[]
  private readonly known: Set<string>

  constructor(names: readonly string[] = DEFAULT_CATEGORIES) {
    const ids: CategoryId[] = []
    for (const name of names) {
      const parsed = CategoryIdSchema.safeParse(name)
      if (!parsed.success) {
        throw new ConfigError(
          `Invalid category name "${name}": ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        )
      }
      if (ids.includes(parsed.data)) {
        throw new ConfigError(`Duplicate category "${parsed.data}"`)
      }
      ids.push(parsed.data)
    }
    if (ids.length === 0) {
      throw new ConfigError('At least one category must be configured')
    }
    this.ids = ids
    this.known = new Set(ids)
  }

  /**
   * Resolve a raw category string. Throws ConfigError for names outside the set.
   */
  resolve(raw: string): CategoryId {
    const parsed = CategoryIdSchema.safeParse(raw.trim())
    if (!parsed.success || !this.known.has(parsed.data)) {
      throw new ConfigError(
        `Unknown category "${raw}" (expected one of: ${this.ids.join(', ')})`,
      )
    }
    return parsed.data
  }

  has(raw: string): boolean {
    return this.known.has(raw.trim())
  }

  list(): readonly CategoryId[] {
    return this.ids
  }
}
