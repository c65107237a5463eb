import { and, sql } from 'drizzle-orm'
import type { SQL } from 'drizzle-orm'
import type { SQLiteColumn } from 'drizzle-orm/sqlite-core'

/** Case-insensitive substring match; NULL columns never match. */
export const containsInsensitive = (column: SQLiteColumn, term: string): SQL =>
  sql`instr(lower(${column}), ${term.toLowerCase()}) > 0`

export const allOf = (conditions: Array<SQL | undefined>): SQL | undefined => {
  const present = conditions.filter((condition): condition is SQL => condition !== undefined)
  return present.length > 0 ? and(...present) : undefined
}
