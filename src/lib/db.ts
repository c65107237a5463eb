import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import Database from 'better-sqlite3'
import { drizzle } from 'drizzle-orm/better-sqlite3'
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core'
import env from '../config'
import * as schema from '../db/schema'

export type DbClient = BaseSQLiteDatabase<'sync', Database.RunResult, typeof schema>

export const openDatabase = (url: string) => {
  const sqlite = new Database(url)
  sqlite.pragma('foreign_keys = ON')
  if (url !== ':memory:') {
    sqlite.pragma('journal_mode = WAL')
  }
  sqlite.exec(readFileSync(join(__dirname, '..', 'db', 'schema.sql'), 'utf-8'))
  return drizzle(sqlite, { schema })
}

const db = openDatabase(env.DATABASE_URL)

export default db
