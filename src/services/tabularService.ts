import db from '../lib/db'
import logger from '../lib/logger'
import { parseDelimitedRecords, toDelimitedText } from '../lib/tabular'
import type { Delimiter } from '../lib/tabular'
import type { TabularResource } from '../resources'
import { RowReader } from '../resources/rowReader'
import type { AuthenticatedUser } from '../types/user'
import { ensureCanEdit, ensureCanView } from '../utils/authorization'
import { badRequest } from '../utils/errors'

export type ImportRowResult = {
  row: number
  action: 'new' | 'update' | 'error'
  id: number | null
  errors: string[]
}

export type ImportResult = {
  resource: string
  dryRun: boolean
  committed: boolean
  totals: { new: number; update: number; error: number }
  rows: ImportRowResult[]
}

export const TabularService = {
  async exportTable<T>(user: AuthenticatedUser, resource: TabularResource<T>, delimiter: Delimiter): Promise<string> {
    ensureCanView(user)
    return toDelimitedText(resource.columns, resource.exportRows(db), delimiter)
  },

  /**
   * Creates rows whose `id` is empty or unknown and updates rows whose `id` matches.
   * Nothing is written when any row is invalid or when `dryRun` is set.
   */
  async importTable<T>(
    user: AuthenticatedUser,
    resource: TabularResource<T>,
    text: string,
    delimiter: Delimiter,
    dryRun: boolean,
  ): Promise<ImportResult> {
    ensureCanEdit(user)

    const records = parseDelimitedRecords(text, delimiter)
    if (records.length === 0) {
      throw badRequest('The uploaded file contains no rows.')
    }

    const missingColumns = resource.columns.filter((column) => column !== 'id' && !(column in records[0]))
    if (missingColumns.length > 0) {
      throw badRequest(`Missing column(s): ${missingColumns.join(', ')}`)
    }

    const result = db.transaction((tx) => {
      const parsed = records.map((record, index) => {
        const reader = new RowReader(record)
        const values = resource.read(reader, tx)
        const id = reader.has('id') ? reader.id('id') : null
        const action: ImportRowResult['action'] =
          reader.errors.length > 0 ? 'error' : id !== null && resource.exists(tx, id) ? 'update' : 'new'
        return { row: index + 2, action, id, errors: reader.errors, values }
      })

      const hasErrors = parsed.some((entry) => entry.action === 'error')
      const commit = !dryRun && !hasErrors

      if (commit) {
        for (const entry of parsed) {
          if (entry.action === 'update' && entry.id !== null) {
            resource.update(tx, entry.id, entry.values)
          } else {
            entry.id = resource.create(tx, entry.values)
          }
        }
      }

      const rows = parsed.map(({ row, action, id, errors }) => ({ row, action, id: action === 'new' && !commit ? null : id, errors }))
      return {
        resource: resource.name,
        dryRun,
        committed: commit,
        totals: {
          new: rows.filter((row) => row.action === 'new').length,
          update: rows.filter((row) => row.action === 'update').length,
          error: rows.filter((row) => row.action === 'error').length,
        },
        rows,
      }
    })

    logger.info({ resource: resource.name, totals: result.totals, committed: result.committed }, 'Tabular import finished')
    return result
  },
}
