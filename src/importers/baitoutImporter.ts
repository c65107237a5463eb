import { readFile } from 'node:fs/promises'
import { asc } from 'drizzle-orm'
import db from '../lib/db'
import type { DbClient } from '../lib/db'
import logger from '../lib/logger'
import { DELIMITERS, parseDelimitedRows } from '../lib/tabular'
import { lines } from '../db/schema'
import eventPublisher from '../events/eventPublisher'
import { insertIssue } from '../services/issueService'
import { parseDateString } from '../utils/dates'
import { getErrorMessage } from '../utils/errors'
import { ImportLog } from './importLog'
import type { ImportMessage } from './importLog'
import { LineResolver, matchIssueType, matchStationType } from './matching'

export const BAITOUT_DATE = 'dd/MM/yyyy'

const Column = {
  station: 0,
  person: 3,
  date: 4,
  text: 6,
} as const

export interface BaitoutImportOptions {
  tag: string
  commit?: boolean
  limit?: number | null
}

export type BaitoutImportSummary = {
  tag: string
  committed: boolean
  issuesCreated: number
  rowsSkipped: number
  rowsFailed: number
  problems: ImportMessage[]
}

/**
 * Turns a pipe-delimited baitout export into issues tagged with `tag` as their origin.
 * Without `commit` the rows are only resolved and logged. `limit` caps how many issues
 * are created (or would be) in one run; 0 leaves it uncapped.
 */
export const importBaitoutFromText = (
  text: string,
  options: BaitoutImportOptions,
  client: DbClient = db,
): BaitoutImportSummary => {
  const commit = options.commit ?? false
  const limit = options.limit ? options.limit : null
  const log = new ImportLog(logger.child({ importer: 'baitout', tag: options.tag, commit }))
  const rows = parseDelimitedRows(text, DELIMITERS.pipe)

  const summary: BaitoutImportSummary = {
    tag: options.tag,
    committed: commit,
    issuesCreated: 0,
    rowsSkipped: 0,
    rowsFailed: 0,
    problems: log.problems,
  }

  client.transaction((tx) => {
    const resolver = new LineResolver(tx.select().from(lines).orderBy(asc(lines.id)).all())

    for (const [index, row] of rows.entries()) {
      const rowNumber = index + 1
      if (limit !== null && summary.issuesCreated >= limit) {
        log.info(null, `Stopping after ${limit} issue(s)`)
        break
      }

      if (row.length < 2) {
        summary.rowsSkipped += 1
        log.warn(rowNumber, `Row ${rowNumber}: Skipping - only ${row.length} column(s)`)
        continue
      }

      const stationName = row[Column.station].trim()
      const match = resolver.resolve(stationName)
      if (!match) {
        summary.rowsFailed += 1
        log.error(rowNumber, `Row ${rowNumber}: Failed to identify line for "${stationName}"`)
        continue
      }

      try {
        // Trailing empty cells are dropped on parsing, so a blank issue text counts as missing.
        if (row.length <= Column.text) {
          throw new Error(`expected at least ${Column.text + 1} columns, found ${row.length}`)
        }

        const person = row[Column.person].trim()
        const dateText = row[Column.date].trim()
        const date = parseDateString(dateText, BAITOUT_DATE)
        if (!date) {
          throw new Error(`invalid date "${dateText}"`)
        }

        const issueText = row[Column.text]
        const values = {
          lineId: match.line.id,
          startStationId: String(match.stationNumber),
          endStationId: null,
          stationType: matchStationType(issueText),
          issueType: matchIssueType(issueText),
          origin: options.tag,
          reportedBy: person,
          description: issueText,
        }

        if (commit) {
          tx.transaction((savepoint) => insertIssue(savepoint, values))
        } else {
          log.info(rowNumber, `Row ${rowNumber}: Would create issue`, {
            line: match.line.name,
            station: match.stationNumber,
            issueType: values.issueType,
            stationType: values.stationType,
            description: issueText,
          })
        }

        summary.issuesCreated += 1
        log.info(rowNumber, `Row ${rowNumber}: Created issue for ${match.line.name} on ${date}`)
      } catch (error: unknown) {
        summary.rowsFailed += 1
        log.error(rowNumber, `Row ${rowNumber}: Error creating issue for "${stationName}": ${getErrorMessage(error)}`)
      }
    }
  })

  return summary
}

export const importBaitout = async (filePath: string, options: BaitoutImportOptions): Promise<BaitoutImportSummary> => {
  const text = await readFile(filePath, 'utf-8')
  const summary = importBaitoutFromText(text, options)

  if (summary.committed) {
    await eventPublisher.publish({
      name: 'import.completed',
      payload: {
        importer: 'baitout',
        file: filePath,
        tag: summary.tag,
        issuesCreated: summary.issuesCreated,
        rowsSkipped: summary.rowsSkipped,
        rowsFailed: summary.rowsFailed,
      },
    })
  }

  return summary
}
