import { readFile } from 'node:fs/promises'
import { and, asc, eq } from 'drizzle-orm'
import db from '../lib/db'
import type { DbClient } from '../lib/db'
import logger from '../lib/logger'
import { parseDelimitedRows } from '../lib/tabular'
import type { Delimiter } from '../lib/tabular'
import { issues, lines, teamMembers } from '../db/schema'
import eventPublisher from '../events/eventPublisher'
import { insertIssue } from '../services/issueService'
import { addParticipant, findOuting, insertOuting } from '../services/outingService'
import type { Outing, TeamMember } from '../types/database'
import { parseDateString, ISO_DATE } from '../utils/dates'
import { getErrorMessage } from '../utils/errors'
import { emptyToNull } from '../utils/strings'
import { ImportLog } from './importLog'
import type { ImportMessage } from './importLog'
import { classifyNote, mapCompletionStatus } from './matching'

export const DEFAULT_HEADER_LINES = 4

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

const Column = {
  date: 0,
  line: 1,
  status: 2,
  startStation: 3,
  endStation: 4,
  hours: 5,
  workers: 6,
  notes: 9,
  participants: 10,
} as const

export interface OutingImportOptions {
  delimiter?: Delimiter
  headerLines?: number
}

export type OutingImportSummary = {
  outingsCreated: number
  outingsExisting: number
  rowsSkipped: number
  rowsFailed: number
  issuesCreated: number
  teamMembersCreated: number
  problems: ImportMessage[]
}

type RowNote = {
  startStationId: string | null
  endStationId: string | null
  notes: string
}

const cell = (row: string[], index: number): string => (row[index] ?? '').trim()

const parseDecimal = (value: string, fallback: number): number => (DECIMAL.test(value) ? Number(value) : fallback)

class OutingRowImporter {
  private readonly members = new Map<string, TeamMember>()

  readonly summary: OutingImportSummary

  constructor(
    private readonly client: DbClient,
    private readonly log: ImportLog,
  ) {
    this.summary = {
      outingsCreated: 0,
      outingsExisting: 0,
      rowsSkipped: 0,
      rowsFailed: 0,
      issuesCreated: 0,
      teamMembersCreated: 0,
      problems: log.problems,
    }
  }

  importRow(row: string[], rowNumber: number): void {
    if (row.length < 2) {
      this.skip(rowNumber, `Row ${rowNumber}: Skipping - only ${row.length} column(s)`)
      return
    }

    const dateText = cell(row, Column.date)
    const lineName = cell(row, Column.line)
    if (!dateText || !lineName) {
      this.skip(rowNumber, `Row ${rowNumber}: Skipping - missing date or line name`)
      return
    }

    const date = parseDateString(dateText, ISO_DATE)
    if (!date) {
      this.skip(rowNumber, `Row ${rowNumber}: Invalid date format: ${dateText}`)
      return
    }

    const line = this.client.select().from(lines).where(eq(lines.name, lineName)).orderBy(asc(lines.id)).get()
    if (!line) {
      this.skip(rowNumber, `Row ${rowNumber}: Line not found: ${lineName}`)
      return
    }

    const startStationId = emptyToNull(cell(row, Column.startStation))
    const endStationId = emptyToNull(cell(row, Column.endStation))
    const notes = cell(row, Column.notes)
    const initials = cell(row, Column.participants)
      .split(',')
      .map((initial) => initial.trim())
      .filter(Boolean)

    try {
      this.client.transaction((tx) => {
        let outing = findOuting(tx, date, line.id)
        if (outing) {
          this.summary.outingsExisting += 1
          this.log.warn(rowNumber, `Row ${rowNumber}: Outing already exists for ${lineName} on ${date}`)
        } else {
          outing = insertOuting(tx, {
            date,
            lineId: line.id,
            completionStatus: mapCompletionStatus(cell(row, Column.status)),
            startStationId,
            endStationId,
            hours: parseDecimal(cell(row, Column.hours), 0),
            numberOfWorkers: parseDecimal(cell(row, Column.workers), 1),
          })
          this.summary.outingsCreated += 1
          this.log.info(rowNumber, `Row ${rowNumber}: Created outing for ${lineName} on ${date}`)
        }

        for (const initial of initials) {
          addParticipant(tx, outing.id, this.memberFor(tx, initial).id)
        }

        if (notes) {
          this.recordNote(tx, outing, { startStationId, endStationId, notes }, rowNumber, lineName)
        }
      })
    } catch (error: unknown) {
      this.summary.rowsFailed += 1
      this.log.error(rowNumber, `Row ${rowNumber}: Error creating outing: ${getErrorMessage(error)}`)
    }
  }

  private skip(rowNumber: number, message: string) {
    this.summary.rowsSkipped += 1
    this.log.warn(rowNumber, message)
  }

  private memberFor(client: DbClient, initial: string): TeamMember {
    const cached = this.members.get(initial)
    if (cached) {
      return cached
    }

    let member = client.select().from(teamMembers).where(eq(teamMembers.name, initial)).orderBy(asc(teamMembers.id)).get()
    if (!member) {
      ;[member] = client.insert(teamMembers).values({ name: initial, available: true }).returning().all()
      this.summary.teamMembersCreated += 1
      this.log.info(null, `Created team member: ${initial}`)
    }

    this.members.set(initial, member)
    return member
  }

  // One note issue per outing and text: re-importing the same row does not repeat it.
  // The stations come from the row, which may differ from an outing that already existed.
  private recordNote(client: DbClient, outing: Outing, note: RowNote, rowNumber: number, lineName: string) {
    const { startStationId, endStationId, notes } = note
    const existing = client
      .select({ id: issues.id })
      .from(issues)
      .where(and(eq(issues.outingId, outing.id), eq(issues.description, notes)))
      .get()
    if (existing) {
      return
    }

    insertIssue(client, {
      lineId: outing.lineId,
      outingId: outing.id,
      startStationId: startStationId ?? '',
      endStationId,
      stationType: 'Novacoil',
      issueType: classifyNote(notes),
      description: notes,
    })
    this.summary.issuesCreated += 1
    this.log.info(rowNumber, `Row ${rowNumber}: Created issue for ${lineName} on ${outing.date}`)
  }
}

/**
 * Imports outings from a field spreadsheet export. Leading header lines are skipped;
 * every remaining row is processed inside one transaction, each row in its own
 * savepoint so a failing row leaves nothing behind.
 */
export const importOutingsFromText = (
  text: string,
  options: OutingImportOptions = {},
  client: DbClient = db,
): OutingImportSummary => {
  const headerLines = options.headerLines ?? DEFAULT_HEADER_LINES
  const body = text.split(/\r?\n/).slice(headerLines).join('\n')
  const rows = parseDelimitedRows(body, options.delimiter ?? '\t')
  const log = new ImportLog(logger.child({ importer: 'outings' }))

  const importer = client.transaction((tx) => {
    const rowImporter = new OutingRowImporter(tx, log)
    rows.forEach((row, index) => rowImporter.importRow(row, headerLines + index + 1))
    return rowImporter
  })

  log.info(null, 'Successfully imported outing data', {
    outingsCreated: importer.summary.outingsCreated,
    outingsExisting: importer.summary.outingsExisting,
    issuesCreated: importer.summary.issuesCreated,
  })
  return importer.summary
}

export const importOutings = async (filePath: string, options: OutingImportOptions = {}): Promise<OutingImportSummary> => {
  const text = await readFile(filePath, 'utf-8')
  const summary = importOutingsFromText(text, options)

  await eventPublisher.publish({
    name: 'import.completed',
    payload: {
      importer: 'outings',
      file: filePath,
      outingsCreated: summary.outingsCreated,
      outingsExisting: summary.outingsExisting,
      issuesCreated: summary.issuesCreated,
      rowsSkipped: summary.rowsSkipped,
      rowsFailed: summary.rowsFailed,
    },
  })

  return summary
}
