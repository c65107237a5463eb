import { asc, count, eq, max, notInArray } from 'drizzle-orm'
import db from '../lib/db'
import { issues, lines, outings } from '../db/schema'
import type { Line } from '../types/database'
import { RESOLVED_ISSUE_STATUSES } from '../types/models'
import type { CompletionStatus } from '../types/models'
import type { AuthenticatedUser } from '../types/user'
import { ensureCanView } from '../utils/authorization'

export const REPORT_SORT_FIELDS = [
  'last_completed',
  'last_partial',
  'completed_count',
  'partial_count',
  'line_name',
  'issues_count',
  'issues_unresolved_count',
] as const

export type ReportSortField = (typeof REPORT_SORT_FIELDS)[number]
export type SortOrder = 'asc' | 'desc'

export type CompletionReportRow = {
  line: Line
  lineAdminUrl: string
  lastCompleted: string | null
  completedCount: number
  lastPartial: string | null
  partialCount: number
  issuesCount: number
  issuesUnresolvedCount: number
}

export type CompletionReport = {
  title: string
  sortBy: string
  sortOrder: string
  rows: CompletionReportRow[]
}

type SortKey = (row: CompletionReportRow) => string | number

// Absent dates sort as the earliest possible date.
const sortKeys: Record<ReportSortField, SortKey> = {
  last_completed: (row) => row.lastCompleted ?? '',
  last_partial: (row) => row.lastPartial ?? '',
  completed_count: (row) => row.completedCount,
  partial_count: (row) => row.partialCount,
  line_name: (row) => row.line.name,
  issues_count: (row) => row.issuesCount,
  issues_unresolved_count: (row) => row.issuesUnresolvedCount,
}

const isSortField = (value: string): value is ReportSortField =>
  REPORT_SORT_FIELDS.some((field) => field === value)

const compareKeys = (a: string | number, b: string | number): number => {
  if (a < b) {
    return -1
  }
  return a > b ? 1 : 0
}

/**
 * Stable sort by one report column. Equal rows keep their relative order in both
 * directions; an unknown field leaves the rows untouched.
 */
export const sortReportRows = (rows: CompletionReportRow[], sortBy: string, sortOrder: string): CompletionReportRow[] => {
  if (!isSortField(sortBy)) {
    return rows
  }

  const key = sortKeys[sortBy]
  const direction = sortOrder === 'desc' ? -1 : 1
  return [...rows].sort((a, b) => direction * compareKeys(key(a), key(b)))
}

const outingStats = (status: CompletionStatus) =>
  new Map(
    db
      .select({ lineId: outings.lineId, lastDate: max(outings.date), total: count() })
      .from(outings)
      .where(eq(outings.completionStatus, status))
      .groupBy(outings.lineId)
      .all()
      .map((row) => [row.lineId, row] as const),
  )

const issueCounts = (unresolvedOnly: boolean) =>
  new Map(
    db
      .select({ lineId: issues.lineId, total: count() })
      .from(issues)
      .where(unresolvedOnly ? notInArray(issues.issueStatus, [...RESOLVED_ISSUE_STATUSES]) : undefined)
      .groupBy(issues.lineId)
      .all()
      .map((row) => [row.lineId, row.total] as const),
  )

export const ReportService = {
  /** Recomputes the per-line completion statistics from the current data. */
  async completionReport(user: AuthenticatedUser, sortBy = 'last_completed', sortOrder = 'desc'): Promise<CompletionReport> {
    ensureCanView(user)

    const allLines = db.select().from(lines).orderBy(asc(lines.name), asc(lines.id)).all()
    const completed = outingStats('Completed')
    const partial = outingStats('Partial')
    const totalIssues = issueCounts(false)
    const unresolvedIssues = issueCounts(true)

    const rows = allLines.map((line): CompletionReportRow => ({
      line,
      lineAdminUrl: `/api/lines/${line.id}`,
      lastCompleted: completed.get(line.id)?.lastDate ?? null,
      completedCount: completed.get(line.id)?.total ?? 0,
      lastPartial: partial.get(line.id)?.lastDate ?? null,
      partialCount: partial.get(line.id)?.total ?? 0,
      issuesCount: totalIssues.get(line.id) ?? 0,
      issuesUnresolvedCount: unresolvedIssues.get(line.id) ?? 0,
    }))

    return {
      title: 'Line Completion Report',
      sortBy,
      sortOrder,
      rows: sortReportRows(rows, sortBy, sortOrder),
    }
  },
}
