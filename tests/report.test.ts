import { beforeEach, describe, expect, it } from 'vitest'
import { ReportService, sortReportRows } from '../src/services/reportService'
import type { CompletionReportRow } from '../src/services/reportService'
import { createIssue, createLine, createOuting, resetDatabase, viewerUser } from './helpers'

const names = (rows: CompletionReportRow[]) => rows.map((row) => row.line.name)

describe('ReportService.completionReport', () => {
  beforeEach(() => {
    resetDatabase()

    const alpha = createLine({ name: 'Alpha' })
    const bravo = createLine({ name: 'Bravo', lineType: 'MouseLine' })
    createLine({ name: 'Charlie' })

    createOuting({ lineId: alpha.id, date: '2024-01-10' })
    createOuting({ lineId: alpha.id, date: '2024-03-05' })
    createOuting({ lineId: alpha.id, date: '2024-02-01', completionStatus: 'Partial' })
    createOuting({ lineId: bravo.id, date: '2024-04-01' })

    createIssue({ lineId: alpha.id, issueStatus: 'NeedsWork' })
    createIssue({ lineId: alpha.id, issueStatus: 'Fixed' })
    createIssue({ lineId: alpha.id, issueStatus: 'NoActionReq' })
    createIssue({ lineId: bravo.id, issueStatus: 'Progressing' })
  })

  it('computes per-line statistics, newest completion first by default', async () => {
    const report = await ReportService.completionReport(viewerUser)

    expect(report.title).toBe('Line Completion Report')
    expect(report.sortBy).toBe('last_completed')
    expect(report.sortOrder).toBe('desc')
    expect(names(report.rows)).toEqual(['Bravo', 'Alpha', 'Charlie'])

    const alpha = report.rows[1]
    expect(alpha.lineAdminUrl).toBe(`/api/lines/${alpha.line.id}`)
    expect(alpha).toMatchObject({
      lastCompleted: '2024-03-05',
      completedCount: 2,
      lastPartial: '2024-02-01',
      partialCount: 1,
      issuesCount: 3,
      issuesUnresolvedCount: 1,
    })
  })

  it('reports a line without outings as never worked', async () => {
    const report = await ReportService.completionReport(viewerUser)
    expect(report.rows[2]).toMatchObject({
      lastCompleted: null,
      completedCount: 0,
      lastPartial: null,
      partialCount: 0,
      issuesCount: 0,
      issuesUnresolvedCount: 0,
    })
  })

  it('sorts by a count ascending', async () => {
    const report = await ReportService.completionReport(viewerUser, 'completed_count', 'asc')
    expect(report.rows.map((row) => row.completedCount)).toEqual([0, 1, 2])
  })

  it('sorts by completed count descending without increasing', async () => {
    const report = await ReportService.completionReport(viewerUser, 'completed_count', 'desc')
    const counts = report.rows.map((row) => row.completedCount)

    expect(counts).toEqual([2, 1, 0])
    expect(counts.every((value, index) => index === 0 || value <= counts[index - 1])).toBe(true)
  })

  it('sorts by issue totals and by unresolved issues', async () => {
    const byTotal = await ReportService.completionReport(viewerUser, 'issues_count', 'desc')
    expect(names(byTotal.rows)).toEqual(['Alpha', 'Bravo', 'Charlie'])
    expect(byTotal.rows.map((row) => row.issuesCount)).toEqual([3, 1, 0])

    const byUnresolved = await ReportService.completionReport(viewerUser, 'issues_unresolved_count', 'asc')
    expect(names(byUnresolved.rows)).toEqual(['Charlie', 'Alpha', 'Bravo'])
    expect(byUnresolved.rows.map((row) => row.issuesUnresolvedCount)).toEqual([0, 1, 1])
  })

  it('keeps name order for ties and for unknown fields', async () => {
    const byPartial = await ReportService.completionReport(viewerUser, 'partial_count', 'desc')
    expect(names(byPartial.rows)).toEqual(['Alpha', 'Bravo', 'Charlie'])

    const unknown = await ReportService.completionReport(viewerUser, 'bogus', 'desc')
    expect(names(unknown.rows)).toEqual(['Alpha', 'Bravo', 'Charlie'])
    expect(unknown.sortBy).toBe('bogus')
  })

  it('sorts absent dates as the earliest', async () => {
    const report = await ReportService.completionReport(viewerUser, 'last_partial', 'asc')
    expect(names(report.rows)).toEqual(['Bravo', 'Charlie', 'Alpha'])
  })
})

describe('sortReportRows', () => {
  const row = (name: string, completedCount: number): CompletionReportRow => ({
    line: { id: completedCount, name, lineType: 'Transect', startStationId: '1', endStationId: '2' },
    lineAdminUrl: '',
    lastCompleted: null,
    completedCount,
    lastPartial: null,
    partialCount: 0,
    issuesCount: 0,
    issuesUnresolvedCount: 0,
  })

  it('does not reorder the input array', () => {
    const rows = [row('b', 1), row('a', 2)]
    const sorted = sortReportRows(rows, 'line_name', 'asc')
    expect(names(sorted)).toEqual(['a', 'b'])
    expect(names(rows)).toEqual(['b', 'a'])
  })

  it('treats anything other than desc as ascending', () => {
    expect(names(sortReportRows([row('b', 2), row('a', 1)], 'completed_count', 'sideways'))).toEqual(['a', 'b'])
  })
})
