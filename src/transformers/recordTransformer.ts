import type { Audit, Issue, Line, LineWithCounts, LineWithRelations, Outing, OutingWithRelations, TeamMember } from '../types/database'
import {
  auditActionLabels,
  completionStatusLabels,
  issueStatusLabels,
  issueTypeLabels,
  lineTypeLabels,
  stationTypeLabels,
} from '../types/models'
import type { AuditAction, CompletionStatus, IssueStatus, IssueType, LineType, StationType } from '../types/models'
import type { OutingListItem } from '../services/outingService'
import type { CompletionReport, CompletionReportRow } from '../services/reportService'

export type LineResponse = {
  id: number
  name: string
  displayName: string
  lineType: LineType
  lineTypeLabel: string
  startStationId: string
  endStationId: string
  outingCount?: number
  completedOutingCount?: number
  issueCount?: number
}

export type TeamMemberResponse = {
  id: number
  name: string
  displayName: string
  available: boolean
  emailAddress: string | null
}

export type IssueResponse = {
  id: number
  displayName: string
  lineId: number
  outingId: number | null
  issueStatus: IssueStatus
  issueStatusLabel: string
  startStationId: string
  endStationId: string | null
  stationType: StationType
  stationTypeLabel: string
  issueType: IssueType
  issueTypeLabel: string
  origin: string | null
  reportedBy: string | null
  description: string | null
  photo: string | null
  createdAt: string
  updatedAt: string
}

export type OutingResponse = {
  id: number
  displayName: string
  date: string
  lineId: number
  line?: LineResponse
  completionStatus: CompletionStatus
  completionStatusLabel: string
  startStationId: string | null
  endStationId: string | null
  hours: number
  numberOfWorkers: number
  participants?: TeamMemberResponse[]
  issues?: IssueResponse[]
}

export type AuditResponse = {
  id: number
  action: AuditAction
  actionLabel: string
  ip: string | null
  username: string | null
  when: string
}

const hasCounts = (line: Line | LineWithCounts): line is LineWithCounts => 'outingCount' in line

export const buildLineResponse = (line: Line | LineWithCounts): LineResponse => {
  const response: LineResponse = {
    id: line.id,
    name: line.name,
    displayName: `${line.name} (${lineTypeLabels[line.lineType]})`,
    lineType: line.lineType,
    lineTypeLabel: lineTypeLabels[line.lineType],
    startStationId: line.startStationId,
    endStationId: line.endStationId,
  }

  if (hasCounts(line)) {
    response.outingCount = line.outingCount
    response.completedOutingCount = line.completedOutingCount
    response.issueCount = line.issueCount
  }

  return response
}

export const buildTeamMemberResponse = (member: TeamMember): TeamMemberResponse => ({
  id: member.id,
  name: member.name,
  displayName: member.available ? member.name : `[${member.name}]`,
  available: member.available,
  emailAddress: member.emailAddress,
})

export const buildIssueResponse = (issue: Issue): IssueResponse => ({
  id: issue.id,
  displayName: `Issue at ${issue.startStationId}: ${issueTypeLabels[issue.issueType]}`,
  lineId: issue.lineId,
  outingId: issue.outingId,
  issueStatus: issue.issueStatus,
  issueStatusLabel: issueStatusLabels[issue.issueStatus],
  startStationId: issue.startStationId,
  endStationId: issue.endStationId,
  stationType: issue.stationType,
  stationTypeLabel: stationTypeLabels[issue.stationType],
  issueType: issue.issueType,
  issueTypeLabel: issueTypeLabels[issue.issueType],
  origin: issue.origin,
  reportedBy: issue.reportedBy,
  description: issue.description,
  photo: issue.photo,
  createdAt: issue.createdAt.toISOString(),
  updatedAt: issue.updatedAt.toISOString(),
})

export const buildOutingResponse = (outing: Outing | OutingListItem | OutingWithRelations): OutingResponse => {
  const response: OutingResponse = {
    id: outing.id,
    displayName: `Outing on ${outing.date} - ${completionStatusLabels[outing.completionStatus]}`,
    date: outing.date,
    lineId: outing.lineId,
    completionStatus: outing.completionStatus,
    completionStatusLabel: completionStatusLabels[outing.completionStatus],
    startStationId: outing.startStationId,
    endStationId: outing.endStationId,
    hours: outing.hours,
    numberOfWorkers: outing.numberOfWorkers,
  }

  if ('line' in outing) {
    response.line = buildLineResponse(outing.line)
    response.participants = outing.participants.map(buildTeamMemberResponse)
  }
  if ('issues' in outing) {
    response.issues = outing.issues.map(buildIssueResponse)
  }

  return response
}

export const buildLineDetailResponse = (line: LineWithRelations) => ({
  ...buildLineResponse(line),
  outings: line.outings.map(buildOutingResponse),
  issues: line.issues.map(buildIssueResponse),
})

export const buildAuditResponse = (audit: Audit): AuditResponse => ({
  id: audit.id,
  action: audit.action,
  actionLabel: auditActionLabels[audit.action],
  ip: audit.ip,
  username: audit.username,
  when: audit.when.toISOString(),
})

const buildReportRowResponse = (row: CompletionReportRow) => ({
  line: buildLineResponse(row.line),
  lineAdminUrl: row.lineAdminUrl,
  lastCompleted: row.lastCompleted,
  completedCount: row.completedCount,
  lastPartial: row.lastPartial,
  partialCount: row.partialCount,
  issuesCount: row.issuesCount,
  issuesUnresolvedCount: row.issuesUnresolvedCount,
})

export const buildCompletionReportResponse = (report: CompletionReport) => ({
  title: report.title,
  sortBy: report.sortBy,
  sortOrder: report.sortOrder,
  rows: report.rows.map(buildReportRowResponse),
})

export const COMPLETION_REPORT_HEADERS = [
  'Line Name',
  'Type',
  'Last Completed',
  'Last Partial',
  'Completed Count',
  'Partial Count',
  'Unresolved Issues',
  'Total Issues',
]

export const completionReportCsvRows = (report: CompletionReport): Array<Array<string | number>> =>
  report.rows.map((row) => [
    row.line.name,
    lineTypeLabels[row.line.lineType],
    row.lastCompleted ?? 'Never',
    row.lastPartial ?? 'Never',
    row.completedCount,
    row.partialCount,
    row.issuesUnresolvedCount,
    row.issuesCount,
  ])
