import { asc, eq } from 'drizzle-orm'
import type { DbClient } from '../lib/db'
import type { Cell } from '../lib/tabular'
import { issues, lines, outingParticipants, outings, teamMembers } from '../db/schema'
import type { NewIssue, NewLine, NewOuting, NewTeamMember } from '../types/database'
import { isCompletionStatus, isIssueStatus, isIssueType, isLineType, isStationType } from '../types/models'
import { insertIssue } from '../services/issueService'
import { addParticipant, insertOuting } from '../services/outingService'
import { RowReader } from './rowReader'

/**
 * Column mapping between one table and its CSV/TSV form. `read` validates a record
 * and reports problems through the reader; writes happen only for clean rows.
 */
export interface TabularResource<TValues> {
  name: string
  columns: string[]
  exportRows(client: DbClient): Cell[][]
  read(reader: RowReader, client: DbClient): TValues
  exists(client: DbClient, id: number): boolean
  create(client: DbClient, values: TValues): number
  update(client: DbClient, id: number, values: TValues): void
}

const lineExists = (client: DbClient, id: number): boolean =>
  client.select({ id: lines.id }).from(lines).where(eq(lines.id, id)).get() !== undefined

const teamMemberExists = (client: DbClient, id: number): boolean =>
  client.select({ id: teamMembers.id }).from(teamMembers).where(eq(teamMembers.id, id)).get() !== undefined

const findOutingLine = (client: DbClient, id: number): number | null =>
  client.select({ lineId: outings.lineId }).from(outings).where(eq(outings.id, id)).get()?.lineId ?? null

const readLineReference = (reader: RowReader, client: DbClient, column: string): number => {
  const lineId = reader.id(column)
  if (lineId === null) {
    if (!reader.raw(column)) {
      reader.errors.push(`${column}: this field is required`)
    }
    return 0
  }
  if (!lineExists(client, lineId)) {
    reader.errors.push(`${column}: line ${lineId} does not exist`)
  }
  return lineId
}

export const lineResource: TabularResource<Omit<NewLine, 'id'>> = {
  name: 'lines',
  columns: ['id', 'name', 'line_type', 'start_station_id', 'end_station_id'],

  exportRows(client) {
    return client
      .select()
      .from(lines)
      .orderBy(asc(lines.name), asc(lines.id))
      .all()
      .map((line) => [line.id, line.name, line.lineType, line.startStationId, line.endStationId])
  },

  read(reader) {
    return {
      name: reader.requiredText('name', { maxLength: 100 }),
      lineType: reader.choice('line_type', isLineType) ?? 'Transect',
      startStationId: reader.requiredText('start_station_id', { maxLength: 5 }),
      endStationId: reader.requiredText('end_station_id', { maxLength: 5 }),
    }
  },

  exists: lineExists,

  create(client, values) {
    const [created] = client.insert(lines).values(values).returning({ id: lines.id }).all()
    return created.id
  },

  update(client, id, values) {
    client.update(lines).set(values).where(eq(lines.id, id)).run()
  },
}

export const teamMemberResource: TabularResource<Omit<NewTeamMember, 'id'>> = {
  name: 'team-members',
  columns: ['id', 'name', 'available', 'email_address'],

  exportRows(client) {
    return client
      .select()
      .from(teamMembers)
      .orderBy(asc(teamMembers.name), asc(teamMembers.id))
      .all()
      .map((member) => [member.id, member.name, member.available ? 1 : 0, member.emailAddress])
  },

  read(reader) {
    return {
      name: reader.requiredText('name', { maxLength: 15 }),
      available: reader.boolean('available', true),
      emailAddress: reader.text('email_address', { maxLength: 254 }),
    }
  },

  exists: teamMemberExists,

  create(client, values) {
    const [created] = client.insert(teamMembers).values(values).returning({ id: teamMembers.id }).all()
    return created.id
  },

  update(client, id, values) {
    client.update(teamMembers).set(values).where(eq(teamMembers.id, id)).run()
  },
}

type OutingValues = Omit<NewOuting, 'id'> & { participantIds: number[] }

export const outingResource: TabularResource<OutingValues> = {
  name: 'outings',
  columns: [
    'id',
    'date',
    'route',
    'completion_status',
    'start_station_id',
    'end_station_id',
    'hours',
    'number_of_workers',
    'participants',
  ],

  exportRows(client) {
    const participants = new Map<number, number[]>()
    for (const row of client.select().from(outingParticipants).orderBy(asc(outingParticipants.teamMemberId)).all()) {
      participants.set(row.outingId, [...(participants.get(row.outingId) ?? []), row.teamMemberId])
    }

    return client
      .select()
      .from(outings)
      .orderBy(asc(outings.date), asc(outings.id))
      .all()
      .map((outing) => [
        outing.id,
        outing.date,
        outing.lineId,
        outing.completionStatus,
        outing.startStationId,
        outing.endStationId,
        outing.hours,
        outing.numberOfWorkers,
        (participants.get(outing.id) ?? []).join(','),
      ])
  },

  read(reader, client) {
    const participantIds = reader.idList('participants')
    for (const memberId of participantIds) {
      if (!teamMemberExists(client, memberId)) {
        reader.errors.push(`participants: team member ${memberId} does not exist`)
      }
    }

    return {
      date: reader.date('date'),
      lineId: readLineReference(reader, client, 'route'),
      completionStatus: reader.choice('completion_status', isCompletionStatus, 'Completed') ?? 'Completed',
      startStationId: reader.text('start_station_id', { maxLength: 5 }),
      endStationId: reader.text('end_station_id', { maxLength: 5 }),
      hours: reader.decimal('hours', { min: 0 }),
      numberOfWorkers: reader.decimal('number_of_workers', { fallback: 1, min: 0 }),
      participantIds,
    }
  },

  exists: (client, id) => findOutingLine(client, id) !== null,

  create(client, { participantIds, ...values }) {
    const outing = insertOuting(client, values)
    for (const memberId of participantIds) {
      addParticipant(client, outing.id, memberId)
    }
    return outing.id
  },

  update(client, id, { participantIds, ...values }) {
    client.update(outings).set(values).where(eq(outings.id, id)).run()
    client.delete(outingParticipants).where(eq(outingParticipants.outingId, id)).run()
    for (const memberId of participantIds) {
      addParticipant(client, id, memberId)
    }
  },
}

type IssueValues = Omit<NewIssue, 'id' | 'createdAt' | 'updatedAt'>

export const issueResource: TabularResource<IssueValues> = {
  name: 'issues',
  columns: [
    'id',
    'line',
    'outing',
    'issue_status',
    'start_station_id',
    'end_station_id',
    'station_type',
    'issue_type',
    'origin',
    'reported_by',
    'description',
    'photo',
    'created_at',
    'updated_at',
  ],

  exportRows(client) {
    return client
      .select()
      .from(issues)
      .orderBy(asc(issues.id))
      .all()
      .map((issue) => [
        issue.id,
        issue.lineId,
        issue.outingId,
        issue.issueStatus,
        issue.startStationId,
        issue.endStationId,
        issue.stationType,
        issue.issueType,
        issue.origin,
        issue.reportedBy,
        issue.description,
        issue.photo,
        issue.createdAt.toISOString(),
        issue.updatedAt.toISOString(),
      ])
  },

  read(reader, client) {
    const lineId = readLineReference(reader, client, 'line')
    const outingId = reader.id('outing')
    if (outingId !== null) {
      const outingLineId = findOutingLine(client, outingId)
      if (outingLineId === null) {
        reader.errors.push(`outing: outing ${outingId} does not exist`)
      } else if (outingLineId !== lineId) {
        reader.errors.push(`outing: outing ${outingId} belongs to another line`)
      }
    }

    return {
      lineId,
      outingId,
      issueStatus: reader.choice('issue_status', isIssueStatus, 'NeedsWork') ?? 'NeedsWork',
      startStationId: reader.requiredText('start_station_id', { maxLength: 5 }),
      endStationId: reader.text('end_station_id', { maxLength: 5 }),
      stationType: reader.choice('station_type', isStationType, 'NA') ?? 'NA',
      issueType: reader.choice('issue_type', isIssueType) ?? 'Complicated',
      origin: reader.text('origin', { maxLength: 15 }),
      reportedBy: reader.text('reported_by', { maxLength: 10 }),
      description: reader.text('description'),
      photo: reader.text('photo'),
    }
  },

  exists: (client, id) => client.select({ id: issues.id }).from(issues).where(eq(issues.id, id)).get() !== undefined,

  create(client, values) {
    return insertIssue(client, values).id
  },

  update(client, id, values) {
    client
      .update(issues)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(issues.id, id))
      .run()
  },
}
