import { and, asc, count, desc, eq, gte, inArray, lte } from 'drizzle-orm'
import db from '../lib/db'
import type { DbClient } from '../lib/db'
import { allOf } from '../db/filters'
import { issues, lines, outingParticipants, outings, teamMembers } from '../db/schema'
import type { Issue, Line, NewOuting, Outing, OutingWithRelations, TeamMember } from '../types/database'
import type { CompletionStatus } from '../types/models'
import type { AuthenticatedUser } from '../types/user'
import { ensureCanEdit, ensureCanView } from '../utils/authorization'
import { badRequest, notFound } from '../utils/errors'
import { paginate, resolvePage } from '../utils/pagination'
import type { PageQuery, Paginated } from '../utils/pagination'
import { subRangeWithinLine } from '../utils/stations'
import { emptyToNull } from '../utils/strings'
import { IssueService } from './issueService'
import type { IssuePayload } from './issueService'
import { LineService } from './lineService'

export interface OutingQuery extends PageQuery {
  dateFrom?: string
  dateTo?: string
  lineId?: number
  completionStatus?: CompletionStatus
}

export type OutingPayload = {
  date: string
  lineId: number
  hours: number
  numberOfWorkers?: number
  completionStatus?: CompletionStatus
  startStationId?: string | null
  endStationId?: string | null
  participantIds?: number[]
}

export type OutingListItem = Outing & {
  line: Line
  participants: TeamMember[]
}

const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

export const findOuting = (client: DbClient, date: string, lineId: number): Outing | undefined =>
  client
    .select()
    .from(outings)
    .where(and(eq(outings.date, date), eq(outings.lineId, lineId)))
    .orderBy(asc(outings.id))
    .get()

export const insertOuting = (client: DbClient, values: NewOuting): Outing => {
  const [created] = client
    .insert(outings)
    .values({
      ...values,
      hours: roundTo(values.hours, 2),
      numberOfWorkers: values.numberOfWorkers === undefined ? undefined : roundTo(values.numberOfWorkers, 1),
    })
    .returning()
    .all()
  return created
}

/** Returns true when the member was not already a participant. */
export const addParticipant = (client: DbClient, outingId: number, teamMemberId: number): boolean => {
  const result = client
    .insert(outingParticipants)
    .values({ outingId, teamMemberId })
    .onConflictDoNothing()
    .run()
  return result.changes > 0
}

const loadParticipants = (outingIds: number[]): Map<number, TeamMember[]> => {
  const grouped = new Map<number, TeamMember[]>()
  if (outingIds.length === 0) {
    return grouped
  }

  const rows = db
    .select({ outingId: outingParticipants.outingId, member: teamMembers })
    .from(outingParticipants)
    .innerJoin(teamMembers, eq(teamMembers.id, outingParticipants.teamMemberId))
    .where(inArray(outingParticipants.outingId, outingIds))
    .orderBy(asc(teamMembers.name))
    .all()

  for (const row of rows) {
    const members = grouped.get(row.outingId) ?? []
    members.push(row.member)
    grouped.set(row.outingId, members)
  }
  return grouped
}

const ensureMembersExist = (memberIds: number[]) => {
  if (memberIds.length === 0) {
    return
  }
  const found = db.select({ id: teamMembers.id }).from(teamMembers).where(inArray(teamMembers.id, memberIds)).all()
  const missing = memberIds.filter((id) => !found.some((member) => member.id === id))
  if (missing.length > 0) {
    throw badRequest(`Unknown team member(s): ${missing.join(', ')}`)
  }
}

const ensureStationsWithinLine = (line: Line, start: string | null, end: string | null) => {
  if (!subRangeWithinLine(line, start, end)) {
    throw badRequest(
      `Stations ${start ?? '?'}-${end ?? '?'} are outside line ${line.name} (${line.startStationId}-${line.endStationId}).`,
    )
  }
}

export const OutingService = {
  async list(user: AuthenticatedUser, query: OutingQuery): Promise<Paginated<OutingListItem>> {
    ensureCanView(user)

    const page = resolvePage(query)
    const where = allOf([
      query.dateFrom ? gte(outings.date, query.dateFrom) : undefined,
      query.dateTo ? lte(outings.date, query.dateTo) : undefined,
      query.lineId !== undefined ? eq(outings.lineId, query.lineId) : undefined,
      query.completionStatus ? eq(outings.completionStatus, query.completionStatus) : undefined,
    ])

    const total = db.select({ total: count() }).from(outings).where(where).get()?.total ?? 0
    const rows = db
      .select({ outing: outings, line: lines })
      .from(outings)
      .innerJoin(lines, eq(lines.id, outings.lineId))
      .where(where)
      .orderBy(desc(outings.date), asc(outings.id))
      .limit(page.limit)
      .offset(page.offset)
      .all()

    const participants = loadParticipants(rows.map((row) => row.outing.id))
    const items = rows.map((row) => ({
      ...row.outing,
      line: row.line,
      participants: participants.get(row.outing.id) ?? [],
    }))

    return paginate(items, total, page)
  },

  async getOutingOrThrow(outingId: number): Promise<Outing> {
    const outing = db.select().from(outings).where(eq(outings.id, outingId)).get()
    if (!outing) {
      throw notFound('Outing')
    }
    return outing
  },

  async getOutingForUser(outingId: number, user: AuthenticatedUser): Promise<OutingWithRelations> {
    ensureCanView(user)

    const outing = await this.getOutingOrThrow(outingId)
    const line = await LineService.getLineOrThrow(outing.lineId)
    return {
      ...outing,
      line,
      participants: loadParticipants([outing.id]).get(outing.id) ?? [],
      issues: db.select().from(issues).where(eq(issues.outingId, outing.id)).orderBy(asc(issues.id)).all(),
    }
  },

  async create(user: AuthenticatedUser, payload: OutingPayload): Promise<OutingWithRelations> {
    ensureCanEdit(user)

    const line = await LineService.getLineOrThrow(payload.lineId)
    const startStationId = emptyToNull(payload.startStationId)
    const endStationId = emptyToNull(payload.endStationId)
    ensureStationsWithinLine(line, startStationId, endStationId)

    const participantIds = [...new Set(payload.participantIds ?? [])]
    ensureMembersExist(participantIds)

    const created = db.transaction((tx) => {
      const outing = insertOuting(tx, {
        date: payload.date,
        lineId: line.id,
        hours: payload.hours,
        numberOfWorkers: payload.numberOfWorkers ?? 1,
        completionStatus: payload.completionStatus ?? 'Completed',
        startStationId,
        endStationId,
      })
      for (const memberId of participantIds) {
        addParticipant(tx, outing.id, memberId)
      }
      return outing
    })

    return this.getOutingForUser(created.id, user)
  },

  async update(user: AuthenticatedUser, outingId: number, payload: Partial<OutingPayload>): Promise<OutingWithRelations> {
    ensureCanEdit(user)

    const outing = await this.getOutingOrThrow(outingId)
    const line = await LineService.getLineOrThrow(payload.lineId ?? outing.lineId)
    const startStationId = payload.startStationId === undefined ? outing.startStationId : emptyToNull(payload.startStationId)
    const endStationId = payload.endStationId === undefined ? outing.endStationId : emptyToNull(payload.endStationId)
    ensureStationsWithinLine(line, startStationId, endStationId)

    const participantIds = payload.participantIds ? [...new Set(payload.participantIds)] : null
    if (participantIds) {
      ensureMembersExist(participantIds)
    }

    db.transaction((tx) => {
      tx.update(outings)
        .set({
          date: payload.date ?? outing.date,
          lineId: line.id,
          hours: payload.hours === undefined ? outing.hours : roundTo(payload.hours, 2),
          numberOfWorkers:
            payload.numberOfWorkers === undefined ? outing.numberOfWorkers : roundTo(payload.numberOfWorkers, 1),
          completionStatus: payload.completionStatus ?? outing.completionStatus,
          startStationId,
          endStationId,
        })
        .where(eq(outings.id, outing.id))
        .run()

      if (line.id !== outing.lineId) {
        tx.update(issues).set({ lineId: line.id }).where(eq(issues.outingId, outing.id)).run()
      }

      if (participantIds) {
        tx.delete(outingParticipants).where(eq(outingParticipants.outingId, outing.id)).run()
        for (const memberId of participantIds) {
          addParticipant(tx, outing.id, memberId)
        }
      }
    })

    return this.getOutingForUser(outing.id, user)
  },

  async remove(user: AuthenticatedUser, outingId: number): Promise<void> {
    ensureCanEdit(user)

    const outing = await this.getOutingOrThrow(outingId)
    db.delete(outings).where(eq(outings.id, outing.id)).run()
  },

  /** Inline issue creation: the issue's line defaults to the outing's line. */
  async createIssue(user: AuthenticatedUser, outingId: number, payload: Omit<IssuePayload, 'outingId'>): Promise<Issue> {
    const outing = await this.getOutingOrThrow(outingId)
    return IssueService.create(user, { ...payload, outingId: outing.id, lineId: payload.lineId ?? outing.lineId })
  },
}
