import { asc, count, desc, eq, or } from 'drizzle-orm'
import db from '../lib/db'
import type { DbClient } from '../lib/db'
import { allOf, containsInsensitive } from '../db/filters'
import { issues, outings } from '../db/schema'
import type { Issue, NewIssue } from '../types/database'
import type { IssueStatus, IssueType, StationType } from '../types/models'
import type { AuthenticatedUser } from '../types/user'
import { ensureCanEdit, ensureCanView } from '../utils/authorization'
import { badRequest, notFound } from '../utils/errors'
import { paginate, resolvePage } from '../utils/pagination'
import type { PageQuery, Paginated } from '../utils/pagination'
import { emptyToNull } from '../utils/strings'
import { LineService } from './lineService'

export interface IssueQuery extends PageQuery {
  issueStatus?: IssueStatus
  issueType?: IssueType
  stationType?: StationType
  lineId?: number
  outingId?: number
  search?: string
}

export type IssuePayload = {
  lineId?: number
  outingId?: number | null
  issueStatus?: IssueStatus
  startStationId: string
  endStationId?: string | null
  stationType?: StationType
  issueType: IssueType
  origin?: string | null
  reportedBy?: string | null
  description?: string | null
  photo?: string | null
}

export const insertIssue = (client: DbClient, values: Omit<NewIssue, 'createdAt' | 'updatedAt'>, now = new Date()): Issue => {
  const [created] = client
    .insert(issues)
    .values({ ...values, createdAt: now, updatedAt: now })
    .returning()
    .all()
  return created
}

const resolveLineId = async (lineId: number | undefined, outingId: number | null | undefined): Promise<number> => {
  if (outingId === undefined || outingId === null) {
    if (lineId === undefined) {
      throw badRequest('An issue must reference a line.')
    }
    return (await LineService.getLineOrThrow(lineId)).id
  }

  const outing = db.select().from(outings).where(eq(outings.id, outingId)).get()
  if (!outing) {
    throw notFound('Outing')
  }

  if (lineId !== undefined && lineId !== outing.lineId) {
    throw badRequest('The issue line must match the line of its outing.')
  }

  return outing.lineId
}

export const IssueService = {
  async list(user: AuthenticatedUser, query: IssueQuery): Promise<Paginated<Issue>> {
    ensureCanView(user)

    const page = resolvePage(query)
    const search = query.search?.trim()
    const where = allOf([
      query.issueStatus ? eq(issues.issueStatus, query.issueStatus) : undefined,
      query.issueType ? eq(issues.issueType, query.issueType) : undefined,
      query.stationType ? eq(issues.stationType, query.stationType) : undefined,
      query.lineId !== undefined ? eq(issues.lineId, query.lineId) : undefined,
      query.outingId !== undefined ? eq(issues.outingId, query.outingId) : undefined,
      search
        ? or(containsInsensitive(issues.startStationId, search), containsInsensitive(issues.description, search))
        : undefined,
    ])

    const total = db.select({ total: count() }).from(issues).where(where).get()?.total ?? 0
    const items = db
      .select()
      .from(issues)
      .where(where)
      .orderBy(desc(issues.createdAt), asc(issues.id))
      .limit(page.limit)
      .offset(page.offset)
      .all()

    return paginate(items, total, page)
  },

  async getIssueOrThrow(issueId: number): Promise<Issue> {
    const issue = db.select().from(issues).where(eq(issues.id, issueId)).get()
    if (!issue) {
      throw notFound('Issue')
    }
    return issue
  },

  async getIssueForUser(issueId: number, user: AuthenticatedUser): Promise<Issue> {
    ensureCanView(user)
    return this.getIssueOrThrow(issueId)
  },

  async create(user: AuthenticatedUser, payload: IssuePayload): Promise<Issue> {
    ensureCanEdit(user)

    const lineId = await resolveLineId(payload.lineId, payload.outingId)
    return insertIssue(db, {
      lineId,
      outingId: payload.outingId ?? null,
      issueStatus: payload.issueStatus ?? 'NeedsWork',
      startStationId: payload.startStationId.trim(),
      endStationId: emptyToNull(payload.endStationId),
      stationType: payload.stationType ?? 'NA',
      issueType: payload.issueType,
      origin: emptyToNull(payload.origin),
      reportedBy: emptyToNull(payload.reportedBy),
      description: emptyToNull(payload.description),
      photo: emptyToNull(payload.photo),
    })
  },

  async update(user: AuthenticatedUser, issueId: number, payload: Partial<IssuePayload>): Promise<Issue> {
    ensureCanEdit(user)

    const issue = await this.getIssueOrThrow(issueId)
    const outingId = payload.outingId === undefined ? issue.outingId : payload.outingId
    const lineId =
      payload.lineId === undefined && payload.outingId === undefined
        ? issue.lineId
        : await resolveLineId(payload.lineId ?? (outingId === null ? issue.lineId : undefined), outingId)

    const [updated] = db
      .update(issues)
      .set({
        lineId,
        outingId,
        issueStatus: payload.issueStatus ?? issue.issueStatus,
        startStationId: payload.startStationId?.trim() ?? issue.startStationId,
        endStationId: payload.endStationId === undefined ? issue.endStationId : emptyToNull(payload.endStationId),
        stationType: payload.stationType ?? issue.stationType,
        issueType: payload.issueType ?? issue.issueType,
        origin: payload.origin === undefined ? issue.origin : emptyToNull(payload.origin),
        reportedBy: payload.reportedBy === undefined ? issue.reportedBy : emptyToNull(payload.reportedBy),
        description: payload.description === undefined ? issue.description : emptyToNull(payload.description),
        photo: payload.photo === undefined ? issue.photo : emptyToNull(payload.photo),
        updatedAt: new Date(),
      })
      .where(eq(issues.id, issue.id))
      .returning()
      .all()
    return updated
  },

  async remove(user: AuthenticatedUser, issueId: number): Promise<void> {
    ensureCanEdit(user)

    const issue = await this.getIssueOrThrow(issueId)
    db.delete(issues).where(eq(issues.id, issue.id)).run()
  },
}
