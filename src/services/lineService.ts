import { asc, count, desc, eq, getTableColumns, or, sql } from 'drizzle-orm'
import type { SQL } from 'drizzle-orm'
import db from '../lib/db'
import { allOf, containsInsensitive } from '../db/filters'
import { issues, lines, outings } from '../db/schema'
import type { Line, LineWithCounts, LineWithRelations } from '../types/database'
import type { LineType } from '../types/models'
import type { AuthenticatedUser } from '../types/user'
import { ensureCanEdit, ensureCanView } from '../utils/authorization'
import { badRequest, notFound } from '../utils/errors'
import { paginate, resolvePage } from '../utils/pagination'
import type { PageQuery, Paginated } from '../utils/pagination'
import { parseStationNumber } from '../utils/stations'

export const LINE_ORDERINGS = [
  'name',
  '-name',
  'outingCount',
  '-outingCount',
  'completedOutingCount',
  '-completedOutingCount',
  'issueCount',
  '-issueCount',
] as const

export type LineOrdering = (typeof LINE_ORDERINGS)[number]

export interface LineQuery extends PageQuery {
  lineType?: LineType
  search?: string
  ordering?: LineOrdering
}

export type LinePayload = {
  name: string
  lineType: LineType
  startStationId: string
  endStationId: string
}

// Single-table selects render columns unqualified, so the outer line id is spelled out.
const outerLineId = sql`${sql.identifier('lines')}.${sql.identifier('id')}`

const outingCount = sql<number>`(select count(*) from ${outings} where ${outings.lineId} = ${outerLineId})`.mapWith(Number)
const completedOutingCount = sql<number>`(select count(*) from ${outings} where ${outings.lineId} = ${outerLineId} and ${outings.completionStatus} = 'Completed')`.mapWith(Number)
const issueCount = sql<number>`(select count(*) from ${issues} where ${issues.lineId} = ${outerLineId})`.mapWith(Number)

const orderingExpressions: Record<string, SQL | typeof lines.name> = {
  name: lines.name,
  outingCount,
  completedOutingCount,
  issueCount,
}

const resolveOrdering = (ordering: LineOrdering = 'name'): SQL => {
  const descending = ordering.startsWith('-')
  const expression = orderingExpressions[descending ? ordering.slice(1) : ordering] ?? lines.name
  return descending ? desc(expression) : asc(expression)
}

const validateRange = (startStationId: string, endStationId: string) => {
  const start = parseStationNumber(startStationId)
  const end = parseStationNumber(endStationId)
  if (start !== null && end !== null && start > end) {
    throw badRequest('The start station must not come after the end station.')
  }
}

export const LineService = {
  async list(user: AuthenticatedUser, query: LineQuery): Promise<Paginated<LineWithCounts>> {
    ensureCanView(user)

    const page = resolvePage(query)
    const search = query.search?.trim()
    const where = allOf([
      query.lineType ? eq(lines.lineType, query.lineType) : undefined,
      search
        ? or(
            containsInsensitive(lines.name, search),
            containsInsensitive(lines.startStationId, search),
            containsInsensitive(lines.endStationId, search),
          )
        : undefined,
    ])

    const total = db.select({ total: count() }).from(lines).where(where).get()?.total ?? 0
    const rows = db
      .select({ ...getTableColumns(lines), outingCount, completedOutingCount, issueCount })
      .from(lines)
      .where(where)
      .orderBy(resolveOrdering(query.ordering), asc(lines.id))
      .limit(page.limit)
      .offset(page.offset)
      .all()

    return paginate(rows, total, page)
  },

  async getLineOrThrow(lineId: number): Promise<Line> {
    const line = db.select().from(lines).where(eq(lines.id, lineId)).get()
    if (!line) {
      throw notFound('Line')
    }
    return line
  },

  async getLineForUser(lineId: number, user: AuthenticatedUser): Promise<LineWithRelations> {
    ensureCanView(user)

    const line = await this.getLineOrThrow(lineId)
    return {
      ...line,
      outings: db.select().from(outings).where(eq(outings.lineId, line.id)).orderBy(desc(outings.date)).all(),
      issues: db.select().from(issues).where(eq(issues.lineId, line.id)).orderBy(asc(issues.id)).all(),
    }
  },

  async create(user: AuthenticatedUser, payload: LinePayload): Promise<Line> {
    ensureCanEdit(user)
    validateRange(payload.startStationId, payload.endStationId)

    const [created] = db
      .insert(lines)
      .values({
        name: payload.name.trim(),
        lineType: payload.lineType,
        startStationId: payload.startStationId.trim(),
        endStationId: payload.endStationId.trim(),
      })
      .returning()
      .all()
    return created
  },

  async update(user: AuthenticatedUser, lineId: number, payload: Partial<LinePayload>): Promise<Line> {
    ensureCanEdit(user)

    const line = await this.getLineOrThrow(lineId)
    const next = {
      name: payload.name?.trim() ?? line.name,
      lineType: payload.lineType ?? line.lineType,
      startStationId: payload.startStationId?.trim() ?? line.startStationId,
      endStationId: payload.endStationId?.trim() ?? line.endStationId,
    }
    validateRange(next.startStationId, next.endStationId)

    const [updated] = db.update(lines).set(next).where(eq(lines.id, line.id)).returning().all()
    return updated
  },

  async remove(user: AuthenticatedUser, lineId: number): Promise<void> {
    ensureCanEdit(user)

    const line = await this.getLineOrThrow(lineId)
    db.delete(lines).where(eq(lines.id, line.id)).run()
  },
}
