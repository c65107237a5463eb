import { asc, count, desc, eq, or } from 'drizzle-orm'
import db from '../lib/db'
import { allOf, containsInsensitive } from '../db/filters'
import { teamMembers } from '../db/schema'
import type { TeamMember } from '../types/database'
import type { AuthenticatedUser } from '../types/user'
import { ensureCanEdit, ensureCanView } from '../utils/authorization'
import { notFound } from '../utils/errors'
import { paginate, resolvePage } from '../utils/pagination'
import type { PageQuery, Paginated } from '../utils/pagination'
import { emptyToNull } from '../utils/strings'

export interface TeamMemberQuery extends PageQuery {
  search?: string
  available?: boolean
}

export type TeamMemberPayload = {
  name: string
  available?: boolean
  emailAddress?: string | null
}

export const TeamMemberService = {
  async list(user: AuthenticatedUser, query: TeamMemberQuery): Promise<Paginated<TeamMember>> {
    ensureCanView(user)

    const page = resolvePage(query)
    const search = query.search?.trim()
    const where = allOf([
      query.available === undefined ? undefined : eq(teamMembers.available, query.available),
      search
        ? or(containsInsensitive(teamMembers.name, search), containsInsensitive(teamMembers.emailAddress, search))
        : undefined,
    ])

    const total = db.select({ total: count() }).from(teamMembers).where(where).get()?.total ?? 0
    const items = db
      .select()
      .from(teamMembers)
      .where(where)
      .orderBy(desc(teamMembers.available), asc(teamMembers.name), asc(teamMembers.id))
      .limit(page.limit)
      .offset(page.offset)
      .all()

    return paginate(items, total, page)
  },

  async getTeamMemberOrThrow(memberId: number): Promise<TeamMember> {
    const member = db.select().from(teamMembers).where(eq(teamMembers.id, memberId)).get()
    if (!member) {
      throw notFound('Team member')
    }
    return member
  },

  async getTeamMemberForUser(memberId: number, user: AuthenticatedUser): Promise<TeamMember> {
    ensureCanView(user)
    return this.getTeamMemberOrThrow(memberId)
  },

  async create(user: AuthenticatedUser, payload: TeamMemberPayload): Promise<TeamMember> {
    ensureCanEdit(user)

    const [created] = db
      .insert(teamMembers)
      .values({
        name: payload.name.trim(),
        available: payload.available ?? true,
        emailAddress: emptyToNull(payload.emailAddress),
      })
      .returning()
      .all()
    return created
  },

  async update(user: AuthenticatedUser, memberId: number, payload: Partial<TeamMemberPayload>): Promise<TeamMember> {
    ensureCanEdit(user)

    const member = await this.getTeamMemberOrThrow(memberId)
    const [updated] = db
      .update(teamMembers)
      .set({
        name: payload.name?.trim() ?? member.name,
        available: payload.available ?? member.available,
        emailAddress: payload.emailAddress === undefined ? member.emailAddress : emptyToNull(payload.emailAddress),
      })
      .where(eq(teamMembers.id, member.id))
      .returning()
      .all()
    return updated
  },

  async remove(user: AuthenticatedUser, memberId: number): Promise<void> {
    ensureCanEdit(user)

    const member = await this.getTeamMemberOrThrow(memberId)
    db.delete(teamMembers).where(eq(teamMembers.id, member.id)).run()
  },
}
