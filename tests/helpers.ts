import db from '../src/lib/db'
import { audits, issues, lines, outingParticipants, outings, teamMembers, users } from '../src/db/schema'
import { insertIssue } from '../src/services/issueService'
import { insertOuting } from '../src/services/outingService'
import type { Issue, Line, NewIssue, NewLine, NewOuting, Outing, TeamMember } from '../src/types/database'
import type { AuthenticatedUser } from '../src/types/user'
import { issueToken } from '../src/utils/authentication'

export const adminUser: AuthenticatedUser = { id: 1, username: 'admin', roles: ['ADMIN'] }
export const editorUser: AuthenticatedUser = { id: 2, username: 'editor', roles: ['EDITOR'] }
export const viewerUser: AuthenticatedUser = { id: 3, username: 'viewer', roles: ['VIEWER'] }

export const resetDatabase = () => {
  db.delete(outingParticipants).run()
  db.delete(issues).run()
  db.delete(outings).run()
  db.delete(teamMembers).run()
  db.delete(lines).run()
  db.delete(audits).run()
  db.delete(users).run()
}

export const createLine = (values: Partial<NewLine> & { name: string }): Line => {
  const [line] = db
    .insert(lines)
    .values({ lineType: 'Transect', startStationId: '1', endStationId: '20', ...values })
    .returning()
    .all()
  return line
}

export const createOuting = (values: Partial<NewOuting> & { lineId: number; date: string }): Outing =>
  insertOuting(db, { hours: 2, ...values })

export const createIssue = (values: Partial<NewIssue> & { lineId: number }): Issue =>
  insertIssue(db, { startStationId: '1', issueType: 'Complicated', ...values })

export const createTeamMember = (name: string, available = true): TeamMember => {
  const [member] = db.insert(teamMembers).values({ name, available }).returning().all()
  return member
}

export const authHeaders = (user: AuthenticatedUser) => ({
  authorization: `Bearer ${issueToken(user).token}`,
})
