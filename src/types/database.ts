import type { audits, issues, lines, outings, teamMembers, users } from '../db/schema'

export type Line = typeof lines.$inferSelect
export type NewLine = typeof lines.$inferInsert
export type TeamMember = typeof teamMembers.$inferSelect
export type NewTeamMember = typeof teamMembers.$inferInsert
export type Outing = typeof outings.$inferSelect
export type NewOuting = typeof outings.$inferInsert
export type Issue = typeof issues.$inferSelect
export type NewIssue = typeof issues.$inferInsert
export type Audit = typeof audits.$inferSelect
export type User = typeof users.$inferSelect

export type LineWithRelations = Line & {
  outings: Outing[]
  issues: Issue[]
}

export type OutingWithRelations = Outing & {
  line: Line
  participants: TeamMember[]
  issues: Issue[]
}

export type LineWithCounts = Line & {
  outingCount: number
  completedOutingCount: number
  issueCount: number
}
