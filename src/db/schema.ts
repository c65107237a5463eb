import { integer, primaryKey, real, sqliteTable, text } from 'drizzle-orm/sqlite-core'
import {
  AUDIT_ACTIONS,
  COMPLETION_STATUSES,
  ISSUE_STATUSES,
  ISSUE_TYPES,
  LINE_TYPES,
  STATION_TYPES,
} from '../types/models'
import type { UserRole } from '../types/user'

export const lines = sqliteTable('lines', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  lineType: text('line_type', { enum: LINE_TYPES }).notNull(),
  startStationId: text('start_station_id').notNull(),
  endStationId: text('end_station_id').notNull(),
})

export const teamMembers = sqliteTable('team_members', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  available: integer('available', { mode: 'boolean' }).notNull().default(true),
  emailAddress: text('email_address'),
})

export const outings = sqliteTable('outings', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  date: text('date').notNull(),
  hours: real('hours').notNull(),
  numberOfWorkers: real('number_of_workers').notNull().default(1),
  lineId: integer('line_id')
    .notNull()
    .references(() => lines.id, { onDelete: 'cascade' }),
  completionStatus: text('completion_status', { enum: COMPLETION_STATUSES }).notNull().default('Completed'),
  startStationId: text('start_station_id'),
  endStationId: text('end_station_id'),
})

export const outingParticipants = sqliteTable(
  'outing_participants',
  {
    outingId: integer('outing_id')
      .notNull()
      .references(() => outings.id, { onDelete: 'cascade' }),
    teamMemberId: integer('team_member_id')
      .notNull()
      .references(() => teamMembers.id, { onDelete: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.outingId, table.teamMemberId] }),
  }),
)

export const issues = sqliteTable('issues', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  issueStatus: text('issue_status', { enum: ISSUE_STATUSES }).notNull().default('NeedsWork'),
  lineId: integer('line_id')
    .notNull()
    .references(() => lines.id, { onDelete: 'cascade' }),
  startStationId: text('start_station_id').notNull(),
  endStationId: text('end_station_id'),
  stationType: text('station_type', { enum: STATION_TYPES }).notNull().default('NA'),
  issueType: text('issue_type', { enum: ISSUE_TYPES }).notNull(),
  origin: text('origin'),
  reportedBy: text('reported_by'),
  description: text('description'),
  photo: text('photo'),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  outingId: integer('outing_id').references(() => outings.id, { onDelete: 'cascade' }),
})

export const audits = sqliteTable('audits', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  action: text('action', { enum: AUDIT_ACTIONS }).notNull(),
  ip: text('ip'),
  username: text('username'),
  when: integer('logged_at', { mode: 'timestamp_ms' }).notNull(),
})

export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  username: text('username').notNull().unique(),
  passwordHash: text('password_hash').notNull(),
  roles: text('roles', { mode: 'json' }).$type<UserRole[]>().notNull(),
  active: integer('active', { mode: 'boolean' }).notNull().default(true),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
})
