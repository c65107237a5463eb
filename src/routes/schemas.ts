import { Type } from '@sinclair/typebox'
import type { TSchema } from '@sinclair/typebox'
import {
  AUDIT_ACTIONS,
  COMPLETION_STATUSES,
  ISSUE_STATUSES,
  ISSUE_TYPES,
  LINE_TYPES,
  STATION_TYPES,
} from '../types/models'
import type { AuditAction, CompletionStatus, IssueStatus, IssueType, LineType, StationType } from '../types/models'

const stringEnum = <T extends string>(values: readonly T[]) => Type.Unsafe<T>({ type: 'string', enum: [...values] })

const nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()])

export const LineTypeSchema = stringEnum<LineType>(LINE_TYPES)
export const CompletionStatusSchema = stringEnum<CompletionStatus>(COMPLETION_STATUSES)
export const StationTypeSchema = stringEnum<StationType>(STATION_TYPES)
export const IssueTypeSchema = stringEnum<IssueType>(ISSUE_TYPES)
export const IssueStatusSchema = stringEnum<IssueStatus>(ISSUE_STATUSES)
export const AuditActionSchema = stringEnum<AuditAction>(AUDIT_ACTIONS)

export const IsoDate = Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' })
const StationId = Type.String({ maxLength: 5 })

export const IdParams = Type.Object({
  id: Type.Integer({ minimum: 1 }),
})

export const PageQuerystring = {
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 100 })),
  offset: Type.Optional(Type.Integer({ minimum: 0 })),
}

export const LineBody = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 100 }),
  lineType: LineTypeSchema,
  startStationId: Type.String({ minLength: 1, maxLength: 5 }),
  endStationId: Type.String({ minLength: 1, maxLength: 5 }),
})

export const TeamMemberBody = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 15 }),
  available: Type.Optional(Type.Boolean()),
  emailAddress: Type.Optional(nullable(Type.String({ maxLength: 254 }))),
})

export const OutingBody = Type.Object({
  date: IsoDate,
  lineId: Type.Integer({ minimum: 1 }),
  hours: Type.Number({ minimum: 0, maximum: 9999.99 }),
  numberOfWorkers: Type.Optional(Type.Number({ minimum: 0, maximum: 999.9 })),
  completionStatus: Type.Optional(CompletionStatusSchema),
  startStationId: Type.Optional(nullable(StationId)),
  endStationId: Type.Optional(nullable(StationId)),
  participantIds: Type.Optional(Type.Array(Type.Integer({ minimum: 1 }))),
})

const issueFields = {
  outingId: Type.Optional(nullable(Type.Integer({ minimum: 1 }))),
  issueStatus: Type.Optional(IssueStatusSchema),
  startStationId: Type.String({ minLength: 1, maxLength: 5 }),
  endStationId: Type.Optional(nullable(StationId)),
  stationType: Type.Optional(StationTypeSchema),
  issueType: IssueTypeSchema,
  origin: Type.Optional(nullable(Type.String({ maxLength: 15 }))),
  reportedBy: Type.Optional(nullable(Type.String({ maxLength: 10 }))),
  description: Type.Optional(nullable(Type.String())),
  photo: Type.Optional(nullable(Type.String())),
}

export const IssueBody = Type.Object({
  lineId: Type.Optional(Type.Integer({ minimum: 1 })),
  ...issueFields,
})

// Issues created under a line or outing take the parent from the URL.
export const InlineIssueBody = Type.Object(issueFields)

export const OutingIssueBody = Type.Omit(InlineIssueBody, ['outingId'])
