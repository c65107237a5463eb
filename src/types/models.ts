export const COMPLETION_STATUSES = ['Completed', 'Partial'] as const
export type CompletionStatus = (typeof COMPLETION_STATUSES)[number]

export const LINE_TYPES = ['Transect', 'MouseLine'] as const
export type LineType = (typeof LINE_TYPES)[number]

export const STATION_TYPES = ['Novacoil', 'NovacoilBoxed', 'WoodenBox', 'WeirdBox', 'NA'] as const
export type StationType = (typeof STATION_TYPES)[number]

// Order matters: note classification takes the first label found in the text.
export const ISSUE_TYPES = [
  'Complicated',
  'MissingStation',
  'MissingHoop',
  'MissingLid',
  'MissingMesh',
  'Needs_New_ICC',
  'NeedsReplacing',
  'SlightlyRotten',
  'VeryRotten',
  'RustingHoop',
  'NeedsClearing',
  'NeedsRope',
  'NeedsFrequentAttn',
  'RopeOnDeadTree',
  'RequiresChainsaw',
  'Safety',
  'Flora',
  'Fauna',
  'Weed',
  'Note',
] as const
export type IssueType = (typeof ISSUE_TYPES)[number]

export const ISSUE_STATUSES = ['Fixed', 'NeedsWork', 'Progressing', 'NeedsRepeating', 'NoActionReq'] as const
export type IssueStatus = (typeof ISSUE_STATUSES)[number]

export const RESOLVED_ISSUE_STATUSES: readonly IssueStatus[] = ['Fixed', 'NoActionReq']

export const AUDIT_ACTIONS = ['Login', 'Logout', 'LoginFailed'] as const
export type AuditAction = (typeof AUDIT_ACTIONS)[number]

export const completionStatusLabels: Record<CompletionStatus, string> = {
  Completed: 'Completed',
  Partial: 'Partially Worked On',
}

export const lineTypeLabels: Record<LineType, string> = {
  Transect: 'Transect',
  MouseLine: 'Mouse-Line',
}

export const stationTypeLabels: Record<StationType, string> = {
  Novacoil: 'Novacoil',
  NovacoilBoxed: 'Novacoil-Boxed',
  WoodenBox: 'Wooden-Box',
  WeirdBox: 'Weird-Box',
  NA: 'N/A',
}

export const issueTypeLabels: Record<IssueType, string> = {
  Complicated: 'Complicated',
  MissingStation: 'Missing Station',
  MissingHoop: 'Missing Hoop',
  MissingLid: 'Missing Lid',
  MissingMesh: 'Missing Mesh',
  Needs_New_ICC: 'Needs new ICC',
  NeedsReplacing: 'Needs Replacing',
  SlightlyRotten: 'Slightly Rotten',
  VeryRotten: 'Very Rotten',
  RustingHoop: 'Rusting Hoop',
  NeedsClearing: 'Needs Clearing',
  NeedsRope: 'Needs Rope',
  NeedsFrequentAttn: 'Needs Frequent Attention',
  RopeOnDeadTree: 'Rope On Dead Tree',
  RequiresChainsaw: 'Requires Chainsaw',
  Safety: 'Safety',
  Flora: 'Flora',
  Fauna: 'Fauna',
  Weed: 'Weed',
  Note: 'Note',
}

export const issueStatusLabels: Record<IssueStatus, string> = {
  Fixed: 'Fixed',
  NeedsWork: 'Needs Work',
  Progressing: 'Progressing',
  NeedsRepeating: 'Needs Repeating',
  NoActionReq: 'No action req.',
}

export const auditActionLabels: Record<AuditAction, string> = {
  Login: 'Login',
  Logout: 'Logout',
  LoginFailed: 'Login Failed',
}

const includesValue = <T extends string>(values: readonly T[], value: string): value is T =>
  values.some((candidate) => candidate === value)

export const isCompletionStatus = (value: string): value is CompletionStatus =>
  includesValue(COMPLETION_STATUSES, value)

export const isLineType = (value: string): value is LineType => includesValue(LINE_TYPES, value)

export const isStationType = (value: string): value is StationType => includesValue(STATION_TYPES, value)

export const isIssueType = (value: string): value is IssueType => includesValue(ISSUE_TYPES, value)

export const isIssueStatus = (value: string): value is IssueStatus => includesValue(ISSUE_STATUSES, value)

export const isAuditAction = (value: string): value is AuditAction => includesValue(AUDIT_ACTIONS, value)
