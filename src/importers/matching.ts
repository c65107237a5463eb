import type { Line } from '../types/database'
import { ISSUE_TYPES, issueTypeLabels } from '../types/models'
import type { CompletionStatus, IssueType, StationType } from '../types/models'
import { stationInRange } from '../utils/stations'

const STATION_NAME = /^(.*?)([0-9]+)$/
const DIRECTION_SUFFIXES = ['', ' east', ' west']

export type StationMatch = {
  line: Line
  stationNumber: number
}

/**
 * Resolves field station names such as "Ridge12" to a line and station number.
 * Candidate line names are the prefix as written, lower-cased, and with " line"
 * appended, each tried plain and with an east/west suffix; the first existing line
 * whose range contains the station number wins.
 */
export class LineResolver {
  private readonly byName: Map<string, Line>

  constructor(lines: Line[]) {
    this.byName = new Map()
    for (const line of lines) {
      if (!this.byName.has(line.name)) {
        this.byName.set(line.name, line)
      }
    }
  }

  resolve(stationName: string): StationMatch | null {
    const match = STATION_NAME.exec(stationName)
    if (!match) {
      return null
    }

    const baseName = match[1].trim()
    const stationNumber = Number.parseInt(match[2], 10)

    for (const candidate of [baseName, baseName.toLowerCase(), `${baseName} line`]) {
      for (const suffix of DIRECTION_SUFFIXES) {
        const line = this.byName.get(`${candidate}${suffix}`)
        if (line && stationInRange(stationNumber, line)) {
          return { line, stationNumber }
        }
      }
    }

    return null
  }
}

const stationTypePatterns: Array<[StationType, RegExp]> = [
  ['NovacoilBoxed', /NC.+box|box.+NC|black tunnel/],
  ['Novacoil', /NC|staple|[nN]ovacoil/],
  ['WoodenBox', /box|screws/],
]

const issueTypePatterns: Array<[IssueType, RegExp]> = [
  ['RopeOnDeadTree', /rope.+(dead|rott|tree)/],
  ['NeedsRope', /rope/],
  ['MissingStation', /not found/],
  ['NeedsClearing', /clear|mark|treefall|tree fall/],
  ['VeryRotten', /rott/],
  ['RustingHoop', /rust/],
  ['MissingHoop', /hoop/],
  ['Needs_New_ICC', /IC|lid/],
]

export const matchStationType = (text: string): StationType =>
  stationTypePatterns.find(([, pattern]) => pattern.test(text))?.[0] ?? 'NA'

export const matchIssueType = (text: string): IssueType =>
  issueTypePatterns.find(([, pattern]) => pattern.test(text))?.[0] ?? 'Complicated'

/** First issue type whose display label appears in the note, ignoring case. */
export const classifyNote = (note: string): IssueType => {
  const lowered = note.toLowerCase()
  return ISSUE_TYPES.find((type) => lowered.includes(issueTypeLabels[type].toLowerCase())) ?? 'Complicated'
}

export const mapCompletionStatus = (text: string): CompletionStatus => {
  switch (text) {
    case 'Partial':
    case 'Tagged':
    case 'TaggedPart':
      return 'Partial'
    default:
      return 'Completed'
  }
}
