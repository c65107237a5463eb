import { describe, expect, it } from 'vitest'
import { LineResolver, classifyNote, mapCompletionStatus, matchIssueType, matchStationType } from '../src/importers/matching'
import type { Line } from '../src/types/database'

const line = (id: number, name: string, startStationId: string, endStationId: string): Line => ({
  id,
  name,
  lineType: 'Transect',
  startStationId,
  endStationId,
})

describe('LineResolver', () => {
  const resolver = new LineResolver([
    line(1, 'Ridge', '1', '20'),
    line(2, 'ridge east', '21', '40'),
    line(3, 'Creek line', '1', '50'),
    line(4, 'Bay', 'A', 'B'),
  ])

  it('matches the prefix as written when the station is in range', () => {
    expect(resolver.resolve('Ridge12')).toEqual({ line: line(1, 'Ridge', '1', '20'), stationNumber: 12 })
  })

  it('falls through to the lower-cased name with a direction suffix', () => {
    expect(resolver.resolve('Ridge25')?.line.id).toBe(2)
    expect(resolver.resolve('Ridge25')?.stationNumber).toBe(25)
  })

  it('tries the name with " line" appended', () => {
    expect(resolver.resolve('Creek7')?.line.id).toBe(3)
  })

  it('ignores whitespace between the prefix and the number', () => {
    expect(resolver.resolve('Ridge 3')?.line.id).toBe(1)
  })

  it('returns null when no candidate line covers the station', () => {
    expect(resolver.resolve('Ridge99')).toBeNull()
    expect(resolver.resolve('Ridge')).toBeNull()
    expect(resolver.resolve('Bay3')).toBeNull()
    expect(resolver.resolve('Unknown4')).toBeNull()
  })
})

describe('matchStationType', () => {
  it('applies the patterns in order', () => {
    expect(matchStationType('NC inside box')).toBe('NovacoilBoxed')
    expect(matchStationType('moved to black tunnel')).toBe('NovacoilBoxed')
    expect(matchStationType('staple came out')).toBe('Novacoil')
    expect(matchStationType('novacoil loose')).toBe('Novacoil')
    expect(matchStationType('screws rusted')).toBe('WoodenBox')
    expect(matchStationType('hoop gone')).toBe('NA')
  })
})

describe('matchIssueType', () => {
  it('applies the patterns in order', () => {
    expect(matchIssueType('rope tied to dead tree')).toBe('RopeOnDeadTree')
    expect(matchIssueType('needs new rope')).toBe('NeedsRope')
    expect(matchIssueType('station not found')).toBe('MissingStation')
    expect(matchIssueType('treefall across track')).toBe('NeedsClearing')
    expect(matchIssueType('base rotten')).toBe('VeryRotten')
    expect(matchIssueType('rust on hoop')).toBe('RustingHoop')
    expect(matchIssueType('hoop missing')).toBe('MissingHoop')
    expect(matchIssueType('lid cracked')).toBe('Needs_New_ICC')
  })

  it('is case sensitive and defaults to Complicated', () => {
    expect(matchIssueType('Rope missing')).toBe('Complicated')
    expect(matchIssueType('')).toBe('Complicated')
  })
})

describe('classifyNote', () => {
  it('returns the first issue type whose label appears in the note', () => {
    expect(classifyNote('Needs clearing past station 5')).toBe('NeedsClearing')
    expect(classifyNote('MISSING LID at 4')).toBe('MissingLid')
  })

  it('prefers the earlier issue type when several labels appear', () => {
    expect(classifyNote('rope on dead tree, needs rope')).toBe('NeedsRope')
  })

  it('defaults to Complicated', () => {
    expect(classifyNote('all good')).toBe('Complicated')
  })
})

describe('mapCompletionStatus', () => {
  it('maps the field vocabulary', () => {
    expect(mapCompletionStatus('Completed')).toBe('Completed')
    expect(mapCompletionStatus('Partial')).toBe('Partial')
    expect(mapCompletionStatus('Tagged')).toBe('Partial')
    expect(mapCompletionStatus('TaggedPart')).toBe('Partial')
    expect(mapCompletionStatus('')).toBe('Completed')
    expect(mapCompletionStatus('whatever')).toBe('Completed')
  })
})
