import { describe, expect, it } from 'vitest'
import { isIsoDate, parseDateString } from '../src/utils/dates'
import { resolvePage } from '../src/utils/pagination'
import { parseStationNumber, stationInRange, subRangeWithinLine } from '../src/utils/stations'

const ridge = { startStationId: '1', endStationId: '20' }

describe('stations', () => {
  it('parses plain station numbers only', () => {
    expect(parseStationNumber(' 12 ')).toBe(12)
    expect(parseStationNumber('12a')).toBeNull()
    expect(parseStationNumber('')).toBeNull()
    expect(parseStationNumber(null)).toBeNull()
  })

  it('checks a station against a line range', () => {
    expect(stationInRange(1, ridge)).toBe(true)
    expect(stationInRange(20, ridge)).toBe(true)
    expect(stationInRange(21, ridge)).toBe(false)
    expect(stationInRange(3, { startStationId: 'A', endStationId: 'B' })).toBe(false)
  })

  it('checks an outing sub-range against its line', () => {
    expect(subRangeWithinLine(ridge, '5', '10')).toBe(true)
    expect(subRangeWithinLine(ridge, '5', null)).toBe(true)
    expect(subRangeWithinLine(ridge, '5', '25')).toBe(false)
    expect(subRangeWithinLine(ridge, '10', '5')).toBe(false)
    expect(subRangeWithinLine({ startStationId: 'A', endStationId: 'B' }, '1', '99')).toBe(true)
  })
})

describe('dates', () => {
  it('normalises field dates to YYYY-MM-DD', () => {
    expect(parseDateString('03/02/2024', 'dd/MM/yyyy')).toBe('2024-02-03')
    expect(parseDateString('2024-02-30', 'yyyy-MM-dd')).toBeNull()
    expect(parseDateString('', 'yyyy-MM-dd')).toBeNull()
    expect(isIsoDate('2024-02-29')).toBe(true)
    expect(isIsoDate('2023-02-29')).toBe(false)
  })
})

describe('resolvePage', () => {
  it('clamps limit and offset', () => {
    expect(resolvePage({})).toEqual({ limit: 50, offset: 0 })
    expect(resolvePage({ limit: 500, offset: -3 })).toEqual({ limit: 100, offset: 0 })
    expect(resolvePage({ limit: 0 })).toEqual({ limit: 1, offset: 0 })
  })
})
