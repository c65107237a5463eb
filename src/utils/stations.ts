const STATION_NUMBER = /^\d+$/

type StationRange = { startStationId: string; endStationId: string }

export const parseStationNumber = (value?: string | null): number | null => {
  if (!value) {
    return null
  }
  const trimmed = value.trim()
  return STATION_NUMBER.test(trimmed) ? Number.parseInt(trimmed, 10) : null
}

export const stationInRange = (station: number, range: StationRange): boolean => {
  const start = parseStationNumber(range.startStationId)
  const end = parseStationNumber(range.endStationId)
  if (start === null || end === null) {
    return false
  }
  return start <= station && station <= end
}

/**
 * True when the outing's sub-range lies inside the line's range. Ends that are blank
 * or not numeric, on either side, are not checked.
 */
export const subRangeWithinLine = (line: StationRange, start?: string | null, end?: string | null): boolean => {
  const startNumber = parseStationNumber(start)
  const endNumber = parseStationNumber(end)

  if (startNumber !== null && endNumber !== null && startNumber > endNumber) {
    return false
  }

  if (parseStationNumber(line.startStationId) === null || parseStationNumber(line.endStationId) === null) {
    return true
  }

  return [startNumber, endNumber].every((station) => station === null || stationInRange(station, line))
}
