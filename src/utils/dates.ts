import { format, isValid, parse } from 'date-fns'

export const ISO_DATE = 'yyyy-MM-dd'

/** Parses `value` with a date-fns pattern and returns it as `YYYY-MM-DD`, or null when it is not a real date. */
export const parseDateString = (value: string, pattern: string): string | null => {
  const trimmed = value.trim()
  if (!trimmed) {
    return null
  }
  const parsed = parse(trimmed, pattern, new Date(2000, 0, 1))
  return isValid(parsed) ? format(parsed, ISO_DATE) : null
}

export const isIsoDate = (value: string): boolean => parseDateString(value, ISO_DATE) === value
