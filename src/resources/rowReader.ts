import { isIsoDate } from '../utils/dates'

const TRUE_VALUES = ['1', 'true', 'yes', 'y']
const FALSE_VALUES = ['0', 'false', 'no', 'n']

/**
 * Reads typed values out of one imported record, collecting a message per invalid
 * column instead of throwing so that a row reports all its problems at once.
 */
export class RowReader {
  readonly errors: string[] = []

  constructor(private readonly record: Record<string, string>) {}

  raw(column: string): string {
    return (this.record[column] ?? '').trim()
  }

  has(column: string): boolean {
    return column in this.record
  }

  text(column: string, options: { maxLength?: number } = {}): string | null {
    const value = this.raw(column)
    if (!value) {
      return null
    }
    if (options.maxLength !== undefined && value.length > options.maxLength) {
      this.errors.push(`${column}: at most ${options.maxLength} characters allowed`)
    }
    return value
  }

  requiredText(column: string, options: { maxLength?: number } = {}): string {
    const value = this.text(column, options)
    if (value === null) {
      this.errors.push(`${column}: this field is required`)
      return ''
    }
    return value
  }

  choice<T extends string>(column: string, guard: (value: string) => value is T, fallback?: T): T | null {
    const value = this.raw(column)
    if (!value) {
      if (fallback === undefined) {
        this.errors.push(`${column}: this field is required`)
        return null
      }
      return fallback
    }
    if (!guard(value)) {
      this.errors.push(`${column}: "${value}" is not a valid choice`)
      return null
    }
    return value
  }

  id(column: string): number | null {
    const value = this.raw(column)
    if (!value) {
      return null
    }
    const parsed = Number(value)
    if (!Number.isInteger(parsed) || parsed <= 0) {
      this.errors.push(`${column}: "${value}" is not a valid id`)
      return null
    }
    return parsed
  }

  idList(column: string): number[] {
    const value = this.raw(column)
    if (!value) {
      return []
    }
    const ids: number[] = []
    for (const part of value.split(',')) {
      const parsed = Number(part.trim())
      if (!Number.isInteger(parsed) || parsed <= 0) {
        this.errors.push(`${column}: "${part.trim()}" is not a valid id`)
        continue
      }
      ids.push(parsed)
    }
    return ids
  }

  decimal(column: string, options: { fallback?: number; min?: number } = {}): number {
    const value = this.raw(column)
    if (!value) {
      if (options.fallback === undefined) {
        this.errors.push(`${column}: this field is required`)
        return 0
      }
      return options.fallback
    }
    const parsed = Number(value)
    if (!Number.isFinite(parsed)) {
      this.errors.push(`${column}: "${value}" is not a number`)
      return 0
    }
    if (options.min !== undefined && parsed < options.min) {
      this.errors.push(`${column}: must be at least ${options.min}`)
    }
    return parsed
  }

  boolean(column: string, fallback: boolean): boolean {
    const value = this.raw(column).toLowerCase()
    if (!value) {
      return fallback
    }
    if (TRUE_VALUES.includes(value)) {
      return true
    }
    if (FALSE_VALUES.includes(value)) {
      return false
    }
    this.errors.push(`${column}: "${value}" is not a boolean`)
    return fallback
  }

  date(column: string): string {
    const value = this.raw(column)
    if (!isIsoDate(value)) {
      this.errors.push(`${column}: "${value}" is not a YYYY-MM-DD date`)
    }
    return value
  }
}
