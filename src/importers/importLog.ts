import type { Logger } from 'pino'

export type ImportMessageLevel = 'info' | 'warn' | 'error'

export type ImportMessage = {
  row: number | null
  level: ImportMessageLevel
  message: string
}

/** Logs per-row importer outcomes and keeps the warnings and errors for the run summary. */
export class ImportLog {
  readonly problems: ImportMessage[] = []

  constructor(private readonly logger: Logger) {}

  info(row: number | null, message: string, context: Record<string, unknown> = {}): void {
    this.logger.info({ row, ...context }, message)
  }

  warn(row: number | null, message: string, context: Record<string, unknown> = {}): void {
    this.logger.warn({ row, ...context }, message)
    this.problems.push({ row, level: 'warn', message })
  }

  error(row: number | null, message: string, context: Record<string, unknown> = {}): void {
    this.logger.error({ row, ...context }, message)
    this.problems.push({ row, level: 'error', message })
  }
}
