import * as XLSX from 'xlsx'

export const DELIMITERS = {
  comma: ',',
  tab: '\t',
  pipe: '|',
} as const

export type DelimiterName = keyof typeof DELIMITERS
export type Delimiter = (typeof DELIMITERS)[DelimiterName]

export type Cell = string | number | null

const cellText = (value: unknown): string => (value === null || value === undefined ? '' : String(value))

// The `sep=` preamble pins the separator; without it SheetJS guesses from the content.
const readSheet = (text: string, delimiter: Delimiter): XLSX.WorkSheet => {
  const workbook = XLSX.read(`sep=${delimiter}\n${text}`, { type: 'string', raw: true })
  return workbook.Sheets[workbook.SheetNames[0]]
}

/** Splits delimited text into rows of trimmed-at-the-end cells; every value stays a string. */
export const parseDelimitedRows = (text: string, delimiter: Delimiter): string[][] => {
  if (!text.trim()) {
    return []
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(readSheet(text, delimiter), {
    header: 1,
    defval: '',
    raw: true,
    blankrows: true,
  })

  return rows.map((row) => {
    const cells = row.map(cellText)
    while (cells.length > 0 && cells[cells.length - 1] === '') {
      cells.pop()
    }
    return cells
  })
}

/** Parses delimited text whose first row holds the column names. */
export const parseDelimitedRecords = (text: string, delimiter: Delimiter): Array<Record<string, string>> => {
  if (!text.trim()) {
    return []
  }

  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(readSheet(text, delimiter), {
    defval: '',
    raw: true,
  })

  return records.map((record) =>
    Object.fromEntries(Object.entries(record).map(([key, value]) => [key.trim(), cellText(value)])),
  )
}

export const toDelimitedText = (header: string[], rows: Cell[][], delimiter: Delimiter = ','): string => {
  const sheet = XLSX.utils.aoa_to_sheet([header, ...rows.map((row) => row.map((cell) => cell ?? ''))])
  return XLSX.utils.sheet_to_csv(sheet, { FS: delimiter, RS: '\n', blankrows: true })
}
