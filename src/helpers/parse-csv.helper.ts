import type { CellValue, ResultTable, TableRecord } from '../types/hmda.types.js'

const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

// Cells the loan files use for a missing value
const MISSING_MARKERS: ReadonlySet<string> = new Set(['', 'NA'])

/**
 * Splits a CSV document into rows of raw fields. Quoted fields may hold
 * commas, line breaks and escaped double quotes ("") per RFC 4180.
 */
export function parseCSVRows(text: string): string[][] {
  const rows: string[][] = []
  let row: string[] = []
  let current = ''
  let inQuotes = false

  for (let i = 0; i < text.length; i++) {
    const char = text[i]

    if (char === '"') {
      if (inQuotes && text[i + 1] === '"') {
        current += '"'
        i++
      } else {
        inQuotes = !inQuotes
      }
    } else if (char === ',' && !inQuotes) {
      row.push(current)
      current = ''
    } else if ((char === '\n' || char === '\r') && !inQuotes) {
      if (char === '\r' && text[i + 1] === '\n') i++
      row.push(current)
      rows.push(row)
      row = []
      current = ''
    } else {
      current += char
    }
  }

  if (current !== '' || row.length > 0) {
    row.push(current)
    rows.push(row)
  }

  // Blank lines carry no record
  return rows.filter((fields) => !(fields.length === 1 && fields[0] === ''))
}

function inferColumn(values: string[]): CellValue[] {
  const filled = values.filter((value) => !MISSING_MARKERS.has(value))
  const numeric =
    filled.length > 0 && filled.every((value) => NUMERIC_PATTERN.test(value))

  return values.map((value) => {
    if (MISSING_MARKERS.has(value)) return null
    return numeric ? Number(value) : value
  })
}

/**
 * Parses a CSV document whose first row names the columns. Each column's type
 * is inferred from its content: numbers when every filled cell is numeric,
 * strings otherwise. Empty and `NA` cells become null.
 */
export function parseCSVTable(text: string): ResultTable {
  const [header, ...body] = parseCSVRows(text)
  if (!header) {
    return { columns: [], records: [] }
  }

  const columns = header.map((name) => name.trim())
  const typedColumns = columns.map((_, col) =>
    inferColumn(body.map((fields) => fields[col] ?? '')),
  )

  const records = body.map((_, rowIndex) => {
    const record: TableRecord = {}
    columns.forEach((column, col) => {
      record[column] = typedColumns[col][rowIndex]
    })
    return record
  })

  return { columns, records }
}
