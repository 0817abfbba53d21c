import type { CellValue, ResultTable, TableRecord } from '../types/hmda.types.js'

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value
  }
  return JSON.stringify(value)
}

/**
 * Builds a table from decoded JSON objects, one record per element. Columns are
 * the field names in order of first appearance; a field missing from an
 * element is null in that record.
 */
export function toResultTable(
  elements: readonly Record<string, unknown>[],
): ResultTable {
  const columns: string[] = []
  const seen = new Set<string>()

  for (const element of elements) {
    for (const key of Object.keys(element)) {
      if (!seen.has(key)) {
        seen.add(key)
        columns.push(key)
      }
    }
  }

  const records = elements.map((element) => {
    const record: TableRecord = {}
    for (const column of columns) {
      record[column] = toCell(element[column])
    }
    return record
  })

  return { columns, records }
}

export function formatResultTable(table: ResultTable): string {
  return table.records
    .map((record) =>
      table.columns.map((column) => `${column}: ${record[column]}`).join(', '),
    )
    .join('\n')
}
