import type { Action } from '../enums/action.enum.js'
import type { Race } from '../enums/race.enum.js'

export type Filter<T> =
  | { kind: 'single'; value: T }
  | { kind: 'many'; values: readonly T[] }

export function single<T>(value: T): Filter<T> {
  return { kind: 'single', value }
}

export function many<T>(values: readonly T[]): Filter<T> {
  return { kind: 'many', values }
}

export function isPresent<T>(filter: Filter<T> | undefined): filter is Filter<T> {
  if (!filter) return false
  return filter.kind === 'single' || filter.values.length > 0
}

export interface FilterSet {
  years: Filter<number>
  states: Filter<string>
  actions?: Filter<Action>
  races?: Filter<Race>
}

export type QueryParameterName = 'years' | 'states' | 'actions_taken' | 'races'

export type QueryParameters = Partial<Record<QueryParameterName, string>>

export type HmdaResource = 'aggregations' | 'filers' | 'csv'

export type CellValue = string | number | boolean | null

export type TableRecord = Record<string, CellValue>

export interface ResultTable {
  columns: string[]
  records: TableRecord[]
}
