import type { Filter } from '../types/hmda.types.js'

// Year availability is enforced by the API, not here.
export function translateYear(year: number): string {
  if (typeof year !== 'number' || !Number.isInteger(year)) {
    throw new TypeError(`The input '${String(year)}' is not a valid year.`)
  }
  return String(year)
}

export function translateYears(years: readonly number[]): string {
  return years.map(translateYear).join(',')
}

export function translateYearFilter(filter: Filter<number>): string {
  return filter.kind === 'single'
    ? translateYear(filter.value)
    : translateYears(filter.values)
}
