import { isStateCode } from '../data/lookup-tables.data.js'
import { InvalidStateError } from '../errors/hmda.errors.js'
import type { Filter } from '../types/hmda.types.js'

function checkState(token: string, index?: number): string {
  const trimmed = typeof token === 'string' ? token.trim() : String(token)
  // A pre-joined "DC,MD,VA" never matches a two-letter code, so it is rejected here
  if (typeof token !== 'string' || !isStateCode(trimmed)) {
    throw new InvalidStateError(trimmed, index)
  }
  return trimmed
}

/**
 * Validates one state or territory abbreviation. Casing is ignored for the
 * lookup and kept in the output; surrounding whitespace is dropped.
 */
export function translateState(token: string): string {
  return checkState(token)
}

export function translateStates(tokens: readonly string[]): string {
  return tokens.map((token, index) => checkState(token, index)).join(',')
}

export function translateStateFilter(filter: Filter<string>): string {
  return filter.kind === 'single'
    ? translateState(filter.value)
    : translateStates(filter.values)
}
