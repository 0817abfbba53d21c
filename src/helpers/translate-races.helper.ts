import { RACE_LABELS } from '../data/lookup-tables.data.js'
import { Race } from '../enums/race.enum.js'
import { InvalidEnumValueError } from '../errors/hmda.errors.js'
import type { Filter } from '../types/hmda.types.js'

// The races parameter takes label text, not the numeric code
function raceLabel(race: Race, index?: number): string {
  const label = Race.isRace(race) ? RACE_LABELS[race.code] : undefined
  if (label === undefined) {
    throw new InvalidEnumValueError('Race', race, index)
  }
  return label
}

export function translateRace(race: Race): string {
  return raceLabel(race)
}

export function translateRaces(races: readonly Race[]): string {
  return races.map((race, index) => raceLabel(race, index)).join(',')
}

export function translateRaceFilter(filter: Filter<Race>): string {
  return filter.kind === 'single'
    ? translateRace(filter.value)
    : translateRaces(filter.values)
}
