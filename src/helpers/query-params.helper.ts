import { isPresent } from '../types/hmda.types.js'
import type { FilterSet, QueryParameters } from '../types/hmda.types.js'
import { translateActionFilter } from './translate-actions.helper.js'
import { translateRaceFilter } from './translate-races.helper.js'
import { translateStateFilter } from './translate-states.helper.js'
import { translateYearFilter } from './translate-years.helper.js'

export function buildQueryParameters(filters: FilterSet): QueryParameters {
  const params: QueryParameters = {}

  if (isPresent(filters.years)) {
    params.years = translateYearFilter(filters.years)
  }
  if (isPresent(filters.states)) {
    params.states = translateStateFilter(filters.states)
  }
  if (isPresent(filters.actions)) {
    params.actions_taken = translateActionFilter(filters.actions)
  }
  if (isPresent(filters.races)) {
    params.races = translateRaceFilter(filters.races)
  }

  return params
}
