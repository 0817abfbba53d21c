export { Action, ACTION_NAMES } from './enums/action.enum.js'
export type { ActionName } from './enums/action.enum.js'
export { Race, RACE_NAMES } from './enums/race.enum.js'
export type { RaceName } from './enums/race.enum.js'
export { RACE_LABELS, STATE_CODES } from './data/lookup-tables.data.js'
export {
  ApiRequestFailedError,
  InsufficientFilterError,
  InvalidEnumValueError,
  InvalidStateError,
} from './errors/hmda.errors.js'
export {
  translateAction,
  translateActionFilter,
  translateActions,
} from './helpers/translate-actions.helper.js'
export {
  translateRace,
  translateRaceFilter,
  translateRaces,
} from './helpers/translate-races.helper.js'
export {
  translateState,
  translateStateFilter,
  translateStates,
} from './helpers/translate-states.helper.js'
export {
  translateYear,
  translateYearFilter,
  translateYears,
} from './helpers/translate-years.helper.js'
export { buildQueryParameters } from './helpers/query-params.helper.js'
export {
  getAggregations,
  getInstitutions,
  getLoans,
  HmdaApiService,
} from './services/hmda-api.service.js'
export type { HmdaApiResult } from './services/hmda-api.service.js'
export { many, single } from './types/hmda.types.js'
export type {
  CellValue,
  Filter,
  FilterSet,
  QueryParameters,
  ResultTable,
  TableRecord,
} from './types/hmda.types.js'
