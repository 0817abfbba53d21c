import { Action } from '../enums/action.enum.js'
import { InvalidEnumValueError } from '../errors/hmda.errors.js'
import type { Filter } from '../types/hmda.types.js'

function actionCode(action: Action, index?: number): string {
  if (!Action.isAction(action)) {
    throw new InvalidEnumValueError('Action', action, index)
  }
  return String(action.code)
}

export function translateAction(action: Action): string {
  return actionCode(action)
}

// Order and duplicates are kept as given
export function translateActions(actions: readonly Action[]): string {
  return actions.map((action, index) => actionCode(action, index)).join(',')
}

export function translateActionFilter(filter: Filter<Action>): string {
  return filter.kind === 'single'
    ? translateAction(filter.value)
    : translateActions(filter.values)
}
