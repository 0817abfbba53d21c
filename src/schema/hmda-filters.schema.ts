import { z } from 'zod'

import { ACTION_NAMES } from '../enums/action.enum.js'
import { RACE_NAMES } from '../enums/race.enum.js'

//Properties
export const filterProperties = {
  years: {
    oneOf: [
      { type: 'integer' },
      { type: 'array', items: { type: 'integer' }, minItems: 1 },
    ],
    description:
      'A single year or a list of years. The API serves one year per request, so pass one year unless it says otherwise.',
    examples: [2020, [2019]],
  },
  states: {
    oneOf: [
      { type: 'string' },
      { type: 'array', items: { type: 'string' }, minItems: 1 },
    ],
    description:
      'A two-letter state or territory abbreviation, or a list of them. Do not pass several states joined in one string; use a list.',
    examples: ['DC', ['DC', 'MD', 'VA']],
  },
  actions: {
    oneOf: [
      { type: 'string', enum: [...ACTION_NAMES] },
      { type: 'array', items: { type: 'string', enum: [...ACTION_NAMES] } },
    ],
    description: 'Action(s) taken on the application.',
    examples: ['ORIGINATED', ['INCOMPLETE', 'PREAPPROVED']],
  },
  races: {
    oneOf: [
      { type: 'string', enum: [...RACE_NAMES] },
      { type: 'array', items: { type: 'string', enum: [...RACE_NAMES] } },
    ],
    description: 'Derived race(s) of the applicants.',
    examples: ['UNAVAILABLE', ['BLACK', 'WHITE']],
  },
}

export const FilterInputSchema = {
  type: 'object' as const,
  properties: filterProperties,
  required: ['years', 'states'],
}

//Fields
const actionName = z.enum(ACTION_NAMES)
const raceName = z.enum(RACE_NAMES)

export const filterFields = {
  years: z.union([z.number().int(), z.array(z.number().int()).min(1)]),
  states: z.union([z.string(), z.array(z.string()).min(1)]),
  actions: z.union([actionName, z.array(actionName)]).optional(),
  races: z.union([raceName, z.array(raceName)]).optional(),
}

export const FilterArgsSchema = z.object(filterFields)

export type FilterArgs = z.infer<typeof FilterArgsSchema>
