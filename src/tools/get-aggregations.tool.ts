import { HmdaFilterTool } from './hmda-filter.tool.js'
import { FilterArgsSchema } from '../schema/hmda-filters.schema.js'
import { validateCategoricalArgs } from '../schema/validators.js'
import type { HmdaApiResult } from '../services/hmda-api.service.js'
import type { FilterSet } from '../types/hmda.types.js'

export const toolDescription = `
  Fetches aggregated HMDA mortgage statistics (loan counts and total loan amounts) for one or more years and states, broken down by action taken and/or applicant race. Use this tool when users ask how many loans were originated, denied or otherwise acted on, or the total dollar volume, for a state or set of states. Requires years, states, and at least one of actions or races.
`

export class GetAggregationsTool extends HmdaFilterTool {
  name = 'get-aggregations'
  description = toolDescription
  readonly resourceLabel = 'aggregations'

  get argsSchema() {
    return FilterArgsSchema.superRefine((args, ctx) => {
      validateCategoricalArgs(args, ctx)
    })
  }

  protected fetchTable(filters: FilterSet): Promise<HmdaApiResult> {
    return this.service.fetchAggregations(filters)
  }
}
