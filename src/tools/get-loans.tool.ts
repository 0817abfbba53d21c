import { HmdaFilterTool } from './hmda-filter.tool.js'
import { FilterArgsSchema } from '../schema/hmda-filters.schema.js'
import { validateCategoricalArgs } from '../schema/validators.js'
import type { HmdaApiResult } from '../services/hmda-api.service.js'
import type { FilterSet } from '../types/hmda.types.js'

export const toolDescription = `
  Fetches individual HMDA loan application records for the given years and states. Requires at least one of actions or races to narrow the result. Results can be large; prefer get-aggregations for totals.
`

export class GetLoansTool extends HmdaFilterTool {
  name = 'get-loans'
  description = toolDescription
  readonly resourceLabel = 'loans'

  get argsSchema() {
    return FilterArgsSchema.superRefine((args, ctx) => {
      validateCategoricalArgs(args, ctx)
    })
  }

  protected fetchTable(filters: FilterSet): Promise<HmdaApiResult> {
    return this.service.fetchLoans(filters)
  }
}
