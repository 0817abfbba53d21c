import { HmdaFilterTool } from './hmda-filter.tool.js'
import { FilterArgsSchema } from '../schema/hmda-filters.schema.js'
import type { HmdaApiResult } from '../services/hmda-api.service.js'
import type { FilterSet } from '../types/hmda.types.js'

export const toolDescription = `
  Lists the financial institutions that filed HMDA data for the given years and states, optionally narrowed by action taken and applicant race. Returns each institution's LEI, name and filing period.
`

export class GetInstitutionsTool extends HmdaFilterTool {
  name = 'get-institutions'
  description = toolDescription
  readonly resourceLabel = 'institutions'

  get argsSchema() {
    return FilterArgsSchema
  }

  protected fetchTable(filters: FilterSet): Promise<HmdaApiResult> {
    return this.service.fetchInstitutions(filters)
  }
}
