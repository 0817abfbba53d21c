import type { Tool } from '@modelcontextprotocol/sdk/types.js'

import { BaseTool } from './base.tool.js'
import { Action } from '../enums/action.enum.js'
import { Race } from '../enums/race.enum.js'
import { buildCitation } from '../helpers/citation.js'
import { formatResultTable } from '../helpers/result-table.helper.js'
import { FilterInputSchema } from '../schema/hmda-filters.schema.js'
import type { FilterArgs } from '../schema/hmda-filters.schema.js'
import { HmdaApiService } from '../services/hmda-api.service.js'
import type { HmdaApiResult } from '../services/hmda-api.service.js'
import type { ToolContent } from '../types/base.types.js'
import { many, single } from '../types/hmda.types.js'
import type { Filter, FilterSet } from '../types/hmda.types.js'

// JSON arguments arrive as a value or a list; the library takes the variant
function toFilter<T, U>(
  value: T | T[],
  convert: (item: T) => U,
): Filter<U> {
  return Array.isArray(value)
    ? many(value.map(convert))
    : single(convert(value))
}

export function toFilterSet(args: FilterArgs): FilterSet {
  return {
    years: toFilter(args.years, (year) => year),
    states: toFilter(args.states, (state) => state),
    actions:
      args.actions === undefined
        ? undefined
        : toFilter(args.actions, Action.fromName),
    races:
      args.races === undefined ? undefined : toFilter(args.races, Race.fromName),
  }
}

/**
 * Shared shape of the HMDA tools: translate the arguments into a filter set,
 * run one request and render the returned table as text.
 */
export abstract class HmdaFilterTool extends BaseTool<FilterArgs> {
  abstract readonly resourceLabel: string
  inputSchema: Tool['inputSchema'] = FilterInputSchema

  protected service: HmdaApiService

  constructor(service?: HmdaApiService) {
    super()
    this.handler = this.handler.bind(this)
    this.service = service ?? new HmdaApiService()
  }

  protected abstract fetchTable(filters: FilterSet): Promise<HmdaApiResult>

  validateArgs(input: unknown) {
    return this.argsSchema.safeParse(input)
  }

  protected async toolHandler(
    args: FilterArgs,
  ): Promise<{ content: ToolContent[] }> {
    const { url, table } = await this.fetchTable(toFilterSet(args))

    if (table.records.length === 0) {
      return this.createSuccessResponse(
        `No ${this.resourceLabel} found.\n${buildCitation(url)}`,
      )
    }

    return this.createSuccessResponse(
      `Response from ${this.resourceLabel}:\n${formatResultTable(table)}\n${buildCitation(url)}`,
    )
  }
}
