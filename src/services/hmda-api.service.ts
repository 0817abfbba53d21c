import fetch from 'node-fetch'

import type { Action } from '../enums/action.enum.js'
import type { Race } from '../enums/race.enum.js'
import {
  ApiRequestFailedError,
  InsufficientFilterError,
} from '../errors/hmda.errors.js'
import { getApiConfig } from '../helpers/config.helper.js'
import { parseCSVTable } from '../helpers/parse-csv.helper.js'
import { buildQueryParameters } from '../helpers/query-params.helper.js'
import { toResultTable } from '../helpers/result-table.helper.js'
import {
  AggregationsResponseSchema,
  InstitutionsResponseSchema,
} from '../schema/hmda-response.schema.js'
import { isPresent } from '../types/hmda.types.js'
import type {
  Filter,
  FilterSet,
  HmdaResource,
  ResultTable,
} from '../types/hmda.types.js'

export interface HmdaApiResult {
  url: string
  table: ResultTable
}

/**
 * Client for the HMDA Data Browser API. Each method validates its filters,
 * issues a single GET and decodes the body into a table. Nothing is retried
 * or cached.
 */
export class HmdaApiService {
  private readonly baseUrl: string

  constructor(baseUrl?: string) {
    this.baseUrl = (baseUrl ?? getApiConfig().baseUrl).replace(/\/+$/, '')
  }

  buildUrl(resource: HmdaResource, filters: FilterSet): string {
    const query = new URLSearchParams()
    for (const [name, value] of Object.entries(buildQueryParameters(filters))) {
      query.append(name, value)
    }
    return `${this.baseUrl}/${resource}?${query.toString()}`
  }

  /** Loan counts and sums, narrowed by at least one of actions or races. */
  async fetchAggregations(filters: FilterSet): Promise<HmdaApiResult> {
    requireCategoricalFilter('aggregations', filters)
    const url = this.buildUrl('aggregations', filters)
    const res = await this.request(url)

    const { aggregations } = AggregationsResponseSchema.parse(await res.json())
    return { url, table: toResultTable(aggregations) }
  }

  /** Institutions that filed records matching the filters. */
  async fetchInstitutions(filters: FilterSet): Promise<HmdaApiResult> {
    const url = this.buildUrl('filers', filters)
    const res = await this.request(url)

    const { institutions } = InstitutionsResponseSchema.parse(await res.json())
    return { url, table: toResultTable(institutions) }
  }

  /** Individual loan records, served as a CSV document. */
  async fetchLoans(filters: FilterSet): Promise<HmdaApiResult> {
    requireCategoricalFilter('loans', filters)
    const url = this.buildUrl('csv', filters)
    // The csv resource redirects to the file; node-fetch follows it
    const res = await this.request(url)

    return { url, table: parseCSVTable(await res.text()) }
  }

  async getAggregations(filters: FilterSet): Promise<ResultTable> {
    return (await this.fetchAggregations(filters)).table
  }

  async getInstitutions(filters: FilterSet): Promise<ResultTable> {
    return (await this.fetchInstitutions(filters)).table
  }

  async getLoans(filters: FilterSet): Promise<ResultTable> {
    return (await this.fetchLoans(filters)).table
  }

  private async request(url: string) {
    console.log(`URL Attempted: ${url}`)
    const res = await fetch(url)

    if (!res.ok) {
      throw new ApiRequestFailedError(res.status, await res.text())
    }
    return res
  }
}

function requireCategoricalFilter(resource: string, filters: FilterSet) {
  if (!isPresent(filters.actions) && !isPresent(filters.races)) {
    throw new InsufficientFilterError(resource)
  }
}

let defaultService: HmdaApiService | undefined

function getDefaultService(): HmdaApiService {
  if (!defaultService) {
    defaultService = new HmdaApiService()
  }
  return defaultService
}

export function getAggregations(
  years: Filter<number>,
  states: Filter<string>,
  actions?: Filter<Action>,
  races?: Filter<Race>,
): Promise<ResultTable> {
  return getDefaultService().getAggregations({ years, states, actions, races })
}

export function getInstitutions(
  years: Filter<number>,
  states: Filter<string>,
  actions?: Filter<Action>,
  races?: Filter<Race>,
): Promise<ResultTable> {
  return getDefaultService().getInstitutions({ years, states, actions, races })
}

export function getLoans(
  years: Filter<number>,
  states: Filter<string>,
  actions?: Filter<Action>,
  races?: Filter<Race>,
): Promise<ResultTable> {
  return getDefaultService().getLoans({ years, states, actions, races })
}
