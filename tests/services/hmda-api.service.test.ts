const { mockFetch } = vi.hoisted(() => ({ mockFetch: vi.fn() }))

vi.mock('node-fetch', () => ({
  default: mockFetch,
}))

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { ZodError } from 'zod'

import { Action } from '../../src/enums/action.enum.js'
import { Race } from '../../src/enums/race.enum.js'
import {
  ApiRequestFailedError,
  InsufficientFilterError,
  InvalidEnumValueError,
  InvalidStateError,
} from '../../src/errors/hmda.errors.js'
import {
  getAggregations,
  getInstitutions,
  getLoans,
  HmdaApiService,
} from '../../src/services/hmda-api.service.js'
import { many, single } from '../../src/types/hmda.types.js'
import {
  createMockFetchError,
  createMockResponse,
  createMockTextResponse,
  sampleApiError,
} from '../helpers/test-utils.js'
import {
  sampleAggregationsResponse,
  sampleInstitutionsResponse,
  sampleLoansCsv,
  TEST_BASE_URL,
} from '../helpers/test-data.js'

describe('HmdaApiService', () => {
  let service: HmdaApiService

  beforeEach(() => {
    service = new HmdaApiService(TEST_BASE_URL)
    mockFetch.mockReset()
  })

  afterEach(() => {
    vi.clearAllMocks()
  })

  describe('buildUrl', () => {
    it('encodes the query parameters of the resource', () => {
      const url = service.buildUrl('aggregations', {
        years: single(2020),
        states: many(['DC', 'md']),
        actions: single(Action.DENIED),
        races: single(Race.BLACK),
      })

      expect(url).toBe(
        'https://hmda.test/view/aggregations?years=2020&states=DC%2Cmd&actions_taken=3&races=Black+or+African+American',
      )
    })

    it('drops a trailing slash from the base URL', () => {
      const trailing = new HmdaApiService(`${TEST_BASE_URL}/`)
      expect(
        trailing.buildUrl('filers', { years: single(2018), states: single('DC') }),
      ).toBe('https://hmda.test/view/filers?years=2018&states=DC')
    })
  })

  describe('getAggregations', () => {
    it('returns one record per aggregation', async () => {
      mockFetch.mockReturnValue(createMockResponse(sampleAggregationsResponse))

      const table = await service.getAggregations({
        years: single(2020),
        states: single('DC'),
        races: single(Race.UNAVAILABLE),
      })

      expect(mockFetch).toHaveBeenCalledTimes(1)
      expect(mockFetch).toHaveBeenCalledWith(
        'https://hmda.test/view/aggregations?years=2020&states=DC&races=Race+Not+Available',
      )
      expect(table.records).toHaveLength(2)
      expect(table.columns).toEqual(['count', 'sum', 'races', 'actions_taken'])
      expect(table.records[1]).toEqual({
        count: 35,
        sum: 20515000,
        races: 'Race Not Available',
        actions_taken: '3',
      })
    })

    it('requires actions or races before any request', async () => {
      await expect(
        service.getAggregations({ years: single(2018), states: single('dc') }),
      ).rejects.toBeInstanceOf(InsufficientFilterError)
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('treats empty categorical lists as missing', async () => {
      await expect(
        service.getAggregations({
          years: single(2018),
          states: single('dc'),
          actions: many([]),
          races: many([]),
        }),
      ).rejects.toBeInstanceOf(InsufficientFilterError)
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('checks the filter requirement before validating states', async () => {
      await expect(
        service.getAggregations({ years: single(2018), states: single('XY') }),
      ).rejects.toBeInstanceOf(InsufficientFilterError)
    })

    it('fails on a non-success status with the body verbatim', async () => {
      mockFetch.mockReturnValue(
        createMockTextResponse(sampleApiError, 400, 'application/json'),
      )

      const request = service.getAggregations({
        years: single(2020),
        states: single('DC'),
        actions: single(Action.ORIGINATED),
      })

      await expect(request).rejects.toBeInstanceOf(ApiRequestFailedError)
      await expect(request).rejects.toMatchObject({
        status: 400,
        body: sampleApiError,
        message: sampleApiError,
      })
    })

    it('propagates a payload without an aggregations array', async () => {
      mockFetch.mockReturnValue(createMockResponse({ institutions: [] }))

      await expect(
        service.getAggregations({
          years: single(2020),
          states: single('DC'),
          actions: single(Action.ORIGINATED),
        }),
      ).rejects.toBeInstanceOf(ZodError)
    })
  })

  describe('getInstitutions', () => {
    it('needs no categorical filter', async () => {
      mockFetch.mockReturnValue(createMockResponse(sampleInstitutionsResponse))

      const table = await service.getInstitutions({
        years: single(2018),
        states: many(['DC', 'Md', 'va']),
      })

      expect(mockFetch).toHaveBeenCalledWith(
        'https://hmda.test/view/filers?years=2018&states=DC%2CMd%2Cva',
      )
      expect(table.columns).toEqual(['lei', 'name', 'period'])
      expect(table.records).toHaveLength(3)
      expect(table.records[0]).toEqual({
        lei: 'TESTLEI0000000000001',
        name: 'Test Savings Bank',
        period: 2018,
      })
    })

    it('validates states before any request', async () => {
      await expect(
        service.getInstitutions({
          years: single(2020),
          states: single('DC,MD,VA'),
        }),
      ).rejects.toBeInstanceOf(InvalidStateError)
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('validates enum members before any request', async () => {
      const bogus: unknown[] = [Race.WHITE, 7]

      await expect(
        service.getInstitutions({
          years: single(2020),
          states: single('DC'),
          races: many(bogus as Race[]),
        }),
      ).rejects.toBeInstanceOf(InvalidEnumValueError)
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('propagates transport failures unchanged', async () => {
      mockFetch.mockReturnValue(createMockFetchError('socket hang up'))

      await expect(
        service.getInstitutions({ years: single(2020), states: single('DC') }),
      ).rejects.toThrow('socket hang up')
    })
  })

  describe('getLoans', () => {
    it('parses the CSV body into records', async () => {
      mockFetch.mockReturnValue(createMockTextResponse(sampleLoansCsv))

      const table = await service.getLoans({
        years: single(2019),
        states: single('dc'),
        actions: many([Action.INCOMPLETE, Action.PREAPPROVED]),
        races: many([Race.BLACK, Race.WHITE]),
      })

      expect(mockFetch).toHaveBeenCalledWith(
        'https://hmda.test/view/csv?years=2019&states=dc&actions_taken=5%2C8&races=Black+or+African+American%2CWhite',
      )
      expect(table.records).toHaveLength(2)
      expect(table.records[1].derived_race).toBe('White')
      expect(table.records[1].action_taken).toBe(8)
    })

    it('requires actions or races before any request', async () => {
      await expect(
        service.getLoans({ years: single(2018), states: single('dc') }),
      ).rejects.toBeInstanceOf(InsufficientFilterError)
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('fails on a non-success status', async () => {
      mockFetch.mockReturnValue(createMockTextResponse('Not Found', 404, 'text/plain'))

      await expect(
        service.getLoans({
          years: single(2019),
          states: single('DC'),
          actions: single(Action.DENIED),
        }),
      ).rejects.toThrow('Not Found')
    })
  })

  describe('fetch results', () => {
    it('return the request URL with the table', async () => {
      mockFetch.mockReturnValue(createMockResponse(sampleInstitutionsResponse))

      const result = await service.fetchInstitutions({
        years: single(2018),
        states: single('DC'),
      })

      expect(result.url).toBe('https://hmda.test/view/filers?years=2018&states=DC')
      expect(result.table.records).toHaveLength(3)
    })
  })
})

describe('endpoint functions', () => {
  beforeEach(() => {
    delete process.env.HMDA_API_BASE_URL
    mockFetch.mockReset()
  })

  it('getAggregations targets the public aggregations resource', async () => {
    mockFetch.mockReturnValue(createMockResponse(sampleAggregationsResponse))

    const table = await getAggregations(
      single(2020),
      single('DC'),
      undefined,
      single(Race.UNAVAILABLE),
    )

    expect(mockFetch).toHaveBeenCalledWith(
      'https://ffiec.cfpb.gov/v2/data-browser-api/view/aggregations?years=2020&states=DC&races=Race+Not+Available',
    )
    expect(table.records).toHaveLength(2)
  })

  it('getInstitutions targets the filers resource', async () => {
    mockFetch.mockReturnValue(createMockResponse(sampleInstitutionsResponse))

    const table = await getInstitutions(single(2018), many(['DC', 'Md', 'va']))

    expect(mockFetch).toHaveBeenCalledWith(
      'https://ffiec.cfpb.gov/v2/data-browser-api/view/filers?years=2018&states=DC%2CMd%2Cva',
    )
    expect(table.records).toHaveLength(3)
  })

  it('getLoans targets the csv resource', async () => {
    mockFetch.mockReturnValue(createMockTextResponse(sampleLoansCsv))

    const table = await getLoans(single(2019), single('dc'), single(Action.INCOMPLETE))

    expect(mockFetch).toHaveBeenCalledWith(
      'https://ffiec.cfpb.gov/v2/data-browser-api/view/csv?years=2019&states=dc&actions_taken=5',
    )
    expect(table.records).toHaveLength(2)
  })

  it('getLoans rejects without a categorical filter', async () => {
    await expect(getLoans(single(2018), single('dc'))).rejects.toBeInstanceOf(
      InsufficientFilterError,
    )
    expect(mockFetch).not.toHaveBeenCalled()
  })
})
