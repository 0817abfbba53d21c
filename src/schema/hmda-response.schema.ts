import { z } from 'zod'

// Only the envelope is checked; records keep whatever fields the API sends
const RecordListSchema = z.array(z.record(z.string(), z.unknown()))

export const AggregationsResponseSchema = z.object({
  aggregations: RecordListSchema,
})

export const InstitutionsResponseSchema = z.object({
  institutions: RecordListSchema,
})
