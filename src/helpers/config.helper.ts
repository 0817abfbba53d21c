import { z } from 'zod'

export const DEFAULT_HMDA_API_BASE_URL =
  'https://ffiec.cfpb.gov/v2/data-browser-api/view'

const ApiConfigSchema = z.object({
  HMDA_API_BASE_URL: z
    .string()
    .url()
    .default(DEFAULT_HMDA_API_BASE_URL)
    .transform((url) => url.replace(/\/+$/, '')),
  DEBUG_LOGS: z
    .string()
    .optional()
    .transform((value) => value === 'true'),
})

export interface ApiConfig {
  baseUrl: string
  debugLogs: boolean
}

export function getApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = ApiConfigSchema.parse({
    HMDA_API_BASE_URL: env.HMDA_API_BASE_URL || undefined,
    DEBUG_LOGS: env.DEBUG_LOGS,
  })

  return {
    baseUrl: parsed.HMDA_API_BASE_URL,
    debugLogs: parsed.DEBUG_LOGS,
  }
}
