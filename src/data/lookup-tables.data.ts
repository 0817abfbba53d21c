import { readFileSync } from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

const StateCodesFileSchema = z.object({
  stateCodes: z.array(z.string().regex(/^[A-Z]{2}$/)).nonempty(),
})

function loadStateCodes(): readonly string[] {
  const filePath = path.join(__dirname, '../../data/state-codes.json')
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'))
  return Object.freeze([...StateCodesFileSchema.parse(raw).stateCodes])
}

// US states, DC, territories and freely associated states
export const STATE_CODES: readonly string[] = loadStateCodes()

const stateCodeSet: ReadonlySet<string> = new Set(STATE_CODES)

// Keys are the Race codes; values are the labels the API filters on
export const RACE_LABELS: Readonly<Partial<Record<number, string>>> =
  Object.freeze({
    0: 'Asian',
    1: 'Native Hawaiian or Other Pacific Islander',
    2: 'Free Form Text Only',
    3: 'Race Not Available',
    4: 'American Indian or Alaska Native',
    5: 'Black or African American',
    6: '2 or more minority races',
    7: 'White',
    8: 'Joint',
  })

export function isStateCode(candidate: string): boolean {
  return stateCodeSet.has(candidate.toUpperCase())
}
