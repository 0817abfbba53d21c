import { z } from 'zod'
import type { RefinementCtx } from 'zod'

type CategoricalArgs = {
  actions?: string | string[]
  races?: string | string[]
}

function hasValues(value: string | string[] | undefined): boolean {
  if (value === undefined) return false
  return !Array.isArray(value) || value.length > 0
}

export function validateCategoricalArgs(
  args: CategoricalArgs,
  ctx: RefinementCtx,
) {
  if (!hasValues(args.actions) && !hasValues(args.races)) {
    ctx.addIssue({
      path: ['actions', 'races'],
      code: z.ZodIssueCode.custom,
      message:
        'No categorical filter specified error - define actions or races arguments.',
    })
  }
}
