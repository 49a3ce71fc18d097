/**
 * Business rule configuration
 *
 * Environment overrides:
 *   RULES_MIN_FOUNDED_YEAR          earliest plausible manufacturer founding year (default 1800)
 *   RULES_MIN_MODEL_YEAR            earliest plausible model year (default 1900)
 *   RULES_HISTORIC_REQUIRES_SERIAL  'true' turns the historic-without-serial warning into an error
 */

import { z } from 'zod'

export interface RulesConfig {
  minFoundedYear: number
  minModelYear: number
  /** Model years may be announced ahead of the calendar */
  maxModelYearAhead: number
  serialMinLength: number
  serialMaxLength: number
  historicRequiresSerial: boolean
}

export const DEFAULT_RULES_CONFIG: RulesConfig = {
  minFoundedYear: 1800,
  minModelYear: 1900,
  maxModelYearAhead: 1,
  serialMinLength: 3,
  serialMaxLength: 20,
  historicRequiresSerial: false,
}

const RulesEnvSchema = z.object({
  RULES_MIN_FOUNDED_YEAR: z.coerce.number().int().min(1000).optional(),
  RULES_MIN_MODEL_YEAR: z.coerce.number().int().min(1000).optional(),
  RULES_HISTORIC_REQUIRES_SERIAL: z.enum(['true', 'false']).optional(),
})

export function loadRulesConfig(env: NodeJS.ProcessEnv = process.env): RulesConfig {
  const parsed = RulesEnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid rules configuration: ${issues.join('; ')}`)
  }

  const vars = parsed.data
  return {
    ...DEFAULT_RULES_CONFIG,
    ...(vars.RULES_MIN_FOUNDED_YEAR !== undefined && { minFoundedYear: vars.RULES_MIN_FOUNDED_YEAR }),
    ...(vars.RULES_MIN_MODEL_YEAR !== undefined && { minModelYear: vars.RULES_MIN_MODEL_YEAR }),
    ...(vars.RULES_HISTORIC_REQUIRES_SERIAL !== undefined && {
      historicRequiresSerial: vars.RULES_HISTORIC_REQUIRES_SERIAL === 'true',
    }),
  }
}
