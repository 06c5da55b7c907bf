/**
 * Generator Configuration
 *
 * Merges CLI options with `REPOGEN_*` environment defaults and validates the
 * result. Precedence: flag, then environment, then built-in default.
 */

import { z } from 'zod'
import { ConfigError } from './core/errors.js'
import { DEFAULT_RECEIVER } from './core/repository-renderer.js'

const GO_IDENTIFIER = /^[\p{L}_][\p{L}\p{Nd}_]*$/u
// Optionally schema-qualified: users, public.users
const SQL_TABLE = /^[A-Za-z_][A-Za-z0-9_$]*(\.[A-Za-z_][A-Za-z0-9_$]*)?$/

export const GeneratorConfigSchema = z.object({
  source: z.string().min(1, 'source path must not be empty'),
  output: z.string().min(1, 'output directory must not be empty'),
  table: z.string().regex(SQL_TABLE, 'table must be a SQL identifier, optionally schema-qualified'),
  receiver: z.string().regex(GO_IDENTIFIER, 'receiver must be a Go identifier'),
  dryRun: z.boolean(),
  verbose: z.boolean(),
})

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>

/** Raw values as commander hands them over */
export interface GenerateOptions {
  output?: string
  table?: string
  receiver?: string
  dryRun?: boolean
  verbose?: boolean
}

export const DEFAULTS = {
  source: '.',
  output: 'repository',
  table: 'testTable',
  receiver: DEFAULT_RECEIVER,
} as const

export function resolveConfig(
  source: string | undefined,
  options: GenerateOptions,
  env: NodeJS.ProcessEnv = process.env
): GeneratorConfig {
  const result = GeneratorConfigSchema.safeParse({
    source: source ?? DEFAULTS.source,
    output: options.output ?? env.REPOGEN_OUTPUT ?? DEFAULTS.output,
    table: options.table ?? env.REPOGEN_TABLE ?? DEFAULTS.table,
    receiver: options.receiver ?? env.REPOGEN_RECEIVER ?? DEFAULTS.receiver,
    dryRun: options.dryRun ?? false,
    verbose: options.verbose ?? false,
  })

  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }
  return result.data
}
