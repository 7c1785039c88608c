import { z } from "zod"
import { ConfigError } from "../errors/lifecycle-errors"
import type { Milliseconds } from "../ports/time"

export const DEFAULT_ENV_PREFIX = "HOOKLINE_"

export const timeoutMsSchema = z.coerce.number().int().positive()

const endpointsSchema = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((endpoint) => endpoint.trim())
      .filter((endpoint) => endpoint.length > 0),
  )

const runnerEnvSchema = z.object({
  SERVICE_ID: z.string().optional(),
  SERVICE_NAME: z.string().optional(),
  SERVICE_VERSION: z.string().optional(),
  SERVICE_ENDPOINTS: endpointsSchema.optional(),
  START_TIMEOUT_MS: timeoutMsSchema.optional(),
  STOP_TIMEOUT_MS: timeoutMsSchema.optional(),
})

/**
 * Runner settings sourced from the environment. Every field is optional;
 * explicit runner options take precedence over it.
 */
export type RunnerConfig = {
  id?: string
  name?: string
  version?: string
  endpoints?: string[]
  startTimeoutMs?: Milliseconds
  stopTimeoutMs?: Milliseconds
}

export type LoadRunnerConfigOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>

  /** @default "HOOKLINE_" */
  prefix?: string
}

/**
 * Reads `<prefix>SERVICE_ID`, `SERVICE_NAME`, `SERVICE_VERSION`,
 * `SERVICE_ENDPOINTS` (comma separated), `START_TIMEOUT_MS` and
 * `STOP_TIMEOUT_MS`. Empty variables count as unset.
 *
 * @throws ConfigError when a variable fails validation.
 */
export function loadRunnerConfig(options: LoadRunnerConfigOptions = {}): RunnerConfig {
  const prefix = options.prefix ?? DEFAULT_ENV_PREFIX
  const raw = pickPrefixed(options.env ?? process.env, prefix)

  const result = runnerEnvSchema.safeParse(raw)

  if (!result.success) {
    throw new ConfigError(
      `Runner configuration validation failed:\n${z.prettifyError(result.error)}`,
      { cause: result.error, context: { prefix } },
    )
  }

  const env = result.data

  return {
    ...(env.SERVICE_ID !== undefined && { id: env.SERVICE_ID }),
    ...(env.SERVICE_NAME !== undefined && { name: env.SERVICE_NAME }),
    ...(env.SERVICE_VERSION !== undefined && { version: env.SERVICE_VERSION }),
    ...(env.SERVICE_ENDPOINTS !== undefined && { endpoints: env.SERVICE_ENDPOINTS }),
    ...(env.START_TIMEOUT_MS !== undefined && { startTimeoutMs: env.START_TIMEOUT_MS }),
    ...(env.STOP_TIMEOUT_MS !== undefined && { stopTimeoutMs: env.STOP_TIMEOUT_MS }),
  }
}

function pickPrefixed(
  env: Record<string, string | undefined>,
  prefix: string,
): Record<string, string> {
  const picked: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (value === undefined || value === "") continue
    if (key.startsWith(prefix)) picked[key.slice(prefix.length)] = value
  }

  return picked
}
