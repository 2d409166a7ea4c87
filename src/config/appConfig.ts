import { z } from 'zod'

export type AppConfig = {
  tickIntervalMs: number
  pollIntervalMs: number
  watchExtensions: string[]
  debug: boolean
}

const positiveIntFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a positive integer')
    .transform(Number)
    .pipe(z.number().int().positive())
    .optional()
    .transform((value) => value ?? fallback)

const EnvSchema = z.object({
  PUSH_BRIDGE_TICK_INTERVAL_MS: positiveIntFromEnv(1000),
  PUSH_BRIDGE_POLL_INTERVAL_MS: positiveIntFromEnv(500),
  PUSH_BRIDGE_WATCH_EXTENSIONS: z.string().optional(),
  PUSH_BRIDGE_DEBUG: z.enum(['true', 'false', '1', '0', '']).optional()
})

export function parseExtensionList(raw: string | undefined): string[] {
  if (!raw) return []
  return raw
    .split(',')
    .map((ext) => ext.trim())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`))
}

/**
 * Read configuration from a `process.env`-shaped record.
 * Unknown variables are ignored; invalid known ones throw.
 */
export function loadAppConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const variable = issue?.path.join('.') ?? 'environment'
    throw new Error(`Invalid configuration: ${variable} ${issue?.message ?? 'is invalid'}`)
  }

  const data = parsed.data
  return {
    tickIntervalMs: data.PUSH_BRIDGE_TICK_INTERVAL_MS,
    pollIntervalMs: data.PUSH_BRIDGE_POLL_INTERVAL_MS,
    watchExtensions: parseExtensionList(data.PUSH_BRIDGE_WATCH_EXTENSIONS),
    debug: data.PUSH_BRIDGE_DEBUG === 'true' || data.PUSH_BRIDGE_DEBUG === '1'
  }
}
