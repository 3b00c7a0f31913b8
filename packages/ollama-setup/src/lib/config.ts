import process from 'node:process'

import { z } from 'zod'

export const DEFAULT_INSTALL_SCRIPT_URL = 'https://ollama.ai/install.sh'

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => ['1', 'true', 'yes'].includes((value ?? '').trim().toLowerCase()))

export const configSchema = z.object({
  OLLAMA_SETUP_DEBUG: booleanFlag,
  OLLAMA_INSTALL_SCRIPT_URL: z.string().url().default(DEFAULT_INSTALL_SCRIPT_URL),
  // Any value disables colors, including an empty string
  NO_COLOR: z.string().optional(),
})

export type Config = z.infer<typeof configSchema>

let cachedConfig: Config | null = null

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = configSchema.safeParse(env)

  if (!result.success) {
    console.error('Invalid environment configuration:')
    console.error(result.error.format())
    throw new Error('Invalid environment configuration')
  }

  return result.data
}

export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig
  }
  cachedConfig = parseConfig(process.env)
  return cachedConfig
}

export function resetConfigCache(): void {
  cachedConfig = null
}
