import { getEnv } from '@/utils/bindings'
import { pipelineEnvSchema, type PipelineEnv } from './schemas'

/**
 * Raised when the environment does not describe a usable pipeline.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

let cachedConfig: PipelineEnv | null = null

export function getPipelineConfig(): PipelineEnv {
  if (cachedConfig) {
    return cachedConfig
  }

  const result = pipelineEnvSchema.safeParse(getEnv())

  if (!result.success) {
    throw new ConfigError(`Pipeline environment validation failed: ${result.error.message}`)
  }

  cachedConfig = result.data
  return cachedConfig
}

export function resetPipelineConfig(): void {
  cachedConfig = null
}
