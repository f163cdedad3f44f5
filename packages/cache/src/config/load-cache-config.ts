import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@keystash/config"
import { type CacheConfig, type CacheEnvConfig, cacheEnvSchema } from "./schema"

export function mapEnvToConfig(env: CacheEnvConfig): CacheConfig {
  return {
    redis: {
      url: env.REDIS_URL,
    },
    cache: {
      name: env.CACHE_NAME,
      prefix: env.CACHE_PREFIX,
      expirationSeconds: env.CACHE_EXPIRATION_SECONDS,
      lockPollMs: env.CACHE_LOCK_POLL_MS,
      pageSize: env.CACHE_PAGE_SIZE,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

/**
 * Read cache settings from an optional `.env` file in `cwd`, overridden by
 * `env`.
 */
export async function loadCacheConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<CacheConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: cacheEnvSchema, sources })

  return mapEnvToConfig(result.value)
}
