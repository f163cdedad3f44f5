import type { Milliseconds, Seconds } from "@keystash/clock"
import { type LogLevelName, logLevelNames } from "@keystash/logger"
import { z } from "zod/mini"

export const cacheEnvSchema = z.object({
  REDIS_URL: z._default(z.string(), "redis://localhost:6379"),

  CACHE_NAME: z.string().check(z.minLength(1)),
  CACHE_PREFIX: z._default(z.string(), ""),
  CACHE_EXPIRATION_SECONDS: z._default(z.coerce.number(), 0),
  CACHE_LOCK_POLL_MS: z._default(z.coerce.number(), 300),
  CACHE_PAGE_SIZE: z._default(z.coerce.number(), 128),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),
})

export type CacheEnvConfig = z.infer<typeof cacheEnvSchema>

export type CacheConfig = {
  redis: {
    url: string
  }

  cache: {
    name: string
    /** UTF-8 text; empty means no prefix. */
    prefix: string
    expirationSeconds: Seconds
    lockPollMs: Milliseconds
    pageSize: number
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }
}
