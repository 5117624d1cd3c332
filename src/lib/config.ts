/**
 * @fileoverview Acquisition Configuration
 *
 * Environment variables validated with zod and mapped onto the
 * orchestrator's options. The CLI loads `.env` files with dotenv before
 * calling `loadConfig`.
 *
 * @module lib/config
 */

import { resolve } from "path"
import { z } from "zod"
import { ConfigurationError } from "./errors"
import { MULTIWOZ_ARCHIVE_URL, type AcquireOptions } from "./datasets/acquire"
import { DEFAULT_CHUNK_SIZE, DEFAULT_TIMEOUT_MS } from "./datasets/downloader"
import { FALLBACK_DEFAULTS } from "./datasets/fallback"

const envSchema = z.object({
  MULTIWOZ_DATA_DIR: z.string().min(1).default("data/raw"),
  MULTIWOZ_ARCHIVE_URL: z.url().default(MULTIWOZ_ARCHIVE_URL),
  MULTIWOZ_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  MULTIWOZ_CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  MULTIWOZ_FALLBACK_ENDPOINT: z.url().default(FALLBACK_DEFAULTS.endpoint),
  MULTIWOZ_FALLBACK_DATASET: z.string().min(1).default(FALLBACK_DEFAULTS.dataset),
  MULTIWOZ_FALLBACK_CONFIG: z.string().min(1).default(FALLBACK_DEFAULTS.config),
  MULTIWOZ_FALLBACK_PAGE_SIZE: z.coerce
    .number()
    .int()
    .min(1)
    .max(100)
    .default(FALLBACK_DEFAULTS.pageSize),
  HF_TOKEN: z.string().min(1).optional(),
  SENTRY_DSN: z.string().min(1).optional(),
})

export interface AcquisitionConfig {
  dataDir: string
  archiveUrl: string
  timeoutMs: number
  chunkSize: number
  fallback: {
    endpoint: string
    dataset: string
    config: string
    pageSize: number
    token?: string
  }
  sentryDsn?: string
}

/**
 * Validate the environment. Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AcquisitionConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  )
  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(parsed.error)
  }

  const vars = parsed.data
  return {
    dataDir: resolve(vars.MULTIWOZ_DATA_DIR),
    archiveUrl: vars.MULTIWOZ_ARCHIVE_URL,
    timeoutMs: vars.MULTIWOZ_HTTP_TIMEOUT_MS,
    chunkSize: vars.MULTIWOZ_CHUNK_SIZE,
    fallback: {
      endpoint: vars.MULTIWOZ_FALLBACK_ENDPOINT,
      dataset: vars.MULTIWOZ_FALLBACK_DATASET,
      config: vars.MULTIWOZ_FALLBACK_CONFIG,
      pageSize: vars.MULTIWOZ_FALLBACK_PAGE_SIZE,
      token: vars.HF_TOKEN,
    },
    sentryDsn: vars.SENTRY_DSN,
  }
}

/**
 * Orchestrator options for a validated configuration.
 */
export function toAcquireOptions(
  config: AcquisitionConfig,
  overrides: Partial<AcquireOptions> = {}
): AcquireOptions {
  return {
    dataDir: config.dataDir,
    archiveUrl: config.archiveUrl,
    ...overrides,
    download: {
      timeoutMs: config.timeoutMs,
      chunkSize: config.chunkSize,
      ...overrides.download,
    },
    fallback: {
      ...config.fallback,
      timeoutMs: config.timeoutMs,
      ...overrides.fallback,
    },
  }
}
