/**
 * @fileoverview Fallback Source Adapter
 *
 * Materializes the dataset from the Hugging Face datasets-server `rows`
 * API when the primary archive is unreachable. Each hosted partition is
 * remapped to its canonical split and written as one dialogue file.
 *
 * @module lib/datasets/fallback
 */

import { mkdir, writeFile } from "fs/promises"
import { join } from "path"
import { z } from "zod"
import { FallbackError, errorMessage } from "../errors"
import { logger } from "../logger"
import { Err, Ok, type Result } from "../result"
import { NonRetriableError, withRetry, type RetryOptions } from "../retry"
import type { FetchLike } from "./downloader"
import {
  FALLBACK_SPLIT_MAP,
  SOURCE_SPLITS,
  type CanonicalSplit,
  type FallbackSummary,
  type SourceSplit,
} from "./types"
import { dialogueFileName } from "./utils"

export const FALLBACK_DEFAULTS = {
  endpoint: "https://datasets-server.huggingface.co",
  dataset: "pfb30/multi_woz_v22",
  config: "v2.2",
  /** The rows API caps `length` at 100 */
  pageSize: 100,
  timeoutMs: 60_000,
} as const

export interface FallbackOptions {
  endpoint?: string
  dataset?: string
  config?: string
  pageSize?: number
  timeoutMs?: number
  token?: string
  fetchImpl?: FetchLike
  retry?: RetryOptions
}

/**
 * datasets-server `/rows` response. Row contents stay opaque.
 */
const rowsPageSchema = z.object({
  rows: z.array(
    z.object({
      row_idx: z.number().int(),
      row: z.record(z.string(), z.unknown()),
    })
  ),
  num_rows_total: z.number().int().nonnegative(),
})

type RowsPage = z.infer<typeof rowsPageSchema>

/**
 * Canonical split for a hosted partition name, or null when the name is
 * not one of the three known partitions.
 */
export function toCanonicalSplit(sourceSplit: string): CanonicalSplit | null {
  return isSourceSplit(sourceSplit) ? FALLBACK_SPLIT_MAP[sourceSplit] : null
}

function isSourceSplit(name: string): name is SourceSplit {
  return SOURCE_SPLITS.some((split) => split === name)
}

async function requestRowsPage(
  split: SourceSplit,
  offset: number,
  options: Required<Pick<FallbackOptions, "endpoint" | "dataset" | "config" | "pageSize" | "timeoutMs">> &
    Pick<FallbackOptions, "token" | "fetchImpl">
): Promise<RowsPage> {
  const url = new URL("/rows", options.endpoint)
  url.searchParams.set("dataset", options.dataset)
  url.searchParams.set("config", options.config)
  url.searchParams.set("split", split)
  url.searchParams.set("offset", String(offset))
  url.searchParams.set("length", String(options.pageSize))

  const fetchImpl = options.fetchImpl ?? fetch
  const response = await fetchImpl(url.toString(), {
    headers: options.token ? { Authorization: `Bearer ${options.token}` } : undefined,
    signal: AbortSignal.timeout(options.timeoutMs),
  })

  if (!response.ok) {
    const message = `datasets-server ${response.status} for ${split} at offset ${offset}`
    if (response.status >= 400 && response.status < 500 && response.status !== 429) {
      throw new NonRetriableError(message)
    }
    throw new Error(message)
  }

  const parsed = rowsPageSchema.safeParse(await response.json())
  if (!parsed.success) {
    throw new NonRetriableError(
      `Unexpected rows payload for ${split}: ${parsed.error.issues[0]?.message ?? "invalid"}`
    )
  }
  return parsed.data
}

/**
 * Read every row of one hosted partition, page by page, in `row_idx`
 * order. Each page request is retried on transient failures.
 */
export async function fetchPartitionRows(
  split: SourceSplit,
  options: FallbackOptions = {}
): Promise<Record<string, unknown>[]> {
  const resolved = {
    endpoint: options.endpoint ?? FALLBACK_DEFAULTS.endpoint,
    dataset: options.dataset ?? FALLBACK_DEFAULTS.dataset,
    config: options.config ?? FALLBACK_DEFAULTS.config,
    pageSize: options.pageSize ?? FALLBACK_DEFAULTS.pageSize,
    timeoutMs: options.timeoutMs ?? FALLBACK_DEFAULTS.timeoutMs,
    token: options.token,
    fetchImpl: options.fetchImpl,
  }

  const rows: RowsPage["rows"] = []
  let total = Infinity
  while (rows.length < total) {
    const offset = rows.length
    const page = await withRetry(() => requestRowsPage(split, offset, resolved), {
      onRetry: (error, attempt) =>
        logger.warn("Retrying rows request", { split, offset, attempt, error: error.message }),
      ...options.retry,
    })
    total = page.num_rows_total
    if (page.rows.length === 0) break
    rows.push(...page.rows)
  }

  return rows.sort((a, b) => a.row_idx - b.row_idx).map((entry) => entry.row)
}

/**
 * Materialize `train`, `dev` and `test` under `targetDir` from the
 * hosted source. Any retrieval or write failure is fatal.
 */
export async function fetchFallback(
  targetDir: string,
  options: FallbackOptions = {}
): Promise<Result<FallbackSummary, FallbackError>> {
  const dataset = options.dataset ?? FALLBACK_DEFAULTS.dataset
  const config = options.config ?? FALLBACK_DEFAULTS.config
  const records: Record<CanonicalSplit, number> = { train: 0, dev: 0, test: 0 }

  logger.info("Fallback started", { dataset, config, targetDir })

  for (const sourceSplit of SOURCE_SPLITS) {
    const split = FALLBACK_SPLIT_MAP[sourceSplit]
    try {
      const rows = await fetchPartitionRows(sourceSplit, options)
      const splitDir = join(targetDir, split)
      await mkdir(splitDir, { recursive: true })
      await writeFile(join(splitDir, dialogueFileName(1)), JSON.stringify(rows, null, 2), "utf-8")
      records[split] = rows.length
      logger.info("Fallback split written", { source: sourceSplit, split, records: rows.length })
    } catch (error) {
      return Err(
        new FallbackError(`Fallback retrieval of ${sourceSplit} failed: ${errorMessage(error)}`, {
          split: sourceSplit,
          cause: error,
        })
      )
    }
  }

  logger.info("Fallback finished", {
    dataset,
    train: records.train,
    dev: records.dev,
    test: records.test,
  })
  return Ok({ dataset, config, targetDir, records })
}
