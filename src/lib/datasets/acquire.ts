/**
 * @fileoverview Acquisition Orchestrator
 *
 * Decides between the cached dataset, the primary archive and the
 * hosted fallback, and classifies every call into an AcquisitionOutcome:
 *
 * 1. Cache hit when the canonical splits already exist (no network)
 * 2. Fetch the archive unless one is already staged
 * 3. On fetch failure, hand off to the fallback source and return
 * 4. Extract and normalize the staged archive
 * 5. Delete the staged archive once extraction succeeded
 *
 * @module lib/datasets/acquire
 */

import { existsSync } from "fs"
import { rm } from "fs/promises"
import { join } from "path"
import { errorMessage } from "../errors"
import { logger } from "../logger"
import { extractArchive, type ExtractOptions } from "./archive"
import { fetchToFile, type FetchToFileOptions } from "./downloader"
import { fetchFallback, type FallbackOptions } from "./fallback"
import type { AcquisitionOutcome, FetchSummary } from "./types"
import { isValid } from "./validator"

export const MULTIWOZ_ARCHIVE_URL =
  "https://github.com/budzianowski/multiwoz/raw/master/data/MultiWOZ_2.2.zip"
export const ARCHIVE_FILE_NAME = "MultiWOZ_2.2.zip"
export const DATASET_DIR_NAME = "multiwoz_2.2"

/**
 * Components the orchestrator sequences. Injectable so callers and tests
 * can substitute or observe them.
 */
export interface AcquisitionDependencies {
  fetchToFile: typeof fetchToFile
  extractArchive: typeof extractArchive
  fetchFallback: typeof fetchFallback
}

export interface AcquireOptions {
  /** Parent directory holding the dataset root and the staged archive */
  dataDir: string
  datasetDirName?: string
  archiveUrl?: string
  archiveFileName?: string
  /** Ignore the cache and any staged archive */
  force?: boolean
  download?: FetchToFileOptions
  extract?: ExtractOptions
  fallback?: FallbackOptions
  deps?: Partial<AcquisitionDependencies>
}

export interface DatasetPaths {
  root: string
  archivePath: string
}

export function resolveDatasetPaths(
  options: Pick<AcquireOptions, "dataDir" | "datasetDirName" | "archiveFileName">
): DatasetPaths {
  return {
    root: join(options.dataDir, options.datasetDirName ?? DATASET_DIR_NAME),
    archivePath: join(options.dataDir, options.archiveFileName ?? ARCHIVE_FILE_NAME),
  }
}

/**
 * Acquire the dataset and report which path was taken.
 *
 * Fetch failures are recovered through the fallback source; extraction
 * and fallback failures come back as `failed`. Local filesystem errors
 * while staging the archive reject.
 */
export async function acquireDataset(options: AcquireOptions): Promise<AcquisitionOutcome> {
  const deps: AcquisitionDependencies = {
    fetchToFile,
    extractArchive,
    fetchFallback,
    ...options.deps,
  }
  const { root, archivePath } = resolveDatasetPaths(options)
  const archiveUrl = options.archiveUrl ?? MULTIWOZ_ARCHIVE_URL

  if (!options.force && isValid(root)) {
    logger.info("Cache hit, dataset already present", { root })
    return { kind: "cache-hit", root }
  }

  if (options.force && existsSync(archivePath)) {
    await rm(archivePath, { force: true })
  }

  let fetched: FetchSummary | null = null
  if (existsSync(archivePath)) {
    logger.info("Reusing staged archive", { archivePath })
  } else {
    const result = await deps.fetchToFile(archiveUrl, archivePath, options.download)
    if (!result.ok) {
      logger.error("Primary fetch failed, switching to fallback", {
        url: archiveUrl,
        status: result.error.status,
        timedOut: result.error.timedOut,
        error: result.error.message,
      })
      const fallback = await deps.fetchFallback(root, options.fallback)
      if (!fallback.ok) {
        logger.error("Fallback failed", { error: fallback.error.message })
        return { kind: "failed", root, error: fallback.error }
      }
      return { kind: "fallback", root, reason: result.error, fallback: fallback.value }
    }
    fetched = result.value
  }

  const extracted = await deps.extractArchive(archivePath, root, options.extract)
  if (!extracted.ok) {
    logger.error("Extraction failed", { archivePath, error: extracted.error.message })
    return { kind: "failed", root, error: extracted.error }
  }

  try {
    await rm(archivePath, { force: true })
    logger.info("Removed staged archive", { archivePath })
  } catch (error) {
    logger.warn("Could not remove staged archive", { archivePath, error: errorMessage(error) })
  }

  if (!isValid(root)) {
    logger.warn("Extracted dataset lacks canonical splits", { root })
  }

  return { kind: "primary", root, fetch: fetched, extract: extracted.value }
}

/**
 * Acquire the dataset and return its root, throwing the fatal error of
 * a failed acquisition.
 */
export async function ensureDataset(options: AcquireOptions): Promise<string> {
  const outcome = await acquireDataset(options)
  if (outcome.kind === "failed") {
    throw outcome.error
  }
  return outcome.root
}
