/**
 * @fileoverview Archive Normalizer
 *
 * Unpacks the staged zip into the dataset root, then lifts the contents
 * of one wrapper directory (e.g. `data/`) up into the root so the splits
 * sit directly under it.
 *
 * @module lib/datasets/archive
 */

import { mkdir, readdir, rename, rmdir, stat } from "fs/promises"
import { join } from "path"
import AdmZip from "adm-zip"
import { ExtractionError, errorMessage } from "../errors"
import { logger } from "../logger"
import { Err, Ok, type Result } from "../result"
import type { ExtractSummary } from "./types"
import { isDirectory } from "./utils"

/**
 * Wrapper directories the archive may unpack into, checked in order.
 * Only the first one found is flattened, one level deep.
 */
export const DEFAULT_WRAPPER_NAMES = ["data", "MultiWOZ_2.2"] as const

export interface ExtractOptions {
  wrapperNames?: readonly string[]
}

export interface FlattenSummary {
  wrapper: string | null
  moved: string[]
  skipped: string[]
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch {
    return false
  }
}

/**
 * Move every entry of the first wrapper directory found under
 * `targetDir` up into `targetDir`.
 *
 * An entry whose name already exists at the destination is skipped with
 * one warning and never overwritten. The wrapper is removed only once it
 * is empty.
 */
export async function flattenWrapperDirectory(
  targetDir: string,
  wrapperNames: readonly string[] = DEFAULT_WRAPPER_NAMES
): Promise<FlattenSummary> {
  const wrapper = wrapperNames.find((name) => isDirectory(join(targetDir, name)))
  if (!wrapper) {
    return { wrapper: null, moved: [], skipped: [] }
  }

  const wrapperPath = join(targetDir, wrapper)
  const moved: string[] = []
  const skipped: string[] = []

  const entries = (await readdir(wrapperPath)).sort()
  for (const entry of entries) {
    const destination = join(targetDir, entry)
    if (await exists(destination)) {
      logger.warn("Skipping wrapper entry, destination exists", { wrapper, entry })
      skipped.push(entry)
      continue
    }
    await rename(join(wrapperPath, entry), destination)
    moved.push(entry)
  }

  if ((await readdir(wrapperPath)).length === 0) {
    await rmdir(wrapperPath)
  } else {
    logger.warn("Wrapper directory kept, skipped entries remain", {
      wrapper,
      remaining: skipped.length,
    })
  }

  return { wrapper, moved, skipped }
}

/**
 * Extract `archivePath` into `targetDir` and flatten one wrapper level.
 *
 * A corrupt or unreadable archive returns an ExtractionError and may
 * leave `targetDir` partially extracted.
 */
export async function extractArchive(
  archivePath: string,
  targetDir: string,
  options: ExtractOptions = {}
): Promise<Result<ExtractSummary, ExtractionError>> {
  logger.info("Extraction started", { archivePath, targetDir })

  let extractedEntries: number
  try {
    await mkdir(targetDir, { recursive: true })
    const zip = new AdmZip(archivePath)
    extractedEntries = zip.getEntries().filter((entry) => !entry.isDirectory).length
    zip.extractAllTo(targetDir, true)
  } catch (error) {
    return Err(
      new ExtractionError(`Cannot extract ${archivePath}: ${errorMessage(error)}`, {
        archivePath,
        cause: error,
      })
    )
  }

  let flattened: FlattenSummary
  try {
    flattened = await flattenWrapperDirectory(targetDir, options.wrapperNames)
  } catch (error) {
    return Err(
      new ExtractionError(`Cannot normalize layout of ${targetDir}: ${errorMessage(error)}`, {
        archivePath,
        cause: error,
      })
    )
  }

  logger.info("Extraction finished", {
    targetDir,
    entries: extractedEntries,
    flattened: flattened.wrapper ?? "none",
    moved: flattened.moved.length,
    skipped: flattened.skipped.length,
  })

  return Ok({
    archivePath,
    targetDir,
    extractedEntries,
    flattened: flattened.wrapper,
    moved: flattened.moved,
    skipped: flattened.skipped,
  })
}
