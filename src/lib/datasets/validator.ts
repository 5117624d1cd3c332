/**
 * @fileoverview Dataset Validator
 *
 * Structural checks over a dataset root. `isValid` only looks for the
 * canonical split directories; `verify` additionally samples the first
 * dialogue file of each split for statistics.
 *
 * @module lib/datasets/validator
 */

import { readFile, readdir } from "fs/promises"
import { join } from "path"
import { z } from "zod"
import { errorMessage } from "../errors"
import { logger } from "../logger"
import {
  CANONICAL_SPLITS,
  SIDECAR_FILES,
  type CanonicalSplit,
  type SplitReport,
  type ValidationReport,
} from "./types"
import { isDialogueFile, isDirectory, isFile, naturalCompare } from "./utils"

export const SAMPLED_SERVICES_LIMIT = 10

/**
 * Only the fields the validator inspects are decoded; everything else in
 * a dialogue record stays opaque.
 */
const dialogueFileSchema = z.array(z.unknown())

const sampledRecordSchema = z
  .object({
    services: z.union([z.array(z.string()), z.string()]).optional(),
  })
  .passthrough()

/**
 * True iff `train`, `dev` and `test` all exist as directories under
 * `root`, whatever they contain.
 */
export function isValid(root: string): boolean {
  return CANONICAL_SPLITS.every((split) => isDirectory(join(root, split)))
}

async function listDialogueFiles(splitDir: string): Promise<string[]> {
  const entries = await readdir(splitDir, { withFileTypes: true })
  return entries
    .filter((entry) => entry.isFile() && isDialogueFile(entry.name))
    .map((entry) => entry.name)
    .sort(naturalCompare)
}

function servicesOf(record: unknown): string[] {
  const parsed = sampledRecordSchema.safeParse(record)
  if (!parsed.success || parsed.data.services === undefined) return []
  const { services } = parsed.data
  return typeof services === "string" ? [services] : services
}

/**
 * Best-effort statistics pass. Samples only the first dialogue file of
 * each split; unreadable samples and missing splits become warnings.
 */
export async function verify(root: string): Promise<ValidationReport> {
  logger.info("Validation started", { root })

  const warnings: string[] = []
  const services = new Set<string>()
  const splits: SplitReport[] = []
  const splitsFound: CanonicalSplit[] = []
  const missingSplits: CanonicalSplit[] = []

  for (const split of CANONICAL_SPLITS) {
    const splitDir = join(root, split)
    if (!isDirectory(splitDir)) {
      missingSplits.push(split)
      continue
    }
    splitsFound.push(split)

    let files: string[] = []
    try {
      files = await listDialogueFiles(splitDir)
    } catch (error) {
      warnings.push(`Could not list ${split}: ${errorMessage(error)}`)
      logger.warn("Split directory unreadable", { split, error: errorMessage(error) })
    }
    const report: SplitReport = {
      split,
      fileCount: files.length,
      sampledFile: files[0] ?? null,
      sampledConversations: 0,
    }

    if (report.sampledFile) {
      const samplePath = join(splitDir, report.sampledFile)
      try {
        const decoded = dialogueFileSchema.safeParse(JSON.parse(await readFile(samplePath, "utf-8")))
        if (decoded.success) {
          report.sampledConversations = decoded.data.length
          for (const service of servicesOf(decoded.data[0])) {
            services.add(service)
          }
        }
      } catch (error) {
        const warning = `Could not parse ${split}/${report.sampledFile}: ${errorMessage(error)}`
        warnings.push(warning)
        logger.warn("Sampled dialogue file unreadable", { split, file: report.sampledFile, error: errorMessage(error) })
      }
    }

    splits.push(report)
  }

  if (missingSplits.length > 0) {
    warnings.push(`Missing splits: ${missingSplits.join(", ")}`)
    logger.warn("Dataset is missing canonical splits", { root, missing: missingSplits.join(",") })
  }

  const result: ValidationReport = {
    root,
    valid: missingSplits.length === 0,
    splitsFound,
    missingSplits,
    splits,
    totalFiles: splits.reduce((sum, s) => sum + s.fileCount, 0),
    totalConversations: splits.reduce((sum, s) => sum + s.sampledConversations, 0),
    hasDialogActs: isFile(join(root, SIDECAR_FILES.dialogActs)),
    hasSchema: isFile(join(root, SIDECAR_FILES.schema)),
    sampledServices: [...services].sort().slice(0, SAMPLED_SERVICES_LIMIT),
    warnings,
  }

  logger.info("Validation finished", {
    root,
    splits: splitsFound.join(","),
    files: result.totalFiles,
    conversations: result.totalConversations,
    dialogActs: result.hasDialogActs,
    schema: result.hasSchema,
  })

  return result
}

/**
 * Human-readable summary of a report.
 */
export function formatReport(report: ValidationReport): string[] {
  const lines = [
    `Dataset root:     ${report.root}`,
    `Splits found:     ${report.splitsFound.join(", ") || "none"}`,
    `Dialogue files:   ${report.totalFiles}`,
    `Conversations:    ${report.totalConversations} (sampled)`,
    `dialog_acts.json: ${report.hasDialogActs ? "present" : "absent"}`,
    `schema.json:      ${report.hasSchema ? "present" : "absent"}`,
    `Services:         ${report.sampledServices.join(", ") || "none"}`,
  ]
  for (const warning of report.warnings) {
    lines.push(`Warning: ${warning}`)
  }
  return lines
}
