/**
 * @fileoverview Dataset Types
 *
 * Shared vocabulary of the acquisition pipeline: canonical split names,
 * the fallback split remapping, and the report/outcome shapes returned
 * to callers.
 *
 * @module lib/datasets/types
 */

import type { ExtractionError, FallbackError, NetworkError } from "../errors"

/**
 * Canonical split identifiers, in validation order.
 */
export const CANONICAL_SPLITS = ["train", "dev", "test"] as const

export type CanonicalSplit = (typeof CANONICAL_SPLITS)[number]

/**
 * Partition names used by the hosted-dataset source.
 */
export const SOURCE_SPLITS = ["train", "validation", "test"] as const

export type SourceSplit = (typeof SOURCE_SPLITS)[number]

/**
 * Hosted-source partition → canonical split. The source calls the
 * development partition "validation".
 */
export const FALLBACK_SPLIT_MAP = {
  train: "train",
  validation: "dev",
  test: "test",
} as const satisfies Record<SourceSplit, CanonicalSplit>

/**
 * Optional dataset-root files flagged by the validator.
 */
export const SIDECAR_FILES = {
  dialogActs: "dialog_acts.json",
  schema: "schema.json",
} as const

/** Byte-level download progress; totals are null when the size is unknown. */
export interface DownloadProgress {
  receivedBytes: number
  totalBytes: number | null
  fraction: number | null
}

export interface FetchSummary {
  url: string
  destination: string
  bytes: number
  totalBytes: number | null
  sha256: string
  durationMs: number
}

export interface ExtractSummary {
  archivePath: string
  targetDir: string
  /** Number of zip entries written */
  extractedEntries: number
  /** Wrapper directory that was flattened, if any */
  flattened: string | null
  moved: string[]
  skipped: string[]
}

export interface FallbackSummary {
  dataset: string
  config: string
  targetDir: string
  records: Record<CanonicalSplit, number>
}

export interface SplitReport {
  split: CanonicalSplit
  fileCount: number
  /** First dialogue file in natural order, or null when the split has none */
  sampledFile: string | null
  sampledConversations: number
}

/**
 * Best-effort statistics over a dataset root. Produced fresh on every
 * `verify` call; never persisted.
 */
export interface ValidationReport {
  root: string
  valid: boolean
  splitsFound: CanonicalSplit[]
  missingSplits: CanonicalSplit[]
  splits: SplitReport[]
  totalFiles: number
  totalConversations: number
  hasDialogActs: boolean
  hasSchema: boolean
  sampledServices: string[]
  warnings: string[]
}

/**
 * Which path an acquisition call took.
 */
export type AcquisitionOutcome =
  | { kind: "cache-hit"; root: string }
  | {
      kind: "primary"
      root: string
      /** Null when a previously staged archive was reused */
      fetch: FetchSummary | null
      extract: ExtractSummary
    }
  | {
      kind: "fallback"
      root: string
      reason: NetworkError
      fallback: FallbackSummary
    }
  | {
      kind: "failed"
      root: string
      error: ExtractionError | FallbackError
    }
