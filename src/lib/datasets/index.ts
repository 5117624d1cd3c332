/**
 * @fileoverview Dataset Acquisition Barrel Export
 *
 * Unified exports for fetching, normalizing and validating the
 * MultiWOZ 2.2 dataset.
 *
 * @module lib/datasets
 */

// Types
export type {
  AcquisitionOutcome,
  CanonicalSplit,
  DownloadProgress,
  ExtractSummary,
  FallbackSummary,
  FetchSummary,
  SourceSplit,
  SplitReport,
  ValidationReport,
} from "./types"

export { CANONICAL_SPLITS, FALLBACK_SPLIT_MAP, SIDECAR_FILES, SOURCE_SPLITS } from "./types"

// Utilities
export {
  dialogueFileName,
  formatBytes,
  isDialogueFile,
  naturalCompare,
} from "./utils"

// Components
export { fetchToFile, type FetchLike, type FetchToFileOptions } from "./downloader"
export { extractArchive, flattenWrapperDirectory, DEFAULT_WRAPPER_NAMES } from "./archive"
export {
  fetchFallback,
  fetchPartitionRows,
  toCanonicalSplit,
  FALLBACK_DEFAULTS,
  type FallbackOptions,
} from "./fallback"
export { isValid, verify, formatReport } from "./validator"

// Orchestrator
export {
  acquireDataset,
  ensureDataset,
  resolveDatasetPaths,
  ARCHIVE_FILE_NAME,
  DATASET_DIR_NAME,
  MULTIWOZ_ARCHIVE_URL,
  type AcquireOptions,
  type AcquisitionDependencies,
} from "./acquire"
