/**
 * @fileoverview Dataset Utilities
 *
 * Dialogue file naming, filename ordering, path checks and byte formatting
 * helpers shared by the acquisition components.
 *
 * @module lib/datasets/utils
 */

import { statSync } from "fs"

/**
 * Dialogue files are `dialogues_<NNN>.json`.
 */
export const DIALOGUE_FILE_PATTERN = /^dialogues_\d+\.json$/

/**
 * Name of the n-th (1-based) dialogue file of a split.
 */
export function dialogueFileName(index: number): string {
  return `dialogues_${String(index).padStart(3, "0")}.json`
}

export function isDialogueFile(name: string): boolean {
  return DIALOGUE_FILE_PATTERN.test(name)
}

/**
 * Natural filename order: `dialogues_2.json` sorts before `dialogues_10.json`.
 */
export function naturalCompare(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true })
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory()
  } catch {
    return false
  }
}

export function isFile(path: string): boolean {
  try {
    return statSync(path).isFile()
  } catch {
    return false
  }
}

/**
 * Parse a `content-length` header. Missing, non-numeric or zero sizes
 * yield null (indeterminate progress).
 */
export function parseContentLength(header: string | null): number | null {
  if (!header) return null
  const value = Number(header)
  return Number.isSafeInteger(value) && value > 0 ? value : null
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`
}
