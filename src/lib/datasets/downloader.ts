/**
 * @fileoverview Dataset Downloader
 *
 * Streams one remote resource to a local file in bounded chunks,
 * reporting byte progress. The whole payload is never held in memory.
 *
 * @module lib/datasets/downloader
 */

import { createHash } from "crypto"
import { mkdir, open } from "fs/promises"
import { dirname } from "path"
import { NetworkError, errorMessage } from "../errors"
import { logger } from "../logger"
import { Err, Ok, type Result } from "../result"
import type { DownloadProgress, FetchSummary } from "./types"
import { formatBytes, parseContentLength } from "./utils"

export const DEFAULT_CHUNK_SIZE = 8 * 1024
export const DEFAULT_TIMEOUT_MS = 60_000

/**
 * Minimal fetch signature; the global `fetch` satisfies it.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface FetchToFileOptions {
  /** Connect and per-read timeout (default: 60s) */
  timeoutMs?: number
  /** Maximum bytes per file write (default: 8 KiB) */
  chunkSize?: number
  onProgress?: (progress: DownloadProgress) => void
  fetchImpl?: FetchLike
  headers?: Record<string, string>
}

class TimeoutError extends Error {
  constructor(ms: number) {
    super(`No response data within ${ms}ms`)
    this.name = "TimeoutError"
  }
}

/**
 * Marks a failure of the local destination so it is rethrown as is
 * instead of being reported as a NetworkError.
 */
class DestinationError extends Error {
  constructor(cause: unknown) {
    super(errorMessage(cause), { cause })
    this.name = "DestinationError"
  }
}

async function onDestination<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op()
  } catch (error) {
    throw new DestinationError(error)
  }
}

/**
 * Download `url` into `destination`.
 *
 * Any non-2xx status, timeout or connection failure is returned as a
 * NetworkError. Failures creating or writing the destination reject with
 * the underlying filesystem error. The destination is left in whatever
 * partial state it reached; removing it is the caller's job.
 */
export async function fetchToFile(
  url: string,
  destination: string,
  options: FetchToFileOptions = {}
): Promise<Result<FetchSummary, NetworkError>> {
  const {
    timeoutMs = DEFAULT_TIMEOUT_MS,
    chunkSize = DEFAULT_CHUNK_SIZE,
    onProgress,
    fetchImpl = fetch,
    headers,
  } = options

  const startedAt = Date.now()
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const armTimer = () => {
    clearTimeout(timer)
    timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs)
  }

  logger.info("Fetch started", { url, destination })
  armTimer()

  try {
    const response = await fetchImpl(url, {
      headers,
      redirect: "follow",
      signal: controller.signal,
    })

    if (!response.ok) {
      await response.body?.cancel()
      return Err(
        new NetworkError(`HTTP ${response.status} ${response.statusText} for ${url}`.trim(), {
          url,
          status: response.status,
        })
      )
    }
    if (!response.body) {
      return Err(new NetworkError(`No response body from ${url}`, { url, status: response.status }))
    }

    const totalBytes = parseContentLength(response.headers.get("content-length"))
    const hash = createHash("sha256")
    let receivedBytes = 0

    await onDestination(() => mkdir(dirname(destination), { recursive: true }))
    const file = await onDestination(() => open(destination, "w"))
    try {
      const reader = response.body.getReader()
      for (;;) {
        armTimer()
        const { done, value } = await reader.read()
        if (done) break

        for (let offset = 0; offset < value.byteLength; offset += chunkSize) {
          const chunk = value.subarray(offset, offset + chunkSize)
          await onDestination(() => file.write(chunk))
        }
        hash.update(value)
        receivedBytes += value.byteLength
        onProgress?.({
          receivedBytes,
          totalBytes,
          fraction: totalBytes ? Math.min(receivedBytes / totalBytes, 1) : null,
        })
      }
    } finally {
      await onDestination(() => file.close())
    }

    const summary: FetchSummary = {
      url,
      destination,
      bytes: receivedBytes,
      totalBytes,
      sha256: hash.digest("hex"),
      durationMs: Date.now() - startedAt,
    }
    logger.info("Fetch finished", {
      url,
      size: formatBytes(receivedBytes),
      sha256: summary.sha256,
      durationMs: summary.durationMs,
    })
    return Ok(summary)
  } catch (error) {
    if (error instanceof DestinationError) {
      throw error.cause
    }
    const reason: unknown = controller.signal.aborted ? controller.signal.reason : error
    const timedOut = reason instanceof TimeoutError
    return Err(
      new NetworkError(`Fetch of ${url} failed: ${errorMessage(reason)}`, {
        url,
        timedOut,
        cause: error,
      })
    )
  } finally {
    clearTimeout(timer)
  }
}
