import { describe, it, expect, vi } from "vitest"
import { createHash } from "crypto"
import { readFile, writeFile } from "fs/promises"
import { join } from "path"
import { createTempDir } from "@/test/factories"
import { fetchToFile, type FetchLike } from "./downloader"
import type { DownloadProgress } from "./types"

const ARCHIVE_URL = "https://example.test/MultiWOZ_2.2.zip"

function streamOf(chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(chunk)
      controller.close()
    },
  })
}

function bytes(length: number, fill: number): Uint8Array {
  return new Uint8Array(length).fill(fill)
}

describe("fetchToFile", () => {
  it("streams the body to disk and reports progress against content-length", async () => {
    const dir = await createTempDir()
    const destination = join(dir, "nested", "archive.zip")
    const first = bytes(12_000, 1)
    const second = bytes(8_000, 2)
    const fetchImpl = vi.fn<FetchLike>(async () =>
      new Response(streamOf([first, second]), { headers: { "content-length": "20000" } })
    )
    const progress: DownloadProgress[] = []

    const result = await fetchToFile(ARCHIVE_URL, destination, {
      fetchImpl,
      chunkSize: 4096,
      onProgress: (p) => progress.push(p),
    })

    expect(result.ok).toBe(true)
    if (!result.ok) return

    const written = await readFile(destination)
    expect(written.byteLength).toBe(20_000)
    expect(result.value.bytes).toBe(20_000)
    expect(result.value.totalBytes).toBe(20_000)
    expect(result.value.sha256).toBe(createHash("sha256").update(written).digest("hex"))
    expect(progress).toEqual([
      { receivedBytes: 12_000, totalBytes: 20_000, fraction: 0.6 },
      { receivedBytes: 20_000, totalBytes: 20_000, fraction: 1 },
    ])
    expect(fetchImpl).toHaveBeenCalledTimes(1)
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(ARCHIVE_URL)
  })

  it("reports indeterminate progress without content-length", async () => {
    const dir = await createTempDir()
    const progress: DownloadProgress[] = []

    const result = await fetchToFile(ARCHIVE_URL, join(dir, "a.zip"), {
      fetchImpl: async () => new Response(streamOf([bytes(10, 7)])),
      onProgress: (p) => progress.push(p),
    })

    expect(result.ok).toBe(true)
    expect(progress).toEqual([{ receivedBytes: 10, totalBytes: null, fraction: null }])
  })

  it("returns a NetworkError for a non-success status", async () => {
    const dir = await createTempDir()

    const result = await fetchToFile(ARCHIVE_URL, join(dir, "a.zip"), {
      fetchImpl: async () =>
        new Response("unavailable", { status: 503, statusText: "Service Unavailable" }),
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe("NETWORK_ERROR")
    expect(result.error.status).toBe(503)
    expect(result.error.timedOut).toBe(false)
    expect(result.error.message).toBe(`HTTP 503 Service Unavailable for ${ARCHIVE_URL}`)
  })

  it("flags a timeout when no response arrives in time", async () => {
    const dir = await createTempDir()
    const hanging: FetchLike = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")))
      })

    const result = await fetchToFile(ARCHIVE_URL, join(dir, "a.zip"), { fetchImpl: hanging, timeoutMs: 20 })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.timedOut).toBe(true)
    expect(result.error.message).toBe(`Fetch of ${ARCHIVE_URL} failed: No response data within 20ms`)
  })

  it("wraps connection failures", async () => {
    const dir = await createTempDir()

    const result = await fetchToFile(ARCHIVE_URL, join(dir, "a.zip"), {
      fetchImpl: async () => {
        throw new TypeError("fetch failed")
      },
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.timedOut).toBe(false)
    expect(result.error.status).toBeUndefined()
    expect(result.error.message).toBe(`Fetch of ${ARCHIVE_URL} failed: fetch failed`)
  })

  it("times out when the body stalls after the first chunk", async () => {
    const dir = await createTempDir()
    const destination = join(dir, "a.zip")
    const stalling: FetchLike = async (_input, init) =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(bytes(100, 1))
            init?.signal?.addEventListener("abort", () => controller.error(new Error("aborted")))
          },
        }),
        { headers: { "content-length": "1000" } }
      )
    const progress: DownloadProgress[] = []

    const result = await fetchToFile(ARCHIVE_URL, destination, {
      fetchImpl: stalling,
      timeoutMs: 50,
      onProgress: (p) => progress.push(p),
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.timedOut).toBe(true)
    expect(progress).toEqual([{ receivedBytes: 100, totalBytes: 1000, fraction: 0.1 }])
    expect((await readFile(destination)).byteLength).toBe(100)
  })

  it("re-arms the timeout after every chunk", async () => {
    const dir = await createTempDir()
    const trickling: FetchLike = async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          async start(controller) {
            for (let i = 0; i < 5; i++) {
              await new Promise((resolve) => setTimeout(resolve, 30))
              controller.enqueue(bytes(10, i))
            }
            controller.close()
          },
        })
      )

    const result = await fetchToFile(ARCHIVE_URL, join(dir, "a.zip"), {
      fetchImpl: trickling,
      timeoutMs: 100,
    })

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.bytes).toBe(50)
  })

  it("rejects with the filesystem error when the destination cannot be created", async () => {
    const dir = await createTempDir()
    const blocker = join(dir, "file")
    await writeFile(blocker, "not a directory")
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(streamOf([bytes(10, 1)])))

    await expect(
      fetchToFile(ARCHIVE_URL, join(blocker, "sub", "a.zip"), { fetchImpl })
    ).rejects.toMatchObject({ code: "ENOTDIR" })
  })
})
