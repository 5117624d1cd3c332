import { describe, it, expect, vi } from "vitest"
import { readFile } from "fs/promises"
import { join } from "path"
import { createRowsPage, createTempDir, createTestDialogue, jsonResponse } from "@/test/factories"
import type { FetchLike } from "./downloader"
import { fetchFallback, fetchPartitionRows, toCanonicalSplit } from "./fallback"
import { isDirectory } from "./utils"

const noDelay = { backoff: [0, 0, 0] }

/**
 * In-process stand-in for the datasets-server `/rows` endpoint.
 */
function rowsServer(partitions: Record<string, Record<string, unknown>[]>): FetchLike {
  return async (input) => {
    const url = new URL(input)
    const rows = partitions[url.searchParams.get("split") ?? ""] ?? []
    const offset = Number(url.searchParams.get("offset"))
    const length = Number(url.searchParams.get("length"))
    return jsonResponse(createRowsPage(rows.slice(offset, offset + length), rows.length, offset))
  }
}

async function readRows(root: string, split: string): Promise<unknown> {
  return JSON.parse(await readFile(join(root, split, "dialogues_001.json"), "utf-8"))
}

describe("toCanonicalSplit", () => {
  it("remaps validation to dev", () => {
    expect(toCanonicalSplit("validation")).toBe("dev")
  })

  it("keeps train and test", () => {
    expect(toCanonicalSplit("train")).toBe("train")
    expect(toCanonicalSplit("test")).toBe("test")
  })

  it("rejects unknown partitions", () => {
    expect(toCanonicalSplit("dev")).toBeNull()
    expect(toCanonicalSplit("extra")).toBeNull()
  })
})

describe("fetchPartitionRows", () => {
  it("pages through the partition", async () => {
    const rows = [createTestDialogue(), createTestDialogue(), createTestDialogue()]
    const fetchImpl = vi.fn(rowsServer({ train: rows }))

    const result = await fetchPartitionRows("train", { fetchImpl, pageSize: 2, retry: noDelay })

    expect(result).toEqual(rows)
    expect(fetchImpl).toHaveBeenCalledTimes(2)
    const offsets = fetchImpl.mock.calls.map(([input]) => new URL(input).searchParams.get("offset"))
    expect(offsets).toEqual(["0", "2"])
  })

  it("orders rows by row index", async () => {
    const fetchImpl: FetchLike = async () =>
      jsonResponse({
        rows: [
          { row_idx: 1, row: { dialogue_id: "B" } },
          { row_idx: 0, row: { dialogue_id: "A" } },
        ],
        num_rows_total: 2,
      })

    const result = await fetchPartitionRows("test", { fetchImpl, retry: noDelay })

    expect(result).toEqual([{ dialogue_id: "A" }, { dialogue_id: "B" }])
  })

  it("sends the configured dataset coordinates and token", async () => {
    const fetchImpl = vi.fn(rowsServer({}))

    await fetchPartitionRows("validation", {
      fetchImpl,
      endpoint: "https://rows.example.test",
      dataset: "org/dialogues",
      config: "v1",
      token: "test-token",
      retry: noDelay,
    })

    const [input, init] = fetchImpl.mock.calls[0] ?? []
    expect(input).toBe(
      "https://rows.example.test/rows?dataset=org%2Fdialogues&config=v1&split=validation&offset=0&length=100"
    )
    expect(init?.headers).toEqual({ Authorization: "Bearer test-token" })
  })

  it("retries transient failures", async () => {
    const rows = [createTestDialogue()]
    const server = rowsServer({ train: rows })
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockImplementation(server)

    const result = await fetchPartitionRows("train", { fetchImpl, retry: noDelay })

    expect(result).toEqual(rows)
    expect(fetchImpl).toHaveBeenCalledTimes(2)
  })
})

describe("fetchFallback", () => {
  it("writes each partition under its canonical split", async () => {
    const root = await createTempDir()
    const partitions = {
      train: [createTestDialogue(), createTestDialogue(), createTestDialogue()],
      validation: [createTestDialogue()],
      test: [createTestDialogue(), createTestDialogue()],
    }

    const result = await fetchFallback(root, {
      fetchImpl: rowsServer(partitions),
      pageSize: 2,
      retry: noDelay,
    })

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.records).toEqual({ train: 3, dev: 1, test: 2 })
    expect(await readRows(root, "train")).toEqual(partitions.train)
    expect(await readRows(root, "dev")).toEqual(partitions.validation)
    expect(await readRows(root, "test")).toEqual(partitions.test)
    expect(isDirectory(join(root, "validation"))).toBe(false)
  })

  it("fails without retrying a client error", async () => {
    const root = await createTempDir()
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("missing", { status: 404 }))

    const result = await fetchFallback(root, { fetchImpl, retry: noDelay })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(fetchImpl).toHaveBeenCalledTimes(1)
    expect(result.error.code).toBe("FALLBACK_FAILED")
    expect(result.error.split).toBe("train")
    expect(result.error.message).toBe(
      "Fallback retrieval of train failed: datasets-server 404 for train at offset 0"
    )
    expect(isDirectory(join(root, "train"))).toBe(false)
  })

  it("fails on an unexpected payload", async () => {
    const root = await createTempDir()

    const result = await fetchFallback(root, {
      fetchImpl: async () => jsonResponse({ error: "gone" }),
      retry: noDelay,
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message.startsWith("Fallback retrieval of train failed: Unexpected rows payload for train:")).toBe(true)
  })

  it("reports the partition that failed", async () => {
    const root = await createTempDir()
    const server = rowsServer({ train: [createTestDialogue()] })
    const fetchImpl: FetchLike = async (input, init) =>
      new URL(input).searchParams.get("split") === "validation"
        ? new Response("denied", { status: 403 })
        : server(input, init)

    const result = await fetchFallback(root, { fetchImpl, retry: noDelay })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.split).toBe("validation")
    expect(isDirectory(join(root, "train"))).toBe(true)
  })
})
