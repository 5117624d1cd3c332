#!/usr/bin/env npx tsx
/**
 * MultiWOZ 2.2 acquisition CLI
 *
 * Fetches (or reuses) the dataset and prints a validation summary.
 *
 * Usage:
 *   npx tsx src/cli.ts [acquire|verify] [--data-dir <dir>] [--force] [--json]
 */

import { config } from "dotenv"
import { fileURLToPath } from "url"
import { loadConfig, toAcquireOptions } from "./lib/config"
import {
  acquireDataset,
  formatBytes,
  formatReport,
  resolveDatasetPaths,
  verify,
  type DownloadProgress,
} from "./lib/datasets"
import { toAppError } from "./lib/errors"
import { flushSentry, initSentry } from "./instrument"

export type CliCommand = "acquire" | "verify"

export interface CliArgs {
  command: CliCommand
  dataDir?: string
  force: boolean
  json: boolean
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: "acquire", force: false, json: false }

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === "acquire" || token === "verify") {
      args.command = token
    } else if (token === "--data-dir") {
      const value = argv[i + 1]
      if (!value || value.startsWith("--")) {
        throw new Error("--data-dir needs a directory")
      }
      args.dataDir = value
      i++
    } else if (token.startsWith("--data-dir=")) {
      args.dataDir = token.slice("--data-dir=".length)
    } else if (token === "--force") {
      args.force = true
    } else if (token === "--json") {
      args.json = true
    } else {
      throw new Error(`Unknown argument: ${token}`)
    }
  }

  return args
}

/**
 * Progress printer that emits a line every 10% (or every 5 MB when the
 * server sent no size).
 */
export function createProgressPrinter(write: (line: string) => void): (p: DownloadProgress) => void {
  let lastStep = -1
  return ({ receivedBytes, totalBytes, fraction }) => {
    if (fraction !== null && totalBytes !== null) {
      const step = Math.floor(fraction * 10)
      if (step === lastStep) return
      lastStep = step
      write(`  ${step * 10}% ${formatBytes(receivedBytes)} / ${formatBytes(totalBytes)}`)
      return
    }
    const step = Math.floor(receivedBytes / (5 * 1024 * 1024))
    if (step === lastStep) return
    lastStep = step
    write(`  ${formatBytes(receivedBytes)} received`)
  }
}

async function main(): Promise<number> {
  config({ path: [".env.local", ".env"] })

  const args = parseCliArgs(process.argv.slice(2))
  const settings = loadConfig()
  initSentry(settings.sentryDsn)

  const options = toAcquireOptions(settings, {
    ...(args.dataDir ? { dataDir: args.dataDir } : {}),
    force: args.force,
    download: { onProgress: createProgressPrinter((line) => process.stderr.write(`${line}\n`)) },
  })

  let root = resolveDatasetPaths(options).root
  let exitCode = 0

  if (args.command === "acquire") {
    const outcome = await acquireDataset(options)
    console.log(`Acquisition: ${outcome.kind}`)
    if (outcome.kind === "failed") {
      console.error(JSON.stringify(outcome.error.toJSON()))
      return 1
    }
    root = outcome.root
  }

  const report = await verify(root)
  if (args.json) {
    console.log(JSON.stringify(report, null, 2))
  } else {
    console.log("\n=== Dataset Summary ===")
    for (const line of formatReport(report)) {
      console.log(line)
    }
  }
  if (args.command === "verify" && !report.valid) {
    exitCode = 1
  }

  return exitCode
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main()
    .then(async (code) => {
      await flushSentry()
      process.exitCode = code
    })
    .catch(async (err: unknown) => {
      const error = toAppError(err)
      console.error(`Fatal: ${JSON.stringify(error.toJSON())}`)
      await flushSentry()
      process.exitCode = 1
    })
}
