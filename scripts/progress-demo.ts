#!/usr/bin/env tsx
/**
 * Pinned progress bar demo
 *
 * Walks through a number of steps while log lines scroll above a progress bar
 * pinned to the bottom row of the terminal. With --binary, one random byte per
 * step is written to stdout to show that the bar never touches stdout.
 *
 * Usage:
 *   npm run demo -- --total 200 --delay 20
 *   npm run demo -- --binary > payload.bin
 *   npm run demo -- --fill = --empty " " --log-every 25
 */

import "dotenv/config"
import { Command, InvalidArgumentError } from "commander"
import { randomBytes } from "crypto"
import { ControllingTerminal } from "../src/lib/controlling-terminal.js"
import { logger } from "../src/lib/logger.js"
import { loadProgressConfig } from "../src/lib/progress-config.js"
import { withTerminalProgress, type ProgressSessionOptions } from "../src/lib/progress-session.js"

export interface DemoOptions {
  total: number
  delay: number
  fill?: string
  empty?: string
  binary: boolean
  logEvery: number
}

export interface DemoSummary {
  steps: number
  bytesWritten: number
}

export interface DemoEnvironment extends ProgressSessionOptions {
  /** Where --binary output goes (default: process.stdout) */
  stdout?: NodeJS.WritableStream
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

// Validate step counts
export function parsePositiveInt(value: string): number {
  const n = parseInt(value, 10)
  if (isNaN(n) || n <= 0 || !/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Must be a positive integer")
  }
  return n
}

// Validate delays
export function parseNonNegativeInt(value: string): number {
  const n = parseInt(value, 10)
  if (isNaN(n) || n < 0 || !/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Must be a non-negative integer")
  }
  return n
}

// Validate bar characters
export function parseBarChar(value: string): string {
  if (value.length !== 1) {
    throw new InvalidArgumentError("Must be exactly one character")
  }
  return value
}

export async function runDemo(
  options: DemoOptions,
  environment: DemoEnvironment = {}
): Promise<DemoSummary> {
  const config = loadProgressConfig()
  const stdout = environment.stdout ?? process.stdout
  let bytesWritten = 0

  await withTerminalProgress(
    async (progress) => {
      progress.render(0, options.total)

      for (let step = 1; step <= options.total; step++) {
        await delay(options.delay)

        if (options.binary) {
          stdout.write(randomBytes(1))
          bytesWritten++
        }

        progress.render(step, options.total)

        if (step % options.logEvery === 0) {
          progress.debug(`Finished step ${step}/${options.total}`)
        }
      }
    },
    {
      device: new ControllingTerminal({ path: config.ttyPath }),
      fillChar: options.fill ?? config.fillChar,
      emptyChar: options.empty ?? config.emptyChar,
      ...environment,
    }
  )

  logger.info({ steps: options.total, bytesWritten }, "Demo finished")
  return { steps: options.total, bytesWritten }
}

const program = new Command()
  .name("progress-demo")
  .description("Pin a progress bar to the bottom of the terminal while output scrolls above it")
  .option("-t, --total <steps>", "Number of steps (default: 100)", parsePositiveInt, 100)
  .option("-d, --delay <ms>", "Delay per step in milliseconds (default: 30)", parseNonNegativeInt, 30)
  .option("--fill <char>", "Character for completed segments", parseBarChar)
  .option("--empty <char>", "Character for remaining segments", parseBarChar)
  .option("--binary", "Write one random byte per step to stdout", false)
  .option("--log-every <steps>", "Print a log line every N steps (default: 10)", parsePositiveInt, 10)
  .action(async (options: DemoOptions) => {
    try {
      await runDemo(options)
    } catch (error) {
      logger.fatal({ error }, "Progress demo failed")
      process.exit(1)
    }
  })

// Only run if executed directly, not when imported for testing
const isMainModule = import.meta.url === `file://${process.argv[1]}`
if (isMainModule) {
  await program.parseAsync()
}
