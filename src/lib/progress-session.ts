/**
 * Scoped progress bar sessions.
 *
 * Binds the init/deinit pair to a block of work so the scroll region is always
 * released: when the work finishes, when it throws, and when the process is
 * interrupted with SIGINT or SIGTERM.
 */

import { constants } from "node:os"
import { createComponentLogger } from "./logger.js"
import {
  TerminalProgressController,
  type TerminalProgressOptions,
} from "./terminal-progress.js"

const log = createComponentLogger("progress-session")

const CLEANUP_SIGNALS = ["SIGINT", "SIGTERM"] as const
export type CleanupSignal = (typeof CLEANUP_SIGNALS)[number]

/** Anything that delivers process signals; the process itself by default */
export interface SignalSource {
  on(signal: CleanupSignal, listener: () => void): unknown
  off(signal: CleanupSignal, listener: () => void): unknown
}

export interface CleanupHandlerOptions {
  /** Called after teardown when a signal arrives (default: process.exit) */
  exit?: (code: number) => void
  /** Where to listen for SIGINT/SIGTERM (default: process) */
  signals?: SignalSource
}

export interface ProgressSessionOptions extends TerminalProgressOptions, CleanupHandlerOptions {}

/**
 * Exit status a shell reports for a process killed by the signal.
 */
export function signalExitCode(signal: CleanupSignal): number {
  return 128 + constants.signals[signal]
}

/**
 * Tear the controller down on SIGINT/SIGTERM, then exit with the conventional status.
 * Returns a function that removes the handlers again.
 */
export function installCleanupHandlers(
  controller: TerminalProgressController,
  options: CleanupHandlerOptions = {}
): () => void {
  const exit = options.exit ?? ((code: number) => process.exit(code))
  const signals: SignalSource = options.signals ?? process

  const handlers = CLEANUP_SIGNALS.map((signal) => {
    const handler = () => {
      log.trace({ signal }, "Received signal, releasing progress bar")
      controller.deinit()
      uninstall()
      exit(signalExitCode(signal))
    }
    return { signal, handler }
  })

  function uninstall(): void {
    for (const { signal, handler } of handlers) {
      signals.off(signal, handler)
    }
  }

  for (const { signal, handler } of handlers) {
    signals.on(signal, handler)
  }

  return uninstall
}

/**
 * Run work with an initialized progress bar and always tear it down afterwards.
 *
 * @example
 * ```typescript
 * await withTerminalProgress(async (progress) => {
 *   for (let i = 1; i <= files.length; i++) {
 *     await processFile(files[i - 1])
 *     progress.render(i, files.length)
 *   }
 * })
 * ```
 */
export async function withTerminalProgress<T>(
  work: (progress: TerminalProgressController) => Promise<T> | T,
  options: ProgressSessionOptions = {}
): Promise<T> {
  const controller = new TerminalProgressController(options)
  controller.init()
  const uninstall = installCleanupHandlers(controller, options)

  try {
    return await work(controller)
  } finally {
    uninstall()
    controller.deinit()
  }
}
