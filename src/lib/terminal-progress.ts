/**
 * Terminal Progress Controller
 *
 * Pins a one-line progress bar to the bottom row of the controlling terminal
 * while the caller's output scrolls above it. A VT100 scroll region keeps
 * normal output out of the reserved row.
 *
 * Every operation re-queries the terminal size and silently does nothing when
 * no terminal is available, so scripts run unchanged under cron, CI, or with
 * redirected output. Drawing goes to the terminal device only; stdout is never
 * written.
 *
 * Usage:
 * ```typescript
 * const progress = new TerminalProgressController()
 * progress.init()
 * for (let i = 0; i <= total; i++) {
 *   doWork(i)
 *   progress.render(i, total)
 * }
 * progress.deinit()
 * ```
 */

import {
  CLEAR_TO_END_OF_LINE,
  CURSOR_UP_ONE,
  RESTORE_CURSOR,
  SAVE_CURSOR,
  computeBarWidth,
  formatProgressLine,
  moveCursor,
  setScrollRegion,
  type ProgressBarOptions,
} from "./progress-bar-format.js"
import {
  ControllingTerminal,
  type TerminalDevice,
  type TerminalUnavailableReason,
} from "./controlling-terminal.js"
import { createComponentLogger } from "./logger.js"
import { resolveBarOptions } from "./progress-config.js"

const log = createComponentLogger("terminal-progress")

export type ControllerState = "uninitialized" | "active" | "torn-down"

export type SkipReason =
  | TerminalUnavailableReason
  | "already-active"
  | "not-active"
  | "too-narrow"
  | "too-short"
  | "write-failed"

export type OperationResult = { performed: true } | { performed: false; reason: SkipReason }

export interface TerminalProgressOptions extends Partial<ProgressBarOptions> {
  /** Terminal to draw on (default: the controlling terminal at /dev/tty) */
  device?: TerminalDevice
  /** Stream receiving debug() messages (default: process.stderr) */
  errorOutput?: NodeJS.WritableStream
}

const PERFORMED: OperationResult = { performed: true }

function skipped(reason: SkipReason): OperationResult {
  return { performed: false, reason }
}

/**
 * Owns the scroll-region reservation and the bottom progress row of one terminal.
 */
export class TerminalProgressController {
  private readonly device: TerminalDevice
  private readonly errorOutput: NodeJS.WritableStream
  private readonly barOptions: ProgressBarOptions
  private state: ControllerState = "uninitialized"

  constructor(options: TerminalProgressOptions = {}) {
    this.device = options.device ?? new ControllingTerminal()
    this.errorOutput = options.errorOutput ?? process.stderr
    this.barOptions = resolveBarOptions(options)
  }

  get currentState(): ControllerState {
    return this.state
  }

  /**
   * Reserve the bottom row by shrinking the scroll region by one line.
   */
  init(): OperationResult {
    if (this.state === "active") return this.skip("init", "already-active")

    const query = this.device.querySize()
    if (!query.ok) return this.skip("init", query.reason, query.detail)
    const { rows } = query.geometry
    // Reserving the bottom row needs at least one row left to scroll in
    if (rows < 2) return this.skip("init", "too-short")

    // The newline makes sure the cursor does not sit on the row being reserved
    const sequence =
      "\n" + SAVE_CURSOR + setScrollRegion(1, rows - 1) + RESTORE_CURSOR + CURSOR_UP_ONE
    if (!this.device.write(sequence)) return this.skip("init", "write-failed")

    this.state = "active"
    log.trace({ rows, cols: query.geometry.cols }, "Progress bar initialized")
    return PERFORMED
  }

  /**
   * Repaint the reserved row with the bar for current/total.
   */
  render(current: number, total: number): OperationResult {
    if (this.state !== "active") return this.skip("render", "not-active")

    const query = this.device.querySize()
    if (!query.ok) return this.skip("render", query.reason, query.detail)
    const { rows, cols } = query.geometry

    const barWidth = computeBarWidth(cols)
    const line = barWidth > 0 ? formatProgressLine(barWidth, current, total, this.barOptions) : ""
    const sequence =
      SAVE_CURSOR + moveCursor(rows, 1) + CLEAR_TO_END_OF_LINE + line + RESTORE_CURSOR
    if (!this.device.write(sequence)) return this.skip("render", "write-failed")

    return barWidth > 0 ? PERFORMED : this.skip("render", "too-narrow")
  }

  /**
   * Give the bottom row back to the scroll region and clear the bar.
   */
  deinit(): OperationResult {
    if (this.state !== "active") return this.skip("deinit", "not-active")

    const query = this.device.querySize()
    if (!query.ok) return this.skip("deinit", query.reason, query.detail)
    const { rows } = query.geometry

    const sequence =
      setScrollRegion(1, rows) + moveCursor(rows, 1) + CLEAR_TO_END_OF_LINE + "\n"
    if (!this.device.write(sequence)) return this.skip("deinit", "write-failed")

    this.state = "torn-down"
    log.trace({ rows }, "Progress bar torn down")
    return PERFORMED
  }

  /**
   * Print a diagnostic line to stderr so it scrolls above the bar.
   */
  debug(message: string): void {
    this.errorOutput.write(`${message}\n`)
  }

  private skip(operation: string, reason: SkipReason, detail?: string): OperationResult {
    log.trace({ operation, reason, detail }, "Progress bar operation skipped")
    return skipped(reason)
  }
}
