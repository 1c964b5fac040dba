/**
 * Controlling Terminal Access
 *
 * Talks to the process's controlling terminal device directly (default /dev/tty)
 * instead of the inherited standard streams, so stdout and stderr can be
 * redirected without affecting the progress display.
 *
 * Geometry is queried with `stty size` bound to the device on every call.
 */

import { spawnSync } from "node:child_process"
import fs from "node:fs"
import { createComponentLogger } from "./logger.js"

const log = createComponentLogger("controlling-terminal")

export const DEFAULT_TTY_PATH = "/dev/tty"
const DEFAULT_SIZE_COMMAND = "stty"
const SIZE_QUERY_TIMEOUT_MS = 1000

export interface TerminalGeometry {
  rows: number
  cols: number
}

export type TerminalUnavailableReason =
  | "no-device"
  | "permission-denied"
  | "not-a-tty"
  | "command-failed"
  | "unparsable-output"

export type GeometryQuery =
  | { ok: true; geometry: TerminalGeometry }
  | { ok: false; reason: TerminalUnavailableReason; detail?: string }

/**
 * The terminal the progress bar paints on.
 */
export interface TerminalDevice {
  /** Ask the device for its current size. Never throws. */
  querySize(): GeometryQuery
  /** Write raw bytes to the device. Returns false if the write failed. Never throws. */
  write(data: string): boolean
}

export interface ControllingTerminalOptions {
  /** Device node to open (default: /dev/tty) */
  path?: string
  /** Command printing "rows cols" for the terminal on its stdin (default: stty) */
  sizeCommand?: string
}

/**
 * Parse the "rows cols" output of `stty size`.
 */
export function parseSttySize(output: string): TerminalGeometry | null {
  const match = /^\s*(\d+)\s+(\d+)\s*$/.exec(output)
  if (!match) return null
  const rows = parseInt(match[1], 10)
  const cols = parseInt(match[2], 10)
  if (rows <= 0 || cols <= 0) return null
  return { rows, cols }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code
  }
  return undefined
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Map an error from opening the device to the reason the terminal is unusable.
 */
export function classifyOpenError(error: unknown): TerminalUnavailableReason {
  switch (errorCode(error)) {
    case "EACCES":
    case "EPERM":
      return "permission-denied"
    case "ENOTTY":
      return "not-a-tty"
    default:
      // ENXIO (no controlling terminal), ENOENT (no device node), and anything else
      return "no-device"
  }
}

export class ControllingTerminal implements TerminalDevice {
  private readonly path: string
  private readonly sizeCommand: string

  constructor(options: ControllingTerminalOptions = {}) {
    this.path = options.path ?? DEFAULT_TTY_PATH
    this.sizeCommand = options.sizeCommand ?? DEFAULT_SIZE_COMMAND
  }

  querySize(): GeometryQuery {
    let fd: number
    try {
      fd = fs.openSync(this.path, "r")
    } catch (error) {
      return { ok: false, reason: classifyOpenError(error), detail: messageOf(error) }
    }

    try {
      const result = spawnSync(this.sizeCommand, ["size"], {
        stdio: [fd, "pipe", "ignore"],
        encoding: "utf8",
        timeout: SIZE_QUERY_TIMEOUT_MS,
      })
      if (result.error) {
        return { ok: false, reason: "command-failed", detail: result.error.message }
      }
      if (result.status !== 0) {
        return {
          ok: false,
          reason: "not-a-tty",
          detail: `${this.sizeCommand} exited with ${result.status}`,
        }
      }
      const geometry = parseSttySize(result.stdout)
      if (!geometry) {
        return { ok: false, reason: "unparsable-output", detail: result.stdout.trim() }
      }
      return { ok: true, geometry }
    } finally {
      this.close(fd)
    }
  }

  write(data: string): boolean {
    let fd: number
    try {
      fd = fs.openSync(this.path, "w")
    } catch (error) {
      log.trace({ path: this.path, error: messageOf(error) }, "Could not open terminal for writing")
      return false
    }

    try {
      fs.writeSync(fd, data)
      return true
    } catch (error) {
      log.trace({ path: this.path, error: messageOf(error) }, "Write to terminal failed")
      return false
    } finally {
      this.close(fd)
    }
  }

  private close(fd: number): void {
    try {
      fs.closeSync(fd)
    } catch (error) {
      log.trace({ path: this.path, error: messageOf(error) }, "Closing terminal failed")
    }
  }
}
