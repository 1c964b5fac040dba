/**
 * Environment configuration for the progress bar.
 *
 * PROGRESS_TTY         device node to draw on (default /dev/tty)
 * PROGRESS_FILL_CHAR   character for completed segments (default "#")
 * PROGRESS_EMPTY_CHAR  character for remaining segments (default ".")
 */

import { z } from "zod"
import { DEFAULT_TTY_PATH } from "./controlling-terminal.js"
import { DEFAULT_BAR_OPTIONS, type ProgressBarOptions } from "./progress-bar-format.js"

// One UTF-16 code unit; the bar is sized by string length
export const BarCharSchema = z.string().length(1, "must be exactly one character")

export const ProgressConfigSchema = z.object({
  PROGRESS_TTY: z.string().min(1).default(DEFAULT_TTY_PATH),
  PROGRESS_FILL_CHAR: BarCharSchema.default(DEFAULT_BAR_OPTIONS.fillChar),
  PROGRESS_EMPTY_CHAR: BarCharSchema.default(DEFAULT_BAR_OPTIONS.emptyChar),
})

export interface ProgressConfig extends ProgressBarOptions {
  ttyPath: string
}

export class ProgressConfigError extends Error {
  constructor(public readonly fields: string[]) {
    super(`Invalid progress configuration: ${fields.join("; ")}`)
    this.name = "ProgressConfigError"
  }
}

const BarOptionsSchema = z.object({
  fillChar: BarCharSchema.default(DEFAULT_BAR_OPTIONS.fillChar),
  emptyChar: BarCharSchema.default(DEFAULT_BAR_OPTIONS.emptyChar),
})

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`)
}

/**
 * Fill in and validate bar characters passed in code.
 * Throws ProgressConfigError for anything but a single character.
 */
export function resolveBarOptions(options: Partial<ProgressBarOptions> = {}): ProgressBarOptions {
  const result = BarOptionsSchema.safeParse({
    fillChar: options.fillChar,
    emptyChar: options.emptyChar,
  })
  if (!result.success) throw new ProgressConfigError(issuesOf(result.error))
  return result.data
}

/**
 * Read progress bar settings from the environment.
 * Empty variables fall back to their defaults.
 */
export function loadProgressConfig(env: NodeJS.ProcessEnv = process.env): ProgressConfig {
  const result = ProgressConfigSchema.safeParse({
    PROGRESS_TTY: env.PROGRESS_TTY || undefined,
    PROGRESS_FILL_CHAR: env.PROGRESS_FILL_CHAR || undefined,
    PROGRESS_EMPTY_CHAR: env.PROGRESS_EMPTY_CHAR || undefined,
  })

  if (!result.success) {
    throw new ProgressConfigError(issuesOf(result.error))
  }

  return {
    ttyPath: result.data.PROGRESS_TTY,
    fillChar: result.data.PROGRESS_FILL_CHAR,
    emptyChar: result.data.PROGRESS_EMPTY_CHAR,
  }
}
