/**
 * Progress Bar Formatting
 *
 * Pure helpers that build the escape sequences and the bar line painted on the
 * reserved bottom row. Nothing here touches the terminal.
 */

// VT100 escape codes for cursor/screen control
const ESC = "\x1b"
const CSI = `${ESC}[`
export const SAVE_CURSOR = `${ESC}7`
export const RESTORE_CURSOR = `${ESC}8`
export const CLEAR_TO_END_OF_LINE = `${CSI}0K`
export const CURSOR_UP_ONE = `${CSI}1A`

/** Columns taken by the brackets and the right-aligned "100%" field */
export const FIXED_OVERHEAD = 6
const PERCENT_FIELD_WIDTH = 3

export interface ProgressBarOptions {
  /** Character for completed segments (default "#") */
  fillChar: string
  /** Character for remaining segments (default ".") */
  emptyChar: string
}

export const DEFAULT_BAR_OPTIONS: ProgressBarOptions = {
  fillChar: "#",
  emptyChar: ".",
}

export function moveCursor(row: number, col: number): string {
  return `${CSI}${row};${col}H`
}

export function setScrollRegion(top: number, bottom: number): string {
  return `${CSI}${top};${bottom}r`
}

function toWhole(value: number): number {
  return Number.isFinite(value) ? Math.floor(value) : 0
}

/**
 * Clamp current into [0, total]. A total of zero or less means nothing to count.
 * An infinite current clamps to the nearer end; NaN counts as 0.
 */
function normalize(current: number, total: number): { current: number; total: number } {
  const wholeTotal = toWhole(total)
  if (wholeTotal <= 0) return { current: 0, total: 0 }
  const wholeCurrent = Number.isNaN(current) ? 0 : Math.floor(current)
  return { current: Math.min(Math.max(wholeCurrent, 0), wholeTotal), total: wholeTotal }
}

/**
 * Integer percentage of current over total, floored and kept within 0..100.
 * Returns 0 when total is not positive.
 */
export function computePercentage(current: number, total: number): number {
  const value = normalize(current, total)
  if (value.total === 0) return 0
  return Math.floor((value.current * 100) / value.total)
}

/**
 * Bar width left after the fixed overhead; 0 when the terminal is too narrow.
 */
export function computeBarWidth(cols: number): number {
  return Math.max(0, toWhole(cols) - FIXED_OVERHEAD)
}

export function computeFilledSegments(barWidth: number, current: number, total: number): number {
  const value = normalize(current, total)
  if (value.total === 0 || !(barWidth > 0)) return 0
  return Math.min(barWidth, Math.floor((barWidth * value.current) / value.total))
}

/**
 * Compose the visible bar line, e.g. "[#####.....] 50%".
 */
export function formatProgressLine(
  barWidth: number,
  current: number,
  total: number,
  options: ProgressBarOptions = DEFAULT_BAR_OPTIONS
): string {
  const width = Math.max(0, toWhole(barWidth))
  const filled = computeFilledSegments(width, current, total)
  const percent = String(computePercentage(current, total)).padStart(PERCENT_FIELD_WIDTH, " ")
  return `[${options.fillChar.repeat(filled)}${options.emptyChar.repeat(width - filled)}]${percent}%`
}
