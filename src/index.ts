export {
  TerminalProgressController,
  type ControllerState,
  type OperationResult,
  type SkipReason,
  type TerminalProgressOptions,
} from "./lib/terminal-progress.js"
export {
  ControllingTerminal,
  DEFAULT_TTY_PATH,
  parseSttySize,
  type ControllingTerminalOptions,
  type GeometryQuery,
  type TerminalDevice,
  type TerminalGeometry,
  type TerminalUnavailableReason,
} from "./lib/controlling-terminal.js"
export {
  installCleanupHandlers,
  signalExitCode,
  withTerminalProgress,
  type CleanupHandlerOptions,
  type ProgressSessionOptions,
} from "./lib/progress-session.js"
export {
  DEFAULT_BAR_OPTIONS,
  FIXED_OVERHEAD,
  computeBarWidth,
  computeFilledSegments,
  computePercentage,
  formatProgressLine,
  type ProgressBarOptions,
} from "./lib/progress-bar-format.js"
export {
  ProgressConfigError,
  loadProgressConfig,
  resolveBarOptions,
  type ProgressConfig,
} from "./lib/progress-config.js"
export { logger, createComponentLogger, type Logger } from "./lib/logger.js"
