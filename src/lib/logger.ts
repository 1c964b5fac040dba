import { pino } from "pino"

const isProduction = process.env.NODE_ENV === "production"

// Standard output belongs to the calling script, so every log line goes to stderr (fd 2)
const STDERR_FD = 2

/**
 * Structured logger for the progress library and its scripts.
 * In production, output JSON; in development, use pino-pretty for readable output.
 */
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || (isProduction ? "info" : "debug"),
    transport: isProduction
      ? undefined
      : {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
            destination: STDERR_FD,
          },
        },
    base: {
      service: "pinned-progress",
      env: process.env.NODE_ENV || "development",
    },
  },
  isProduction ? pino.destination(STDERR_FD) : undefined
)

/**
 * Create a child logger tagged with the component emitting it.
 */
export function createComponentLogger(component: string) {
  return logger.child({ component })
}

export type Logger = typeof logger
