import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { pino } from "pino"

// Store original env values
const originalNodeEnv = process.env.NODE_ENV
const originalLogLevel = process.env.LOG_LEVEL

describe("logger", () => {
  beforeEach(() => {
    vi.resetModules()
    delete process.env.LOG_LEVEL
  })

  afterEach(() => {
    process.env.NODE_ENV = originalNodeEnv
    vi.restoreAllMocks()
    if (originalLogLevel) {
      process.env.LOG_LEVEL = originalLogLevel
    } else {
      delete process.env.LOG_LEVEL
    }
    vi.resetModules()
  })

  describe("logger configuration", () => {
    it("uses debug level in development by default", async () => {
      process.env.NODE_ENV = "development"
      const { logger } = await import("./logger.js")
      expect(logger.level).toBe("debug")
    })

    it("uses info level in production by default", async () => {
      process.env.NODE_ENV = "production"
      const { logger } = await import("./logger.js")
      expect(logger.level).toBe("info")
    })

    it("keeps trace output off at the default levels", async () => {
      process.env.NODE_ENV = "development"
      const development = await import("./logger.js")
      expect(development.logger.isLevelEnabled("trace")).toBe(false)

      vi.resetModules()
      process.env.NODE_ENV = "production"
      const production = await import("./logger.js")
      expect(production.logger.isLevelEnabled("trace")).toBe(false)
    })

    it("writes production output to stderr", async () => {
      process.env.NODE_ENV = "production"
      const destination = vi.spyOn(pino, "destination")
      await import("./logger.js")
      expect(destination).toHaveBeenCalledWith(2)
    })

    it("respects LOG_LEVEL environment variable", async () => {
      process.env.LOG_LEVEL = "warn"
      const { logger } = await import("./logger.js")
      expect(logger.level).toBe("warn")
    })

    it("includes service name and environment in base attributes", async () => {
      process.env.NODE_ENV = "test"
      const { logger } = await import("./logger.js")
      const bindings = logger.bindings()
      expect(bindings.service).toBe("pinned-progress")
      expect(bindings.env).toBe("test")
    })
  })

  describe("createComponentLogger", () => {
    it("tags the child logger with its component", async () => {
      const { createComponentLogger } = await import("./logger.js")
      const componentLogger = createComponentLogger("terminal-progress")

      const bindings = componentLogger.bindings()
      expect(bindings.component).toBe("terminal-progress")
      expect(bindings.service).toBe("pinned-progress")
    })
  })
})
