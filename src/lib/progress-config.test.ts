import { describe, it, expect } from "vitest"
import { ProgressConfigError, loadProgressConfig, resolveBarOptions } from "./progress-config.js"

describe("loadProgressConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadProgressConfig({})).toEqual({
      ttyPath: "/dev/tty",
      fillChar: "#",
      emptyChar: ".",
    })
  })

  it("reads overrides from the environment", () => {
    expect(
      loadProgressConfig({
        PROGRESS_TTY: "/dev/pts/4",
        PROGRESS_FILL_CHAR: "=",
        PROGRESS_EMPTY_CHAR: " ",
      })
    ).toEqual({
      ttyPath: "/dev/pts/4",
      fillChar: "=",
      emptyChar: " ",
    })
  })

  it("treats empty variables as unset", () => {
    expect(loadProgressConfig({ PROGRESS_TTY: "", PROGRESS_FILL_CHAR: "" })).toEqual({
      ttyPath: "/dev/tty",
      fillChar: "#",
      emptyChar: ".",
    })
  })

  it("rejects multi-character bar characters", () => {
    expect(() => loadProgressConfig({ PROGRESS_FILL_CHAR: "==" })).toThrow(ProgressConfigError)
    expect(() => loadProgressConfig({ PROGRESS_FILL_CHAR: "==" })).toThrow(
      "Invalid progress configuration: PROGRESS_FILL_CHAR must be exactly one character"
    )
  })

  it("lists every invalid field", () => {
    try {
      loadProgressConfig({ PROGRESS_FILL_CHAR: "ab", PROGRESS_EMPTY_CHAR: "cd" })
      expect.unreachable("should have thrown")
    } catch (error) {
      expect(error).toBeInstanceOf(ProgressConfigError)
      if (error instanceof ProgressConfigError) {
        expect(error.fields).toEqual([
          "PROGRESS_FILL_CHAR must be exactly one character",
          "PROGRESS_EMPTY_CHAR must be exactly one character",
        ])
      }
    }
  })
})

describe("resolveBarOptions", () => {
  it("fills in missing characters with the defaults", () => {
    expect(resolveBarOptions()).toEqual({ fillChar: "#", emptyChar: "." })
    expect(resolveBarOptions({ fillChar: "=" })).toEqual({ fillChar: "=", emptyChar: "." })
  })

  it("lists every character that is not exactly one long", () => {
    try {
      resolveBarOptions({ fillChar: "==", emptyChar: "" })
      expect.unreachable("should have thrown")
    } catch (error) {
      expect(error).toBeInstanceOf(ProgressConfigError)
      if (error instanceof ProgressConfigError) {
        expect(error.fields).toEqual([
          "fillChar must be exactly one character",
          "emptyChar must be exactly one character",
        ])
      }
    }
  })
})
