import { BaseError } from "@prism/errors"
import type { LogLevelName } from "../../../ports/log-level"
import { ConsoleLogger, createConsoleLogger } from "../console-logger"

describe("ConsoleLogger behavior", () => {
  function makeLineCaptureConsole() {
    const lines: string[] = []
    const calls: { method: LogLevelName; line: string }[] = []

    const capture = (method: LogLevelName) => (line: unknown) => {
      const text = String(line)
      lines.push(text)
      calls.push({ method, line: text })
    }

    const fakeConsole = {
      trace: capture("trace"),
      debug: capture("debug"),
      info: capture("info"),
      warn: capture("warn"),
      error: capture("error"),
    }

    return { lines, calls, fakeConsole }
  }

  it("emits parseable JSON when prettify is false", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole },
      { level: "trace", prettify: false },
      { registry: "pages" },
    )

    logger.debug("dispatching batch", { loader: "pages.byId", batchSize: 3 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "")

    expect(payload).toMatchObject({
      level: "debug",
      message: "dispatching batch",
      registry: "pages",
      loader: "pages.byId",
      batchSize: 3,
    })
    expect(typeof payload.timestamp).toBe("string")
  })

  it("defaults to the global console", () => {
    const spy = vi.spyOn(globalThis.console, "warn").mockImplementation(() => {})

    createConsoleLogger().warn("window failed")

    expect(spy).toHaveBeenCalledOnce()
    expect(JSON.parse(String(spy.mock.calls[0]?.[0]))).toMatchObject({
      level: "warn",
      message: "window failed",
    })
  })

  it("defaults to info level", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole })

    logger.debug("ignored")
    logger.info("included")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "").message).toBe("included")
  })

  it("routes fatal to console.error", () => {
    const { calls, fakeConsole } = makeLineCaptureConsole()

    new ConsoleLogger({ console: fakeConsole }, { level: "trace" }).fatal("boom")

    expect(calls.map((c) => c.method)).toEqual(["error"])
  })

  it("serializes Error values through serializeError", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()
    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.error("registry misuse", {
      err: new BaseError("registry already executed", {
        code: "registry_sealed",
        context: { registry: "pages" },
        isOperational: false,
      }),
    })
    logger.error("raw", { err: { status: 503 } })

    const first = JSON.parse(lines[0] ?? "")
    const second = JSON.parse(lines[1] ?? "")

    expect(first.err).toMatchObject({
      name: "BaseError",
      code: "registry_sealed",
      message: "registry already executed",
      context: { registry: "pages" },
      isOperational: false,
    })
    expect(typeof first.err.stack).toBe("string")
    expect(second.err).toEqual({ status: 503 })
  })

  it("keeps a null err as null", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    new ConsoleLogger({ console: fakeConsole }).error("null-error", { err: null })

    expect(JSON.parse(lines[0] ?? "").err).toBeNull()
  })

  it("renders bigint fields as strings", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    new ConsoleLogger({ console: fakeConsole }).info("loaded", { key: 12n })

    expect(JSON.parse(lines[0] ?? "").key).toBe("12")
  })

  it("falls back when the payload cannot be serialized", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()
    const circular: Record<string, unknown> = { a: 1 }
    circular.self = circular

    new ConsoleLogger({ console: fakeConsole }).info("circular", { circular })

    expect(JSON.parse(lines[0] ?? "")).toEqual({
      message: "Failed to stringify log payload",
    })
  })

  it("drops undefined metadata fields and reserved keys from meta", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    new ConsoleLogger({ console: fakeConsole }).info("hello", {
      a: undefined,
      b: 1,
      level: "fatal",
      message: "SHOULD_NOT_APPEAR",
    })

    const payload = JSON.parse(lines[0] ?? "")

    expect(payload.level).toBe("info")
    expect(payload.message).toBe("hello")
    expect(payload.b).toBe(1)
    expect(Object.hasOwn(payload, "a")).toBe(false)
  })

  describe("prettify", () => {
    it("emits one human-readable line", () => {
      const { lines, fakeConsole } = makeLineCaptureConsole()

      vi.useFakeTimers()
      vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))

      new ConsoleLogger({ console: fakeConsole }, { prettify: true }, { registry: "pages" }).warn(
        "window failed",
      )

      vi.useRealTimers()

      expect(lines).toEqual(['2024-01-15T10:30:00.000Z WARN window failed {"registry":"pages"}'])
    })

    it("omits the tail when there is no context", () => {
      const { lines, fakeConsole } = makeLineCaptureConsole()

      vi.useFakeTimers()
      vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))

      new ConsoleLogger({ console: fakeConsole }, { prettify: true }).info("ready")

      vi.useRealTimers()

      expect(lines).toEqual(["2024-01-15T10:30:00.000Z INFO ready"])
    })

    it("prints the error stack on indented lines after the entry", () => {
      const { lines, fakeConsole } = makeLineCaptureConsole()

      new ConsoleLogger({ console: fakeConsole }, { prettify: true }).error("failed", {
        err: new Error("boom"),
      })

      const [first, second] = (lines[0] ?? "").split("\n")

      expect(first).toContain('"message":"boom"')
      expect(first).not.toContain('"stack"')
      expect(second).toBe("  Error: boom")
    })
  })
})
