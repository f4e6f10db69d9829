import { FakeClock } from "@prefixlog/clock"
import { BaseError } from "@prefixlog/errors"
import { UnknownSeverityError } from "../../../core/errors"
import { parsePrefix } from "../../../core/prefix-parser"
import { VerbosityGate } from "../../../core/verbosity-gate"
import type { LoggerOptions } from "../../../ports/logger-options"
import type { SeverityLike } from "../../../ports/severity"
import { MemorySink } from "../../memory/memory-sink"
import { PrefixLogger } from "../prefix-logger"

describe("PrefixLogger behavior", () => {
  const HERE = { file: "app.ts", line: 3 }

  function makeLogger(level: SeverityLike = "DEBUG", opts: Partial<LoggerOptions> = {}) {
    const sink = new MemorySink()
    const gate = new VerbosityGate(level)
    const exit = vi.fn()
    const logger = new PrefixLogger(
      {
        sink,
        gate,
        exit,
        pid: 4242,
        clock: new FakeClock(1_727_216_355_123_456),
      },
      { timeZone: "utc", ...opts },
    )

    return { logger, sink, gate, exit }
  }

  it("writes the full line for a located record", () => {
    const { logger, sink } = makeLogger()

    logger.at(HERE).info("hello %s", "world")

    expect(sink.read()).toEqual(["I0924 22:19:15.123456 4242 app.ts:3] hello world"])
  })

  it("writes a message without arguments verbatim", () => {
    const { logger, sink } = makeLogger()
    const located = logger.at(HERE)

    located.info("100%%")
    located.info("%d%%", 100)

    expect(sink.read()).toEqual([
      "I0924 22:19:15.123456 4242 app.ts:3] 100%%",
      "I0924 22:19:15.123456 4242 app.ts:3] 100%",
    ])
  })

  it("writes nothing and formats nothing below the threshold", () => {
    const { logger, sink } = makeLogger("ERROR")
    const thunk = vi.fn(() => "expensive")
    const toString = vi.fn(() => "rendered")

    logger.debug(thunk)
    logger.info("value %s", { toString })
    logger.warning("value %s", { toString })
    logger.warn(thunk)

    expect(sink.read()).toEqual([])
    expect(thunk).not.toHaveBeenCalled()
    expect(toString).not.toHaveBeenCalled()
  })

  it("formats arguments once the record passes the gate", () => {
    const { logger, sink } = makeLogger("ERROR")
    const toString = vi.fn(() => "rendered")

    logger.at(HERE).error("value %s", { toString })

    expect(toString).toHaveBeenCalledTimes(1)
    expect(sink.read()).toEqual(["E0924 22:19:15.123456 4242 app.ts:3] value rendered"])
  })

  it("log() accepts names, aliases and integer ranks", () => {
    const { logger, sink } = makeLogger(15)
    const located = logger.at(HERE)

    located.log("fatal", "a")
    located.log(35, "b")
    located.log(10, "suppressed")

    expect(sink.read().map((l) => l.slice(0, 1))).toEqual(["C", "W"])
  })

  it("log() rejects unknown severities", () => {
    const { logger } = makeLogger()

    expect(() => logger.log("verbose", "x")).toThrow(UnknownSeverityError)
  })

  it("exception() appends the error chain", () => {
    const { logger, sink } = makeLogger()
    const err = new BaseError("disk full", {
      code: "write_failed",
      cause: new Error("ENOSPC"),
    })

    logger.at(HERE).exception(err, "flush %d failed", 7)

    expect(sink.read()).toEqual([
      "E0924 22:19:15.123456 4242 app.ts:3] flush 7 failed: BaseError(write_failed): disk full <- Error(unknown): ENOSPC",
    ])
  })

  it("setLevel() changes the shared gate and records the change", () => {
    const { logger, sink, gate } = makeLogger("ERROR")

    logger.at(HERE).setLevel("debug")

    expect(gate.currentThreshold()).toBe(10)
    expect(logger.isEnabledFor("DEBUG")).toBe(true)
    expect(sink.read()).toEqual(["D0924 22:19:15.123456 4242 app.ts:3] Log level set to debug"])
  })

  it("captures the caller's file when no location is given", () => {
    const { logger, sink } = makeLogger()

    logger.info("captured")

    expect(parsePrefix(sink.read()[0] ?? "")?.file).toBe("prefix-logger.behavior.test.ts")
  })

  it("anchoredTo() attributes records to the wrapper's caller", () => {
    const { logger, sink } = makeLogger()

    function report(message: string) {
      logger.anchoredTo(report).info(message)
    }

    // both calls on one line so their locations can be compared
    const calls = [() => report("via wrapper"), () => logger.info("direct")]
    for (const call of calls) call()

    const [viaWrapper, direct] = sink.read().map((l) => parsePrefix(l))

    expect(viaWrapper?.file).toBe("prefix-logger.behavior.test.ts")
    expect(viaWrapper?.line).toBe(direct?.line)
  })

  describe("fatal policy", () => {
    it("exits with status 1 after writing a CRITICAL record", () => {
      const { logger, sink, exit } = makeLogger("DEBUG", { fatalPolicy: "exit" })

      logger.at(HERE).fatal("going down")

      expect(sink.read()).toEqual(["C0924 22:19:15.123456 4242 app.ts:3] going down"])
      expect(exit).toHaveBeenCalledTimes(1)
      expect(exit).toHaveBeenCalledWith(1)
    })

    it("applies to critical() and log() at CRITICAL", () => {
      const { logger, exit } = makeLogger("DEBUG", { fatalPolicy: "exit" })

      logger.critical("a")
      logger.log("CRITICAL", "b")

      expect(exit).toHaveBeenCalledTimes(2)
    })

    it("does not exit for lower severities, emit(), or suppressed records", () => {
      const { logger, exit, gate } = makeLogger("DEBUG", { fatalPolicy: "exit" })

      logger.error("not fatal")
      logger.emit("CRITICAL", "from emit", HERE)
      gate.setThreshold(60)
      logger.fatal("suppressed")

      expect(exit).not.toHaveBeenCalled()
    })

    it("only logs under the default policy", () => {
      const { logger, sink, exit } = makeLogger()

      logger.fatal("still running")

      expect(sink.read()).toHaveLength(1)
      expect(exit).not.toHaveBeenCalled()
    })
  })

  it("emit() writes the body verbatim, subject to the gate", () => {
    const { logger, sink } = makeLogger("WARNING")

    logger.emit("INFO", "hidden", HERE)
    logger.emit("ERROR", "100%% %s", HERE)

    expect(sink.read()).toEqual(["E0924 22:19:15.123456 4242 app.ts:3] 100%% %s"])
  })

  it("views share the sink and gate of their parent", () => {
    const { logger, sink, gate } = makeLogger("INFO")
    const view = logger.at(HERE)

    gate.setThreshold("ERROR")
    view.info("hidden")
    view.error("shown")

    expect(sink.read()).toHaveLength(1)
  })
})
