import { Severity } from "../../ports/severity"
import { UnknownSeverityError } from "../errors"
import { VerbosityGate } from "../verbosity-gate"

describe("VerbosityGate", () => {
  it("defaults to INFO", () => {
    const gate = new VerbosityGate()

    expect(gate.currentThreshold()).toBe(Severity.Info)
    expect(gate.isEnabled("DEBUG")).toBe(false)
    expect(gate.isEnabled("INFO")).toBe(true)
  })

  it("accepts a threshold by name", () => {
    const gate = new VerbosityGate()

    gate.setThreshold("WARNING")

    expect(gate.isEnabled(Severity.Info)).toBe(false)
    expect(gate.isEnabled(Severity.Warning)).toBe(true)
    expect(gate.isEnabled(Severity.Error)).toBe(true)
    expect(gate.currentThreshold()).toBe(30)
  })

  it("accepts aliases and any integer", () => {
    const gate = new VerbosityGate("fatal")
    expect(gate.currentThreshold()).toBe(50)

    gate.setThreshold(25)

    expect(gate.currentThreshold()).toBe(25)
    expect(gate.isEnabled("INFO")).toBe(false)
    expect(gate.isEnabled("warn")).toBe(true)
    expect(gate.isEnabled(26)).toBe(true)
  })

  it("rejects unknown names and keeps the previous threshold", () => {
    const gate = new VerbosityGate("ERROR")

    expect(() => gate.setThreshold("BOGUS")).toThrow(UnknownSeverityError)
    expect(() => gate.setThreshold(2.5)).toThrow(UnknownSeverityError)
    expect(gate.currentThreshold()).toBe(Severity.Error)
  })

  it("instances do not share state", () => {
    const a = new VerbosityGate()
    const b = new VerbosityGate()

    a.setThreshold("CRITICAL")

    expect(b.currentThreshold()).toBe(Severity.Info)
  })
})
