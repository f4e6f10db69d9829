import { isAppError } from "@prefixlog/errors"
import { Severity, severityAliases, severityNames } from "../../ports/severity"
import { UnknownSeverityError } from "../errors"
import {
  canonicalName,
  levelChar,
  nameForLevelChar,
  rank,
  resolveSeverity,
} from "../level-registry"

describe("level registry", () => {
  describe("rank", () => {
    it("resolves canonical names to fixed ranks", () => {
      expect(severityNames.map((n) => rank(n))).toEqual([10, 20, 30, 40, 50])
    })

    it("resolves aliases", () => {
      expect(rank("WARN")).toBe(Severity.Warning)
      expect(rank("FATAL")).toBe(Severity.Critical)
    })

    it("is case-insensitive and ignores surrounding whitespace", () => {
      expect(rank("warning")).toBe(30)
      expect(rank("Warn")).toBe(30)
      expect(rank(" info ")).toBe(20)
    })

    it("throws UnknownSeverityError for unknown names", () => {
      expect(() => rank("BOGUS")).toThrow(UnknownSeverityError)
      expect(() => rank("")).toThrow(UnknownSeverityError)
    })

    it("carries the rejected input", () => {
      try {
        rank("BOGUS")
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(UnknownSeverityError)
        expect(isAppError(err)).toBe(true)
        expect(err).toMatchObject({
          code: "unknown_severity",
          message: 'unknown severity: "BOGUS"',
          context: { input: "BOGUS" },
        })
      }
    })
  })

  describe("canonicalName", () => {
    it("maps ranks back to canonical names", () => {
      expect(canonicalName(10)).toBe("DEBUG")
      expect(canonicalName(30)).toBe("WARNING")
      expect(canonicalName(50)).toBe("CRITICAL")
    })

    it("rejects ranks between or outside the canonical levels", () => {
      expect(() => canonicalName(35)).toThrow(UnknownSeverityError)
      expect(() => canonicalName(0)).toThrow("unknown severity: 0")
    })
  })

  it("round-trips every name and alias", () => {
    for (const name of [...severityNames, ...Object.keys(severityAliases)]) {
      expect(rank(canonicalName(rank(name)))).toBe(rank(name))
    }
  })

  it("orders canonical levels strictly increasing", () => {
    const ranks = severityNames.map((n) => rank(n))

    for (let i = 1; i < ranks.length; i++) {
      expect(ranks[i]).toBeGreaterThan(ranks[i - 1] ?? Number.NEGATIVE_INFINITY)
    }
  })

  describe("resolveSeverity", () => {
    it("passes integers through, including non-canonical ones", () => {
      expect(resolveSeverity(20)).toBe(20)
      expect(resolveSeverity(15)).toBe(15)
      expect(resolveSeverity(-3)).toBe(-3)
    })

    it("resolves names", () => {
      expect(resolveSeverity("fatal")).toBe(50)
    })

    it("rejects non-integer numbers", () => {
      expect(() => resolveSeverity(1.5)).toThrow(UnknownSeverityError)
      expect(() => resolveSeverity(Number.NaN)).toThrow(UnknownSeverityError)
    })
  })

  describe("levelChar", () => {
    it("uses the canonical name's first letter", () => {
      expect([10, 20, 30, 40, 50].map(levelChar).join("")).toBe("DIWEC")
    })

    it("uses the nearest canonical level below for other ranks", () => {
      expect(levelChar(35)).toBe("W")
      expect(levelChar(99)).toBe("C")
      expect(levelChar(5)).toBe("D")
    })

    it("maps characters back to names", () => {
      expect(nameForLevelChar("C")).toBe("CRITICAL")
      expect(nameForLevelChar("F")).toBeUndefined()
    })
  })
})
