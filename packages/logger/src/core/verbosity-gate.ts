import { Severity, type SeverityLike } from "../ports/severity"
import { resolveSeverity } from "./level-registry"

/**
 * Holds the minimum severity that gets written.
 *
 * The threshold is a single number replaced in one assignment, so readers
 * always see either the old or the new value. Each logger is handed a gate;
 * several loggers may share one.
 */
export class VerbosityGate {
  private threshold: number

  constructor(initial: SeverityLike = Severity.Info) {
    this.threshold = resolveSeverity(initial)
  }

  /**
   * Names are validated; any integer is accepted so callers can use ranks
   * between the named levels.
   *
   * @throws UnknownSeverityError
   */
  setThreshold(level: SeverityLike): void {
    this.threshold = resolveSeverity(level)
  }

  isEnabled(severity: SeverityLike): boolean {
    return resolveSeverity(severity) >= this.threshold
  }

  currentThreshold(): number {
    return this.threshold
  }
}
