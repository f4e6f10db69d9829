/**
 * Destination for fully formatted lines.
 *
 * @remarks
 * Implementations must hand each line (with its trailing newline) to the
 * underlying destination in a single write, so lines from concurrent callers
 * never interleave.
 */
export interface LineSink {
  writeLine(line: string): void
}
