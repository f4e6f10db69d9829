import type { LineSink } from "../../ports/line-sink"

export class MemorySink implements LineSink {
  private readonly lines: string[] = []

  writeLine(line: string): void {
    this.lines.push(line)
  }

  read(): string[] {
    return [...this.lines]
  }

  clear(): void {
    this.lines.length = 0
  }
}
