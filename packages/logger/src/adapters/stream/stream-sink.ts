import type { LineSink } from "../../ports/line-sink"

/** The part of a writable stream a sink needs. */
export type LineWritable = {
  write(chunk: string): unknown
}

export class StreamSink implements LineSink {
  constructor(private readonly stream: LineWritable) {}

  writeLine(line: string): void {
    this.stream.write(`${line}\n`)
  }
}
