import { Writable } from "node:stream"
import { StreamSink } from "../stream-sink"

describe("StreamSink behavior", () => {
  function makeChunkDestination() {
    const chunks: string[] = []

    const destination = new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(chunk.toString("utf8"))
        callback()
      },
    })

    return { chunks, destination }
  }

  it("writes each line with its newline in a single write", () => {
    const { chunks, destination } = makeChunkDestination()
    const sink = new StreamSink(destination)

    sink.writeLine("I0924 22:19:15.123456 1 a.ts:1] first")
    sink.writeLine("E0924 22:19:15.123457 1 a.ts:2] second")

    expect(chunks).toEqual([
      "I0924 22:19:15.123456 1 a.ts:1] first\n",
      "E0924 22:19:15.123457 1 a.ts:2] second\n",
    ])
  })

  it("accepts any object with a write method", () => {
    const write = vi.fn()
    const sink = new StreamSink({ write })

    sink.writeLine("x")

    expect(write).toHaveBeenCalledTimes(1)
    expect(write).toHaveBeenCalledWith("x\n")
  })
})
