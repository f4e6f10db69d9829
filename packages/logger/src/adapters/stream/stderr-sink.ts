import pino from "pino"
import type { LineSink } from "../../ports/line-sink"
import { StreamSink } from "./stream-sink"

/**
 * Sink on file descriptor 2 through pino's synchronous destination
 * (sonic-boom), so every line is flushed before the call returns and a
 * process exit right after a FATAL record does not lose it.
 */
export function createStderrSink(): LineSink {
  return new StreamSink(pino.destination({ dest: 2, sync: true }))
}
