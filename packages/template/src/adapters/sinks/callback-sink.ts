import type { TextSink } from "../../ports/text-sink"

/**
 * Hands every non-empty fragment to a callback as soon as it is produced, e.g. to
 * push into a Node stream or an HTTP response.
 */
export class CallbackSink implements TextSink {
  constructor(private readonly onChunk: (text: string) => void) {}

  write(text: string): void {
    if (text) this.onChunk(text)
  }
}
