import type { TextSink } from "../../ports/text-sink"
import { isTemplateLike, type TemplateLike } from "../../ports/template-like"

type NestedWriter = (sink: TextSink, nested: TemplateLike) => void

function writeWith(sink: TextSink, value: unknown, nested: NestedWriter): void {
  if (value === null) {
    sink.write("null")
    return
  }

  if (isTemplateLike(value)) {
    nested(sink, value)
    return
  }

  if (typeof value === "function") {
    if (value.length === 0) {
      writeWith(sink, value(), nested)
    } else {
      value(sink)
    }
    return
  }

  sink.write(String(value))
}

/**
 * Text path: nested templates contribute their (possibly cached) toString().
 */
export function renderValue(sink: TextSink, value: unknown): void {
  writeWith(sink, value, (s, nested) => s.write(nested.toString()))
}

/**
 * Streaming path: nested templates write straight into the same sink.
 */
export function streamValue(sink: TextSink, value: unknown): void {
  writeWith(sink, value, (s, nested) => {
    nested.writeTo(s)
  })
}
