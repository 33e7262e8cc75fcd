import type { TextSink } from "../../ports/text-sink"

export type ValueWriter = (sink: TextSink, value: unknown) => void

/**
 * Writes literal 0, value 0, literal 1, value 1, ... and a trailing literal if there
 * is one. Iterates over the literals: a value without a preceding literal is
 * outside the documented shape and is not written.
 */
export function writeParts(
  sink: TextSink,
  values: readonly unknown[],
  strings: readonly string[],
  writeValue: ValueWriter,
): void {
  for (let i = 0; i < strings.length; i++) {
    sink.write(strings[i] ?? "")
    if (i < values.length) {
      writeValue(sink, values[i])
    }
  }
}
