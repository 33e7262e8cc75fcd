import type { TextSink } from "./text-sink"

/** Evaluated at render time; its result is rendered in its place. */
export type LazyValue = () => unknown

/** Called at render time with the active sink and writes its own text. */
export type WriterValue = (sink: TextSink) => void
