/**
 * Receives rendered text fragment by fragment.
 *
 * A sink that fails throws from write(); the error reaches the caller of
 * TemplateValue.writeTo() unchanged.
 */
export interface TextSink {
  write(text: string): void
}
