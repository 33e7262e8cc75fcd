import type { TextSink } from "../../ports/text-sink"

const DEFAULT_BATCH_SIZE = 8 * 1024

/**
 * Accumulates written text in memory.
 *
 * Small writes are batched and joined once the batch reaches `batchSize`
 * characters; pass the expected output size to get a single join for most renders.
 */
export class StringSink implements TextSink {
  private chunks: string[] = []
  private batch: string[] = []
  private batchLength = 0
  private total = 0

  constructor(private readonly batchSize: number = DEFAULT_BATCH_SIZE) {}

  write(text: string): void {
    if (!text) return

    this.batch.push(text)
    this.batchLength += text.length
    this.total += text.length

    if (this.batchLength >= this.batchSize) this.flush()
  }

  get length(): number {
    return this.total
  }

  toString(): string {
    this.flush()
    if (this.chunks.length > 1) this.chunks = [this.chunks.join("")]

    return this.chunks[0] ?? ""
  }

  private flush(): void {
    if (!this.batch.length) return

    this.chunks.push(this.batch.join(""))
    this.batch = []
    this.batchLength = 0
  }
}
