import {
  getErrorMessage,
  silentLogger,
  toHarvestError,
  type HarvestError,
  type HarvestLogger,
  type NormalizedRecord,
  type RecordStore,
} from "./types.js"

export const DEFAULT_FLUSH_THRESHOLD = 50

export interface BatchWriterOptions {
  master: RecordStore
  target: RecordStore
  flushThreshold?: number
  logger?: HarvestLogger
}

export interface BatchWriterStats {
  masterInserted: number
  masterFailed: number
  targetInserted: number
  targetBatches: number
  targetDropped: number
}

/**
 * Master rows are written one at a time as records arrive; target rows are
 * buffered and written as one batch per flush. A failed master insert is
 * counted and skipped; a failed target batch drops every record in it.
 * Records can therefore end up in the master store only.
 */
export class BatchWriter {
  private buffer: NormalizedRecord[] = []
  private readonly flushThreshold: number
  private readonly logger: HarvestLogger
  private readonly failures: HarvestError[] = []
  private readonly counters: BatchWriterStats = {
    masterInserted: 0,
    masterFailed: 0,
    targetInserted: 0,
    targetBatches: 0,
    targetDropped: 0,
  }

  constructor(private readonly options: BatchWriterOptions) {
    this.flushThreshold = options.flushThreshold ?? DEFAULT_FLUSH_THRESHOLD
    if (!Number.isInteger(this.flushThreshold) || this.flushThreshold < 1) {
      throw new Error(`flushThreshold must be a positive integer, got ${this.flushThreshold}`)
    }
    this.logger = options.logger ?? silentLogger
  }

  async add(record: NormalizedRecord): Promise<void> {
    try {
      await this.options.master.insertOne(record)
      this.counters.masterInserted += 1
    } catch (error) {
      this.counters.masterFailed += 1
      this.recordFailure(toHarvestError("STORE_WRITE_FAILED", "master-insert", record.source_url, error))
    }

    this.buffer.push(record)
    if (this.buffer.length >= this.flushThreshold) {
      await this.flush()
    }
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) {
      return
    }
    // Swap first so records added while the insert is pending start a new batch
    const batch = this.buffer
    this.buffer = []
    this.counters.targetBatches += 1
    try {
      await this.options.target.insertMany(batch)
      this.counters.targetInserted += batch.length
    } catch (error) {
      this.counters.targetDropped += batch.length
      this.recordFailure(
        toHarvestError(
          "STORE_WRITE_FAILED",
          "target-insert",
          null,
          `Dropped batch of ${batch.length}: ${getErrorMessage(error)}`,
        ),
      )
    }
  }

  get pending(): number {
    return this.buffer.length
  }

  stats(): BatchWriterStats {
    return { ...this.counters }
  }

  errors(): HarvestError[] {
    return [...this.failures]
  }

  private recordFailure(failure: HarvestError): void {
    this.failures.push(failure)
    const target = failure.target ? ` ${failure.target}` : ""
    this.logger.warn(`${failure.code} (${failure.step})${target}: ${failure.message}`)
  }
}
