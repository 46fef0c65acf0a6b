/**
 * Buffers rows and hands them to a store in fixed-size batches
 */
export class BatchWriter<T> {
  private buffer: T[] = [];
  private writtenCount = 0;

  constructor(
    private readonly batchSize: number,
    private readonly write: (rows: T[]) => Promise<number>
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
    }
  }

  /** Rows reported as written by the store so far */
  get written(): number {
    return this.writtenCount;
  }

  get pending(): number {
    return this.buffer.length;
  }

  async add(...rows: T[]): Promise<void> {
    this.buffer.push(...rows);
    while (this.buffer.length >= this.batchSize) {
      await this.writeBatch(this.buffer.splice(0, this.batchSize));
    }
  }

  /** Write whatever is buffered */
  async flush(): Promise<void> {
    if (this.buffer.length > 0) {
      await this.writeBatch(this.buffer.splice(0));
    }
  }

  private async writeBatch(rows: T[]): Promise<void> {
    this.writtenCount += await this.write(rows);
  }
}
