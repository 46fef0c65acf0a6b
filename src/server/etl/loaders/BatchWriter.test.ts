import { describe, expect, it, vi } from 'vitest';
import { BatchWriter } from './BatchWriter.js';

describe('BatchWriter', () => {
  it('writes full batches as they fill and the rest on flush', async () => {
    const write = vi.fn(async (rows: number[]) => rows.length);
    const writer = new BatchWriter(2, write);

    await writer.add(1);
    expect(write).not.toHaveBeenCalled();
    await writer.add(2, 3, 4, 5);
    expect(write.mock.calls.map(([rows]) => rows)).toEqual([[1, 2], [3, 4]]);
    expect(writer.pending).toBe(1);

    await writer.flush();
    expect(write.mock.calls.map(([rows]) => rows)).toEqual([[1, 2], [3, 4], [5]]);
    expect(writer.written).toBe(5);
  });

  it('does nothing on flush when empty', async () => {
    const write = vi.fn(async (rows: string[]) => rows.length);
    await new BatchWriter(3, write).flush();
    expect(write).not.toHaveBeenCalled();
  });

  it('rejects invalid batch sizes', () => {
    expect(() => new BatchWriter(0, async () => 0)).toThrow(RangeError);
  });
});
