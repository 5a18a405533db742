export interface SeriesBatch {
  seriesIds: number[];
  estimatedRecords: number;
}

export interface BatchCaps {
  maxRecordsPerBatch: number;
  maxSeriesPerBatch: number;
}

/**
 * Greedy single pass over series in ascending id order. A batch closes when the next series
 * would cross either cap; a series that alone exceeds the record cap gets a batch of its own.
 */
export function planSeriesBatches(counts: ReadonlyMap<number, number>, caps: BatchCaps): SeriesBatch[] {
  if (!(caps.maxRecordsPerBatch > 0) || !Number.isInteger(caps.maxSeriesPerBatch) || caps.maxSeriesPerBatch < 1) {
    throw new Error(`Invalid batch caps: ${JSON.stringify(caps)}`);
  }

  const batches: SeriesBatch[] = [];
  let current: SeriesBatch = { seriesIds: [], estimatedRecords: 0 };
  const close = (): void => {
    if (current.seriesIds.length > 0) {
      batches.push(current);
      current = { seriesIds: [], estimatedRecords: 0 };
    }
  };

  const sorted = [...counts.entries()].sort(([a], [b]) => a - b);
  for (const [seriesId, count] of sorted) {
    if (count > caps.maxRecordsPerBatch) {
      close();
      batches.push({ seriesIds: [seriesId], estimatedRecords: count });
      continue;
    }
    if (
      current.seriesIds.length > 0 &&
      (current.estimatedRecords + count > caps.maxRecordsPerBatch || current.seriesIds.length + 1 > caps.maxSeriesPerBatch)
    ) {
      close();
    }
    current.seriesIds.push(seriesId);
    current.estimatedRecords += count;
  }
  close();
  return batches;
}
