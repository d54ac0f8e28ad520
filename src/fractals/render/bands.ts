/**
 * Contiguous range of rows of the back buffer computed as one pool task.
 */
export interface RowBand {
  /** Position of the band in the pass (0-based, top to bottom) */
  index: number;
  /** First row of the band (inclusive) */
  startRow: number;
  /** Row after the last row of the band (exclusive) */
  endRow: number;
}

/**
 * Divides the rows of a height-row image into at most `bandCount` disjoint
 * bands that together cover every row. Band heights differ by at most one
 * row; the taller bands come first.
 *
 * Since every pixel is independent, bands can be written concurrently by
 * different workers without any lock.
 */
export function createBands(height: number, bandCount: number): RowBand[] {
  if (!Number.isInteger(height) || height < 0) {
    throw new Error(`Invalid image height: ${height}`);
  }
  if (!Number.isInteger(bandCount) || bandCount < 1) {
    throw new Error(`Invalid band count: ${bandCount}`);
  }

  const count = Math.min(bandCount, height);
  const baseRows = Math.floor(height / Math.max(count, 1));
  const extraRows = height - baseRows * count;

  const bands: RowBand[] = [];
  let startRow = 0;
  for (let index = 0; index < count; index++) {
    const rows = baseRows + (index < extraRows ? 1 : 0);
    bands.push({ index, startRow, endRow: startRow + rows });
    startRow += rows;
  }

  return bands;
}

/**
 * Number of rows in a band.
 */
export function bandRows(band: RowBand): number {
  return band.endRow - band.startRow;
}
