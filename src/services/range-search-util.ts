/**
 * Range representation for binary search
 */
export interface IpRange {
  start: number;
  end: number;
}

/**
 * Binary search helpers for sorted, disjoint IPv4 ranges
 */
export class RangeSearchUtil {
  /**
   * Find the position of the rightmost range whose start is <= value
   *
   * @param ranges - Ranges sorted ascending by start
   * @returns The index of that range, or -1 when value precedes every start
   */
  static floorIndex(ranges: ReadonlyArray<IpRange>, value: number): number {
    // Right insertion point: first index whose start is > value
    let left = 0;
    let right = ranges.length;

    while (left < right) {
      const mid = (left + right) >>> 1;
      if (ranges[mid].start <= value) {
        left = mid + 1;
      } else {
        right = mid;
      }
    }

    return left - 1;
  }

  /**
   * Find the range containing value. Only the floor candidate is checked, so a
   * value that falls in a gap between two ranges yields null.
   */
  static findContaining<T extends IpRange>(
    ranges: ReadonlyArray<T>,
    value: number
  ): T | null {
    const idx = RangeSearchUtil.floorIndex(ranges, value);
    if (idx < 0) return null;

    const candidate = ranges[idx];
    return value <= candidate.end ? candidate : null;
  }
}
