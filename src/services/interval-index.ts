import { GeoLocation, IpRangeRecord } from "../models/geo-data";
import { InvalidAddressError } from "./errors";
import { IpUtil } from "./ip-util";
import { RangeSearchUtil } from "./range-search-util";

/**
 * Immutable table of disjoint IPv4 ranges, each bound to a location.
 *
 * Built once from records already sorted ascending by start. The builder does
 * not re-sort and does not check for overlaps. Nothing mutates the table after
 * construction, so lookups from concurrent tasks need no coordination.
 */
export class IntervalIndex {
  private readonly records: ReadonlyArray<Readonly<IpRangeRecord>>;

  private constructor(records: ReadonlyArray<Readonly<IpRangeRecord>>) {
    this.records = records;
  }

  static build(records: Iterable<IpRangeRecord>): IntervalIndex {
    const frozen: Readonly<IpRangeRecord>[] = [];
    for (const record of records) {
      frozen.push(Object.freeze({ ...record }));
    }
    return new IntervalIndex(Object.freeze(frozen));
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Find the location whose range contains ip (both bounds inclusive)
   */
  lookup(ip: number): GeoLocation | null {
    const match = RangeSearchUtil.findContaining(this.records, ip);
    if (!match) return null;

    return { latitude: match.latitude, longitude: match.longitude };
  }

  /**
   * Look up a dotted-quad address. Malformed input yields null.
   */
  lookupAddress(ip: string): GeoLocation | null {
    let ipNum: number;
    try {
      ipNum = IpUtil.parseIpv4(ip);
    } catch (error) {
      if (error instanceof InvalidAddressError) return null;
      throw error;
    }
    return this.lookup(ipNum);
  }
}
