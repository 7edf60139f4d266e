import { IpUtil } from "./ip-util";

/**
 * Range representation for binary search
 */
export interface IpRange<T> {
  startIp: number; // unsigned IPv4
  endIp: number; // unsigned IPv4, inclusive
  value: T;
}

/**
 * Utility class for efficient IP range lookups using binary search
 */
export class RangeSearchUtil {
  /**
   * Find the IPv4 range containing the specified IP using binary search
   *
   * @param ip - The IPv4 address to look up
   * @param ranges - Sorted array of non-overlapping ranges (sorted by startIp)
   * @returns The matching range or null if not found
   */
  static findIpv4Range<T>(ip: string, ranges: IpRange<T>[]): IpRange<T> | null {
    const ipNum = IpUtil.ipToLong(ip);

    let left = 0;
    let right = ranges.length - 1;

    while (left <= right) {
      const mid = Math.floor((left + right) / 2);
      const range = ranges[mid];

      if (ipNum >= range.startIp && ipNum <= range.endIp) {
        return range;
      } else if (ipNum < range.startIp) {
        right = mid - 1;
      } else {
        left = mid + 1;
      }
    }

    return null;
  }

  /**
   * Sort IPv4 ranges by start address (ascending)
   * Required for binary search to work correctly
   */
  static sortIpv4Ranges<T>(ranges: IpRange<T>[]): IpRange<T>[] {
    return [...ranges].sort((a, b) => a.startIp - b.startIp);
  }
}
