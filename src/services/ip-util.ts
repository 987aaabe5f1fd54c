import { InvalidAddressError } from "./errors";

/**
 * Utility functions for working with IPv4 addresses
 */
export class IpUtil {
  static readonly MAX_IPV4 = 0xffffffff;

  /**
   * Parse a dotted-quad IPv4 address into its unsigned numeric form.
   * Octet 0 is the most significant byte.
   * Example: "192.168.1.1" -> 3232235777
   *
   * @throws InvalidAddressError for anything other than four decimal octets in [0, 255]
   */
  static parseIpv4(ip: string): number {
    const octets = ip.split(".");
    if (octets.length !== 4) {
      throw new InvalidAddressError(
        ip,
        `expected 4 segments, got ${octets.length}`
      );
    }

    let result = 0;
    for (const octet of octets) {
      if (!/^\d{1,3}$/.test(octet)) {
        throw new InvalidAddressError(ip, `non-numeric segment "${octet}"`);
      }
      const value = parseInt(octet, 10);
      if (value > 255) {
        throw new InvalidAddressError(ip, `octet ${value} out of range`);
      }
      result = result * 256 + value;
    }

    return result;
  }

  /**
   * Convert a numeric representation back to an IPv4 address string
   * Example: 3232235777 -> "192.168.1.1"
   */
  static longToIp(long: number): string {
    return [
      (long >>> 24) & 255,
      (long >>> 16) & 255,
      (long >>> 8) & 255,
      long & 255,
    ].join(".");
  }

  static isValidIpv4(ip: string): boolean {
    const pattern = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
    if (!pattern.test(ip)) return false;

    return ip
      .split(".")
      .map(Number)
      .every((num) => num >= 0 && num <= 255);
  }

  /**
   * Whether a number can be used as an IPv4 range bound
   */
  static isUint32(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value <= IpUtil.MAX_IPV4;
  }
}
