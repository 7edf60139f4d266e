/**
 * Parsed IPv4 CIDR block
 */
export interface Ipv4Cidr {
  network: number; // first address of the block, unsigned
  prefixLength: number;
  size: number; // total addresses in the block
}

// Blocks that are not globally routable (IANA special-purpose registry)
const NON_GLOBAL_BLOCKS: ReadonlyArray<[string, number]> = [
  ["0.0.0.0", 8],
  ["10.0.0.0", 8],
  ["100.64.0.0", 10],
  ["127.0.0.0", 8],
  ["169.254.0.0", 16],
  ["172.16.0.0", 12],
  ["192.0.0.0", 24],
  ["192.0.2.0", 24],
  ["192.88.99.0", 24],
  ["192.168.0.0", 16],
  ["198.18.0.0", 15],
  ["198.51.100.0", 24],
  ["203.0.113.0", 24],
  ["224.0.0.0", 4],
  ["240.0.0.0", 4],
];

/**
 * Utility functions for working with IPv4 addresses
 */
export class IpUtil {
  private static readonly OCTET = /^(0|[1-9]\d{0,2})$/;

  /**
   * Convert an IPv4 address to its numeric representation
   * Example: "192.168.1.1" -> 3232235777
   */
  static ipToLong(ip: string): number {
    return (
      ip
        .split(".")
        .reduce((acc, octet) => (acc << 8) + parseInt(octet, 10), 0) >>> 0
    );
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

  /**
   * Validate a dotted-quad IPv4 address. Octets with leading zeros are
   * rejected since they are ambiguous (octal in some parsers).
   */
  static isValidIpv4(ip: string): boolean {
    const parts = ip.split(".");
    if (parts.length !== 4) return false;

    return parts.every(
      (part) => this.OCTET.test(part) && parseInt(part, 10) <= 255
    );
  }

  /**
   * Mask with the top `prefixLength` bits set, unsigned
   */
  static prefixMask(prefixLength: number): number {
    return prefixLength === 0 ? 0 : (~0 << (32 - prefixLength)) >>> 0;
  }

  /**
   * Check whether an address falls inside `base/prefixLength`
   */
  static inBlock(ip: string, base: string, prefixLength: number): boolean {
    const mask = this.prefixMask(prefixLength);
    return ((this.ipToLong(ip) & mask) >>> 0) === ((this.ipToLong(base) & mask) >>> 0);
  }

  /**
   * True when the address is publicly routable, i.e. not private, loopback,
   * link-local, shared, documentation, multicast or reserved
   */
  static isGlobal(ip: string): boolean {
    return !NON_GLOBAL_BLOCKS.some(([base, prefix]) =>
      this.inBlock(ip, base, prefix)
    );
  }

  /**
   * Parse CIDR notation (e.g., "192.168.1.0/24"). Host bits set in the
   * address are ignored, as with most routers.
   */
  static parseIpv4Cidr(cidr: string): Ipv4Cidr | null {
    const parts = cidr.split("/");
    if (parts.length !== 2) return null;

    const [ip, prefixStr] = parts;
    if (!this.isValidIpv4(ip) || !/^\d{1,2}$/.test(prefixStr)) return null;

    const prefixLength = parseInt(prefixStr, 10);
    if (prefixLength > 32) return null;

    return {
      network: (this.ipToLong(ip) & this.prefixMask(prefixLength)) >>> 0,
      prefixLength,
      size: Math.pow(2, 32 - prefixLength),
    };
  }

  /**
   * Number of usable host addresses in a block. Network and broadcast
   * addresses only count for /31 and /32.
   */
  static hostCount(prefixLength: number): number {
    const size = Math.pow(2, 32 - prefixLength);
    return prefixLength >= 31 ? size : size - 2;
  }
}
