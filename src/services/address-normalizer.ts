import { IpUtil } from "./ip-util";
import { CidrTooLargeError, ValidationError } from "../errors";

/**
 * Largest number of hosts a single CIDR argument may expand to
 */
export const MAX_CIDR_HOSTS = 1024;

const ADDRESS_PATTERN = /\b(?:\d{1,3}\.){3}\d{1,3}\b/g;

export interface AddressInput {
  addresses?: string[]; // single addresses or CIDR blocks
  text?: string; // free text to scan for addresses
}

/**
 * Turns raw input into the ordered, deduplicated set of addresses to enrich
 */
export class AddressNormalizer {
  /**
   * Validate a single address and pass it through unchanged
   */
  static normalizeAddress(input: string): string {
    const ip = input.trim();
    if (!ip) {
      throw new ValidationError("IP address cannot be empty");
    }
    if (!IpUtil.isValidIpv4(ip)) {
      throw new ValidationError(`Invalid IP address: ${ip}`);
    }
    return ip;
  }

  /**
   * Expand a CIDR block into its globally routable host addresses
   */
  static expandCidr(block: string): string[] {
    const cidr = block.trim();
    const [ip, prefix] = cidr.split("/");

    if (!IpUtil.isValidIpv4(ip)) {
      throw new ValidationError(`Invalid IP address in CIDR: ${ip}`);
    }

    const parsed = IpUtil.parseIpv4Cidr(cidr);
    if (!parsed) {
      throw new ValidationError(`Invalid CIDR prefix: ${prefix}`);
    }

    const hosts = IpUtil.hostCount(parsed.prefixLength);
    if (hosts > MAX_CIDR_HOSTS) {
      throw new CidrTooLargeError(cidr, hosts, MAX_CIDR_HOSTS);
    }

    // Skip the network and broadcast addresses unless the block is /31 or /32
    const first = parsed.prefixLength >= 31 ? parsed.network : parsed.network + 1;
    const addresses: string[] = [];

    for (let offset = 0; offset < hosts; offset++) {
      const address = IpUtil.longToIp(first + offset);
      if (IpUtil.isGlobal(address)) {
        addresses.push(address);
      }
    }

    return addresses;
  }

  /**
   * Find every globally routable address in a block of text.
   * Result is deduplicated and sorted by numeric address value.
   */
  static extractAddresses(text: string): string[] {
    const found = new Set<string>();

    for (const match of text.matchAll(ADDRESS_PATTERN)) {
      const candidate = match[0];
      if (IpUtil.isValidIpv4(candidate) && IpUtil.isGlobal(candidate)) {
        found.add(candidate);
      }
    }

    return [...found].sort((a, b) => IpUtil.ipToLong(a) - IpUtil.ipToLong(b));
  }

  /**
   * Merge direct arguments and text extraction into one candidate list.
   * Direct arguments keep their order and come first; duplicates are dropped
   * wherever they appear.
   */
  static collectAddresses(input: AddressInput): string[] {
    const seen = new Set<string>();
    const ordered: string[] = [];

    const add = (address: string) => {
      if (!seen.has(address)) {
        seen.add(address);
        ordered.push(address);
      }
    };

    for (const entry of input.addresses ?? []) {
      if (entry.includes("/")) {
        this.expandCidr(entry).forEach(add);
      } else {
        add(this.normalizeAddress(entry));
      }
    }

    if (input.text) {
      this.extractAddresses(input.text).forEach(add);
    }

    return ordered;
  }
}
