import { promises as dnsPromises } from "dns";
import * as psl from "psl";
import { DomainResolver } from "./source-readers";
import { withTimeout } from "../net/timeout";
import { componentLogger } from "../../logger";
import { errorMessage } from "../../errors";

const log = componentLogger("reverse-dns");

export const DEFAULT_DNS_TIMEOUT_MS = 1000;

type ReverseFn = (address: string) => Promise<string[]>;

/**
 * Registrable domain of a hostname, or the hostname itself when no
 * public-suffix match exists (e.g. bare TLDs or unlisted suffixes)
 */
export function apexDomain(hostname: string): string {
  const host = hostname.replace(/\.$/, "").toLowerCase();
  return psl.get(host) ?? host;
}

/**
 * PTR lookup with a hard time bound. Each address gets its own resolver so
 * a slow query can be cancelled without touching the others.
 */
export class ReverseDnsResolver implements DomainResolver {
  constructor(
    private readonly timeoutMs: number = DEFAULT_DNS_TIMEOUT_MS,
    private readonly reverseFactory: () => {
      reverse: ReverseFn;
      cancel: () => void;
    } = () => new dnsPromises.Resolver({ timeout: timeoutMs, tries: 1 })
  ) {}

  async resolve(address: string): Promise<string | null> {
    const resolver = this.reverseFactory();

    try {
      const hostnames = await withTimeout(
        resolver.reverse(address),
        this.timeoutMs,
        () => resolver.cancel()
      );
      return hostnames.length > 0 ? apexDomain(hostnames[0]) : null;
    } catch (error) {
      log.debug({ address, err: errorMessage(error) }, "Reverse lookup gave no result");
      return null;
    }
  }
}
