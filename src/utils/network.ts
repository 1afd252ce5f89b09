/**
 * @module utils/network
 * @fileoverview Private-address detection for outbound page and image requests.
 *
 * The clipper fetches whatever URL the caller sends, and later fetches
 * whatever `og:image` the page declares. Both are attacker-controlled, so
 * before any request leaves the host the hostname is resolved and every
 * address it maps to is checked against the reserved ranges below. One
 * private address is enough to refuse the request.
 *
 * ## Refused Ranges
 * | Range               | Purpose                    |
 * |---------------------|----------------------------|
 * | `0.0.0.0/8`         | "This" network             |
 * | `10.0.0.0/8`        | Private                    |
 * | `100.64.0.0/10`     | Carrier-Grade NAT          |
 * | `127.0.0.0/8`       | Loopback                   |
 * | `169.254.0.0/16`    | Link-Local (cloud metadata)|
 * | `172.16.0.0/12`     | Private                    |
 * | `192.0.0.0/24`      | IETF Protocol Assignments  |
 * | `192.168.0.0/16`    | Private                    |
 * | `198.18.0.0/15`     | Benchmarking               |
 * | `::`, `::1`         | IPv6 unspecified, loopback |
 * | `fc00::/7`          | IPv6 Unique Local          |
 * | `fe80::/10`         | IPv6 Link-Local            |
 * | `::ffff:0:0/96`     | IPv4-mapped, checked as IPv4 |
 *
 * The check happens at resolution time only; a DNS answer that changes
 * between the check and the connection is not caught.
 */

import dns from "node:dns/promises";
import { isIP } from "node:net";
import { FetchError, SecurityError } from "./errors.js";
import { err, ok, type Result } from "./result.js";

/* ────────────────────────────────────────────────────────────────────────────
 * IPv4
 * ──────────────────────────────────────────────────────────────────────────── */

function ipv4ToInt(ip: string): number {
  const [a, b, c, d] = ip.split(".").map((part) => parseInt(part, 10));
  return ((a << 24) | (b << 16) | (c << 8) | d) >>> 0;
}

/** `[network, prefix length]` pairs. */
const IPV4_RESERVED_CIDRS: ReadonlyArray<readonly [string, number]> = [
  ["0.0.0.0", 8],
  ["10.0.0.0", 8],
  ["100.64.0.0", 10],
  ["127.0.0.0", 8],
  ["169.254.0.0", 16],
  ["172.16.0.0", 12],
  ["192.0.0.0", 24],
  ["192.168.0.0", 16],
  ["198.18.0.0", 15],
];

const IPV4_RESERVED_RANGES = IPV4_RESERVED_CIDRS.map(([network, prefix]) => {
  const size = 2 ** (32 - prefix);
  const start = ipv4ToInt(network);
  return { start, end: start + size - 1 };
});

function isIPv4Private(ip: string): boolean {
  const value = ipv4ToInt(ip);
  return IPV4_RESERVED_RANGES.some(({ start, end }) => value >= start && value <= end);
}

/* ────────────────────────────────────────────────────────────────────────────
 * IPv6
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Expand an IPv6 address to eight zero-padded lowercase groups.
 * A trailing dotted IPv4 part (`::ffff:10.0.0.1`) is converted to two groups.
 */
function expandIPv6(ip: string): string[] {
  let address = ip.split("%")[0].toLowerCase();

  const dotted = address.match(/(\d+\.\d+\.\d+\.\d+)$/);
  if (dotted) {
    const value = ipv4ToInt(dotted[1]);
    const high = (value >>> 16).toString(16);
    const low = (value & 0xffff).toString(16);
    address = address.slice(0, -dotted[1].length) + `${high}:${low}`;
  }

  const [head, tail] = address.split("::");
  const left = head ? head.split(":") : [];
  const right = tail ? tail.split(":") : [];
  const missing = tail === undefined ? 0 : 8 - left.length - right.length;
  const groups = [...left, ...new Array<string>(missing).fill("0"), ...right];

  return groups.map((group) => group.padStart(4, "0"));
}

function isIPv6Private(ip: string): boolean {
  const groups = expandIPv6(ip);
  const leadingZeroes = groups.slice(0, 5).every((group) => group === "0000");

  if (leadingZeroes && groups[5] === "0000" && groups[6] === "0000") {
    // :: and ::1
    return groups[7] === "0000" || groups[7] === "0001";
  }

  if (leadingZeroes && groups[5] === "ffff") {
    const high = parseInt(groups[6], 16);
    const low = parseInt(groups[7], 16);
    return isIPv4Private(`${high >> 8}.${high & 0xff}.${low >> 8}.${low & 0xff}`);
  }

  const first = parseInt(groups[0], 16);
  // fc00::/7
  if ((first & 0xfe00) === 0xfc00) {
    return true;
  }
  // fe80::/10
  return (first & 0xffc0) === 0xfe80;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Whether an IPv4 or IPv6 literal falls in a refused range.
 *
 * @example
 * ```ts
 * isPrivateIP("192.168.1.1");      // true
 * isPrivateIP("::ffff:127.0.0.1"); // true
 * isPrivateIP("8.8.8.8");          // false
 * ```
 */
export function isPrivateIP(ip: string): boolean {
  return ip.includes(":") ? isIPv6Private(ip) : isIPv4Private(ip);
}

/** Resolves a hostname to every address it maps to. */
export type HostResolver = (hostname: string) => Promise<string[]>;

const systemResolver: HostResolver = async (hostname) => {
  const records = await dns.lookup(hostname, { all: true, verbatim: true });
  return records.map((record) => record.address);
};

/**
 * Check that `hostname` only resolves to public addresses.
 *
 * IP literals are checked directly. Everything else goes through
 * `dns.lookup`, so `/etc/hosts` entries such as `localhost` are seen too.
 * A hostname that does not resolve is a {@link FetchError}, not a
 * {@link SecurityError}: it is a bad URL, not a refused one.
 *
 * @param resolver - Replaces the system resolver in tests.
 */
export async function checkHostname(
  hostname: string,
  resolver: HostResolver = systemResolver
): Promise<Result<void, SecurityError | FetchError>> {
  // URL.hostname keeps the brackets around IPv6 literals.
  const bare = hostname.replace(/^\[(.*)\]$/, "$1");

  let addresses: string[];
  if (isIP(bare) !== 0) {
    addresses = [bare];
  } else {
    try {
      addresses = await resolver(bare);
    } catch (error) {
      return err(
        new FetchError(
          `DNS resolution failed for '${bare}': ${error instanceof Error ? error.message : String(error)}`
        ),
      );
    }
  }

  if (addresses.length === 0) {
    return err(new FetchError(`DNS resolution for '${bare}' returned no addresses`));
  }

  const blocked = addresses.find(isPrivateIP);
  if (blocked !== undefined) {
    return err(
      new SecurityError(`Hostname '${bare}' resolves to private address ${blocked}; request refused`),
    );
  }

  return ok(undefined);
}
