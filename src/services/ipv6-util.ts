/**
 * Dedicated utility class for IPv6 address processing.
 * Parsing is strict: every group must be 1-4 hex digits, at most one `::`
 * compression marker, and an optional dotted IPv4 tail.
 */
export class Ipv6Util {
  private static readonly MAX_IPV6 = (BigInt(1) << BigInt(128)) - BigInt(1);

  private static readonly HEX_GROUP = /^[0-9a-f]{1,4}$/;

  private static readonly IPV4_TAIL =
    /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)$/;

  /**
   * Address blocks that are never accepted as a host's public IPv6 address,
   * checked in order. Anything outside 2000::/3 is additionally treated as reserved.
   */
  public static readonly EXCLUDED_BLOCKS: ReadonlyArray<{
    cidr: string;
    reason: string;
  }> = [
    { cidr: "::/128", reason: "unspecified" },
    { cidr: "::1/128", reason: "loopback" },
    { cidr: "::ffff:0:0/96", reason: "IPv4-mapped" },
    { cidr: "64:ff9b::/96", reason: "NAT64" },
    { cidr: "64:ff9b:1::/48", reason: "local-use NAT64" },
    { cidr: "100::/64", reason: "discard-only" },
    { cidr: "2001::/23", reason: "IETF protocol assignment" },
    { cidr: "2001:db8::/32", reason: "documentation" },
    { cidr: "3fff::/20", reason: "documentation" },
    { cidr: "fc00::/7", reason: "unique-local" },
    { cidr: "fe80::/10", reason: "link-local" },
    { cidr: "fec0::/10", reason: "site-local" },
    { cidr: "ff00::/8", reason: "multicast" },
  ];

  private static readonly GLOBAL_UNICAST = "2000::/3";

  private static excludedRanges: Array<{
    startIp: bigint;
    endIp: bigint;
    reason: string;
  }> | null = null;

  /**
   * Validate if a string is a syntactically valid IPv6 address
   */
  public static isValid(ip: string): boolean {
    try {
      this.toGroups(ip);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Expand an address into its eight 16-bit groups
   */
  public static toGroups(ip: string): number[] {
    let address = ip.trim().toLowerCase();

    if (address === "") {
      throw new Error("IPv6 address cannot be empty");
    }
    if (address.includes("%")) {
      throw new Error(`Zone-scoped IPv6 address not supported: ${ip}`);
    }

    const lastColon = address.lastIndexOf(":");
    if (lastColon === -1) {
      throw new Error(`Invalid IPv6 address: ${ip} (no group separator)`);
    }

    // Dotted IPv4 tail, e.g. ::ffff:192.0.2.1
    const tail: number[] = [];
    const lastPart = address.substring(lastColon + 1);
    if (lastPart.includes(".")) {
      const match = this.IPV4_TAIL.exec(lastPart);
      if (!match) {
        throw new Error(`Invalid IPv4 tail in IPv6 address: ${ip}`);
      }
      const octets = match.slice(1, 5).map((octet) => parseInt(octet, 10));
      tail.push((octets[0] << 8) | octets[1], (octets[2] << 8) | octets[3]);

      address = address.substring(0, lastColon + 1);
      if (!address.endsWith("::")) {
        address = address.slice(0, -1);
      }
    }

    const halves = address.split("::");
    if (halves.length > 2) {
      throw new Error(`Invalid IPv6 address: ${ip} (multiple :: markers)`);
    }

    const head = this.parseGroups(halves[0], ip);
    const rest = halves.length === 2 ? this.parseGroups(halves[1], ip) : [];
    const explicit = head.length + rest.length + tail.length;

    if (halves.length === 2) {
      if (explicit > 7) {
        throw new Error(`Invalid IPv6 address: ${ip} (too many groups)`);
      }
      const zeros = new Array<number>(8 - explicit).fill(0);
      return [...head, ...zeros, ...rest, ...tail];
    }

    if (explicit !== 8) {
      throw new Error(
        `Invalid IPv6 address: ${ip} (expected 8 groups, got ${explicit})`
      );
    }
    return [...head, ...tail];
  }

  private static parseGroups(segment: string, original: string): number[] {
    if (segment === "") return [];

    return segment.split(":").map((group) => {
      if (!this.HEX_GROUP.test(group)) {
        throw new Error(`Invalid IPv6 group "${group}" in ${original}`);
      }
      return parseInt(group, 16);
    });
  }

  /**
   * Convert an IPv6 address to BigInt for calculations
   */
  public static toBigInt(ip: string): bigint {
    return this.toGroups(ip).reduce(
      (acc, group) => (acc << BigInt(16)) | BigInt(group),
      BigInt(0)
    );
  }

  /**
   * Parse IPv6 CIDR notation (e.g., 2001:db8::/32)
   */
  public static parseCidr(cidr: string): {
    startIp: bigint;
    endIp: bigint;
    prefix: number;
  } {
    const parts = cidr.split("/");
    if (parts.length !== 2 || !/^\d{1,3}$/.test(parts[1])) {
      throw new Error(`Invalid IPv6 CIDR format: ${cidr}`);
    }

    const prefix = parseInt(parts[1], 10);
    if (prefix > 128) {
      throw new Error(`IPv6 prefix must be between 0 and 128: ${cidr}`);
    }

    const ipBigInt = this.toBigInt(parts[0]);
    const mask = (BigInt(1) << BigInt(128 - prefix)) - BigInt(1);

    return {
      startIp: ipBigInt & ~mask & this.MAX_IPV6,
      endIp: ipBigInt | mask,
      prefix,
    };
  }

  /**
   * Explain why an address cannot be used as a public host address,
   * or return null when it is globally routable.
   */
  public static exclusionReason(ip: string): string | null {
    let value: bigint;
    try {
      value = this.toBigInt(ip);
    } catch {
      return "malformed";
    }

    for (const range of this.getExcludedRanges()) {
      if (value >= range.startIp && value <= range.endIp) {
        return range.reason;
      }
    }

    const globalUnicast = this.parseCidr(this.GLOBAL_UNICAST);
    if (value < globalUnicast.startIp || value > globalUnicast.endIp) {
      return "reserved";
    }

    return null;
  }

  public static isGloballyRoutable(ip: string): boolean {
    return this.exclusionReason(ip) === null;
  }

  private static getExcludedRanges(): Array<{
    startIp: bigint;
    endIp: bigint;
    reason: string;
  }> {
    if (!this.excludedRanges) {
      this.excludedRanges = this.EXCLUDED_BLOCKS.map(({ cidr, reason }) => {
        const { startIp, endIp } = this.parseCidr(cidr);
        return { startIp, endIp, reason };
      });
    }
    return this.excludedRanges;
  }
}
