import { GeoInfo, ResolvedAddresses } from "../models/address-data";
import { logger } from "../utils/logger";
import { MonitorError, errorMessage } from "../utils/monitor-error";
import { HttpClient } from "./http-client";
import { IpUtil } from "./ip-util";
import { Ipv6Util } from "./ipv6-util";

export interface LookupService {
  name: string;
  url: string;
  format: "json" | "text";
}

/**
 * Fields that carry the address in the JSON bodies of the known services
 */
export const ADDRESS_FIELDS = ["ip", "IPv4", "query", "ip_addr", "address"];

export const IPV4_SERVICES: ReadonlyArray<LookupService> = [
  { name: "ipify", url: "https://api.ipify.org?format=json", format: "json" },
  { name: "ipapi.co", url: "https://ipapi.co/json", format: "json" },
  { name: "ifconfig.me", url: "https://ifconfig.me/all.json", format: "json" },
  { name: "myip.com", url: "https://api.myip.com", format: "json" },
];

export const IPV6_SERVICES: ReadonlyArray<LookupService> = [
  { name: "ipify-v6", url: "https://api6.ipify.org?format=json", format: "json" },
  { name: "icanhazip-v6", url: "https://ipv6.icanhazip.com", format: "text" },
  { name: "ident.me-v6", url: "https://v6.ident.me", format: "text" },
];

export const IPINFO_URL = "https://ipinfo.io/json";

export interface AddressResolverOptions {
  timeoutMs: number;
  ipinfoToken: string | null;
  ipv4Services?: ReadonlyArray<LookupService>;
  ipv6Services?: ReadonlyArray<LookupService>;
}

/**
 * Resolves the host's public addresses by walking ordered lists of lookup
 * services. A single service failing is never an error; only coming back
 * with no address at all is.
 */
export class AddressResolver {
  private readonly ipv4Services: ReadonlyArray<LookupService>;
  private readonly ipv6Services: ReadonlyArray<LookupService>;

  constructor(
    private readonly http: HttpClient,
    private readonly options: AddressResolverOptions
  ) {
    this.ipv4Services = options.ipv4Services ?? IPV4_SERVICES;
    this.ipv6Services = options.ipv6Services ?? IPV6_SERVICES;
  }

  async resolve(
    monitorIpv4: boolean,
    monitorIpv6: boolean
  ): Promise<ResolvedAddresses> {
    let ipv4: string | null = null;
    let ipv6: string | null = null;
    let geo: GeoInfo | null = null;

    if (monitorIpv4) {
      const withGeo = this.options.ipinfoToken
        ? await this.lookupWithGeo(this.options.ipinfoToken)
        : null;

      if (withGeo) {
        ipv4 = withGeo.ip;
        geo = withGeo.geo;
      } else {
        ipv4 = await this.lookupIpv4();
      }
    }

    if (monitorIpv6) {
      ipv6 = await this.lookupIpv6();
    }

    if ((monitorIpv4 || monitorIpv6) && ipv4 === null && ipv6 === null) {
      throw new MonitorError(
        "E_RESOLUTION_FAILED",
        `Failed to retrieve a public address from all services (IPv4: ${
          monitorIpv4 ? "enabled" : "disabled"
        }, IPv6: ${monitorIpv6 ? "enabled" : "disabled"})`
      );
    }

    return { addresses: { ipv4, ipv6 }, geo };
  }

  /**
   * Walk the IPv4 service list; null when every service fails
   */
  async lookupIpv4(): Promise<string | null> {
    for (const service of this.ipv4Services) {
      const candidate = await this.query(service);
      if (candidate === null) continue;

      if (IpUtil.isValidIpv4(candidate)) {
        logger.debug(`[Resolver] ${service.name} returned IPv4 ${candidate}`);
        return candidate;
      }
      logger.warn(
        `[Resolver] ${service.name} returned a non-IPv4 value "${candidate}", trying next service`
      );
    }

    logger.warn("[Resolver] No IPv4 address could be obtained from any service");
    return null;
  }

  /**
   * Walk the IPv6 service list, accepting only globally routable answers
   */
  async lookupIpv6(): Promise<string | null> {
    for (const service of this.ipv6Services) {
      const candidate = await this.query(service);
      if (candidate === null) continue;

      const reason = Ipv6Util.exclusionReason(candidate);
      if (reason === null) {
        logger.debug(`[Resolver] ${service.name} returned IPv6 ${candidate}`);
        return candidate;
      }
      logger.warn(
        `[Resolver] ${service.name} returned ineligible IPv6 "${candidate}" (${reason}), trying next service`
      );
    }

    logger.warn("[Resolver] No IPv6 address could be obtained from any service");
    return null;
  }

  /**
   * Address plus location from ipinfo.io. Any failure, including an answer
   * that is not IPv4, yields null so the caller falls back to the plain list.
   */
  async lookupWithGeo(
    token: string
  ): Promise<{ ip: string; geo: GeoInfo } | null> {
    try {
      const response = await this.http.get(
        `${IPINFO_URL}?token=${encodeURIComponent(token)}`,
        { timeoutMs: this.options.timeoutMs }
      );
      const body = asRecord(response.data);
      const ip = body ? readField(body, "ip") : null;

      if (!body || !ip || !IpUtil.isValidIpv4(ip)) {
        logger.warn(
          "[Resolver] ipinfo.io did not return an IPv4 address, falling back to simple detection"
        );
        return null;
      }

      logger.debug(`[Resolver] Retrieved IP with geo data: ${ip}`);
      return {
        ip,
        geo: {
          city: readField(body, "city"),
          region: readField(body, "region"),
          country: readField(body, "country"),
          org: readField(body, "org"),
          timezone: readField(body, "timezone"),
        },
      };
    } catch (error) {
      logger.warn(
        `[Resolver] ipinfo.io failed: ${errorMessage(error)}, falling back to simple detection`
      );
      return null;
    }
  }

  private async query(service: LookupService): Promise<string | null> {
    try {
      logger.debug(`[Resolver] Trying ${service.name} (${service.url})`);
      const response = await this.http.get(service.url, {
        timeoutMs: this.options.timeoutMs,
      });
      const value = extractAddress(response.data, service.format);

      if (value === null) {
        logger.warn(`[Resolver] ${service.name} returned no address field`);
      }
      return value;
    } catch (error) {
      logger.warn(
        `[Resolver] Failed to get IP from ${service.name}: ${errorMessage(error)}`
      );
      return null;
    }
  }
}

/**
 * Pull an address string out of a service response body
 */
export function extractAddress(
  data: unknown,
  format: LookupService["format"]
): string | null {
  if (format === "text" || typeof data === "string") {
    if (typeof data !== "string") return null;
    const text = data.trim();
    if (text === "") return null;

    // Some text endpoints still answer with JSON
    if (text.startsWith("{")) {
      try {
        return extractAddress(JSON.parse(text), "json");
      } catch {
        return null;
      }
    }
    return text;
  }

  const body = asRecord(data);
  if (!body) return null;

  for (const field of ADDRESS_FIELDS) {
    const value = readField(body, field);
    if (value) return value;
  }
  return null;
}

function asRecord(data: unknown): Record<string, unknown> | null {
  return typeof data === "object" && data !== null && !Array.isArray(data)
    ? Object.fromEntries(Object.entries(data))
    : null;
}

function readField(body: Record<string, unknown>, field: string): string | null {
  const value = body[field];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}
