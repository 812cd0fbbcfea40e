/**
 * IPv4 address checks
 */
export class IpUtil {
  /**
   * Validate if the given string is a valid dotted-quad IPv4 address
   */
  static isValidIpv4(ip: string): boolean {
    const pattern = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
    if (!pattern.test(ip)) return false;

    // Leading zeros are rejected: some resolvers read them as octal
    return ip
      .split(".")
      .every(
        (octet) =>
          (octet.length === 1 || !octet.startsWith("0")) && Number(octet) <= 255
      );
  }
}
