import {
  AddressPair,
  ChangeEvent,
  ChangeKind,
  GeoInfo,
} from "../models/address-data";

export type AddressFamily = "ipv4" | "ipv6";

/**
 * Classifies a freshly resolved address pair against the stored one.
 * Comparison is plain string equality; addresses are not canonicalised.
 */
export class ChangeDetector {
  static classify(current: AddressPair, previous: AddressPair): ChangeKind {
    if (previous.ipv4 === null && previous.ipv6 === null) {
      return "first_run";
    }

    const ipv4Changed = current.ipv4 !== previous.ipv4;
    const ipv6Changed = current.ipv6 !== previous.ipv6;

    if (ipv4Changed && ipv6Changed) return "both_changed";
    if (ipv4Changed) return "ipv4_changed";
    if (ipv6Changed) return "ipv6_changed";
    return "unchanged";
  }

  static buildEvent(
    current: AddressPair,
    previous: AddressPair,
    geo: GeoInfo | null = null
  ): ChangeEvent {
    return {
      kind: this.classify(current, previous),
      current: { ipv4: current.ipv4, ipv6: current.ipv6 },
      previous: { ipv4: previous.ipv4, ipv6: previous.ipv6 },
      geo,
    };
  }

  /**
   * Families whose value differs between the two snapshots of an event
   */
  static changedFamilies(event: ChangeEvent): AddressFamily[] {
    switch (event.kind) {
      case "both_changed":
        return ["ipv4", "ipv6"];
      case "ipv4_changed":
        return ["ipv4"];
      case "ipv6_changed":
        return ["ipv6"];
      case "first_run":
      case "unchanged":
        return [];
    }
  }
}
