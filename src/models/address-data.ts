/**
 * A snapshot of the host's public addresses, either freshly resolved or
 * read back from the state store.
 */
export interface AddressPair {
  ipv4: string | null;
  ipv6: string | null;
}

/**
 * Location details attached to a resolution when a geo provider is configured.
 * Only used for rendering notifications, never persisted.
 */
export interface GeoInfo {
  city: string | null;
  region: string | null;
  country: string | null;
  org: string | null;
  timezone: string | null;
}

export interface ResolvedAddresses {
  addresses: AddressPair;
  geo: GeoInfo | null;
}

export type ChangeKind =
  | "first_run"
  | "ipv4_changed"
  | "ipv6_changed"
  | "both_changed"
  | "unchanged";

export interface ChangeEvent {
  kind: ChangeKind;
  current: AddressPair;
  previous: AddressPair;
  geo: GeoInfo | null;
}

/**
 * On-disk record written by the state store
 */
export interface PersistedState {
  ipv4: string | null;
  ipv6: string | null;
  last_updated: string;
}
