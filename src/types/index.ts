/**
 * AclKit — Core type definitions.
 * Shapes of the policy object graph consumed by the core and of the
 * per-platform capability descriptors.
 */

// ─── Address families ────────────────────────────────────────────────

export type AddressFamilyName = 'inet' | 'inet6' | 'bridge';

/** Numeric address family. `bridge` resolves to 4. */
export type AddressFamilyNumber = 4 | 6;

export type AddressFamily = AddressFamilyName | AddressFamilyNumber;

// ─── Terms ───────────────────────────────────────────────────────────

/** Closed interval of 16-bit ports. */
export type PortRange = [low: number, high: number];

/**
 * A single filter term as produced by the policy front end.
 * Field names are the policy keywords, so keyword validation can
 * walk the record directly.
 */
export interface Term {
  name: string;
  action?: string[];
  comment?: string[];
  protocol?: string[];
  option?: string[];
  source_address?: string[];
  source_address_exclude?: string[];
  source_port?: PortRange[];
  destination_address?: string[];
  destination_address_exclude?: string[];
  destination_port?: PortRange[];
  icmp_type?: string[];
  platform?: string[];
  platform_exclude?: string[];
  verbatim?: string[];
  translated?: boolean;
  [keyword: string]: unknown;
}

// ─── Filters ─────────────────────────────────────────────────────────

export interface Header {
  /** Platforms this filter is rendered for */
  platforms: string[];
  /** Filter options per platform, e.g. { juniper: ['edge-inbound', 'inet6'] } */
  options?: Record<string, string[]>;
  comment?: string[];
}

export interface FilterEntry {
  header: Header;
  terms: Term[];
}

export interface Policy {
  filters: FilterEntry[];
}

// ─── Platforms ───────────────────────────────────────────────────────

export interface PlatformCapabilities {
  /** Platform identifier as it appears in header platform lists */
  platform: string;
  /** Protocol assumed when a term declares none */
  defaultProtocol: string;
  /** Address family names this platform can render */
  supportedAddressFamilies: readonly string[];
  /** Protocols rejected for a given address family name */
  filterBlacklist: Readonly<Record<string, readonly string[]>>;
  requiredKeywords: ReadonlySet<string>;
  optionalKeywords: ReadonlySet<string>;
  termMaxLength: number;
  /** Platform keeps connection state for every protocol */
  allProtocolsStateful: boolean;
}

/** Descriptor fields as written in configuration; everything but the name is optional. */
export interface PlatformDefinition {
  platform: string;
  defaultProtocol?: string;
  supportedAddressFamilies?: string[];
  filterBlacklist?: Record<string, string[]>;
  requiredKeywords?: string[];
  optionalKeywords?: string[];
  termMaxLength?: number;
  allProtocolsStateful?: boolean;
}

// ─── Diagnostics ─────────────────────────────────────────────────────

export interface TermDiagnostic {
  level: 'error' | 'warning';
  message: string;
  file: string;
  term?: string;
  platform?: string;
}
