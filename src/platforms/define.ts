/**
 * AclKit — Platform capability descriptors.
 *
 * A descriptor holds everything the core needs to know about a target:
 * keyword support, address families, protocol blacklist, name length
 * limit and statefulness. Renderers pass it to the core instead of
 * subclassing a shared generator.
 */

import type { PlatformCapabilities, PlatformDefinition } from '../types/index.js';

/** Keywords every platform must render. `name` and `translated` are term attributes. */
export const REQUIRED_KEYWORDS: ReadonlySet<string> = new Set([
  'action',
  'comment',
  'destination_address',
  'destination_address_exclude',
  'destination_port',
  'icmp_type',
  'name',
  'option',
  'protocol',
  'platform',
  'platform_exclude',
  'source_address',
  'source_address_exclude',
  'source_port',
  'translated',
  'verbatim',
]);

export const DEFAULT_PROTOCOL = 'ip';
export const DEFAULT_ADDRESS_FAMILIES: readonly string[] = Object.freeze(['inet', 'inet6']);
export const DEFAULT_TERM_MAX_LENGTH = 62;

export function definePlatform(def: PlatformDefinition): PlatformCapabilities {
  const blacklist: Record<string, readonly string[]> = {};
  for (const [af, protocols] of Object.entries(def.filterBlacklist ?? {})) {
    blacklist[af] = Object.freeze([...protocols]);
  }

  return Object.freeze({
    platform: def.platform,
    defaultProtocol: def.defaultProtocol ?? DEFAULT_PROTOCOL,
    supportedAddressFamilies: Object.freeze([...(def.supportedAddressFamilies ?? DEFAULT_ADDRESS_FAMILIES)]),
    filterBlacklist: Object.freeze(blacklist),
    requiredKeywords: def.requiredKeywords ? new Set(def.requiredKeywords) : REQUIRED_KEYWORDS,
    optionalKeywords: new Set(def.optionalKeywords ?? []),
    termMaxLength: def.termMaxLength ?? DEFAULT_TERM_MAX_LENGTH,
    allProtocolsStateful: def.allProtocolsStateful ?? false,
  });
}

/** Required plus optional keywords. */
export function validKeywords(platform: PlatformCapabilities): Set<string> {
  return new Set([...platform.requiredKeywords, ...platform.optionalKeywords]);
}
