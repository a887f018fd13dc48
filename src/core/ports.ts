/**
 * AclKit — Port and protocol fix-ups.
 */

import type { PlatformCapabilities, PortRange, Term } from '../types/index.js';
import { establishedOption, unsupportedAddressFamily, unsupportedFilter } from './errors.js';

export const HIGH_PORTS: readonly [number, number] = Object.freeze([1024, 65535] as const);

const STATEFUL_PROTOCOLS = new Set(['tcp', 'udp']);

/**
 * Merge overlapping and adjacent ranges into the minimal sorted list of
 * disjoint ranges. Input is left untouched.
 */
export function collapsePortList(ports: readonly (readonly [number, number])[]): PortRange[] {
  const sorted = [...ports].sort((a, b) => a[0] - b[0] || a[1] - b[1]);
  const collapsed: PortRange[] = [];
  for (const [low, high] of sorted) {
    const last = collapsed[collapsed.length - 1];
    if (last && low <= last[1] + 1) {
      last[1] = Math.max(last[1], high);
    } else {
      collapsed.push([low, high]);
    }
  }
  return collapsed;
}

/** Protocols a term applies to, falling back to the platform default. */
export function effectiveProtocols(term: Term, platform: PlatformCapabilities): Set<string> {
  return term.protocol && term.protocol.length > 0
    ? new Set(term.protocol)
    : new Set([platform.defaultProtocol]);
}

/**
 * Return a term whose ports can express "established" on a stateless target.
 *
 * When the term carries an established option and only TCP/UDP, the result
 * is a deep copy with [1024, 65535] added to its destination ports and the
 * list collapsed. In every other successful case the input term itself is
 * returned.
 */
export function fixHighPorts(
  term: Term,
  platform: PlatformCapabilities,
  af = 'inet',
  allProtocolsStateful = platform.allProtocolsStateful,
): Term {
  const protocols = effectiveProtocols(term, platform);

  if (!platform.supportedAddressFamilies.includes(af)) {
    throw unsupportedAddressFamily(term.name, af, platform.platform);
  }

  const blacklist = platform.filterBlacklist[af];
  if (blacklist) {
    const rejected = blacklist.filter(p => protocols.has(p));
    if (rejected.length > 0) {
      throw unsupportedFilter(
        term.name,
        rejected,
        `${platform.platform} targets do not support protocol(s) ${rejected.join(', ')} ` +
          `with address family ${af} (in ${term.name})`,
        platform.platform,
      );
    }
  }

  const established = (term.option ?? []).find(opt => String(opt).startsWith('established'));
  if (established === undefined) return term;

  const unstateful = [...protocols].filter(p => !STATEFUL_PROTOCOLS.has(p));
  if (unstateful.length === 0) {
    const fixed = structuredClone(term);
    fixed.destination_port = collapsePortList([...(fixed.destination_port ?? []), HIGH_PORTS]);
    return fixed;
  }
  if (!allProtocolsStateful) {
    throw establishedOption(term.name, unstateful, platform.platform);
  }
  return term;
}
