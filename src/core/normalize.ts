/**
 * AclKit — Term normalizer.
 * Address family coercion and ICMP type resolution for a single term.
 */

import { ADDRESS_FAMILIES, ICMP_TYPES, isAddressFamilyName, isAddressFamilyNumber } from '../tables/index.js';
import type { IcmpTypeTable } from '../tables/index.js';
import type { AddressFamilyNumber } from '../types/index.js';
import { mismatchIcmpInet, unknownIcmpType, unsupportedAddressFamily, unsupportedFilter } from './errors.js';

/** Sentinel returned when a term matches every ICMP type. */
export const ANY_ICMP_TYPE = '';

export type IcmpCodeList = number[] | [typeof ANY_ICMP_TYPE];

/**
 * Convert an address family name to its numeric value.
 * Numeric values pass through unchanged.
 */
export function normalizeAddressFamily(af: unknown, termName: string): AddressFamilyNumber {
  if (isAddressFamilyNumber(af)) return af;
  if (isAddressFamilyName(af)) return ADDRESS_FAMILIES[af];
  throw unsupportedAddressFamily(termName, String(af));
}

function isExactly(protocols: readonly string[], name: string): boolean {
  return protocols.length === 1 && protocols[0] === name;
}

/**
 * Return the sorted numeric codes for a term's ICMP types.
 *
 * An empty list yields `[ANY_ICMP_TYPE]`. Otherwise the protocol list must
 * be exactly `icmp` (IPv4) or `icmpv6` (IPv6) and every name must exist in
 * the ICMP table of that family.
 */
export function normalizeIcmpTypes(
  icmpTypes: readonly string[],
  protocols: readonly string[],
  af: unknown,
  termName: string,
  table: IcmpTypeTable = ICMP_TYPES,
): IcmpCodeList {
  if (icmpTypes.length === 0) return [ANY_ICMP_TYPE];

  const isIcmp = isExactly(protocols, 'icmp');
  const isIcmpv6 = isExactly(protocols, 'icmpv6');
  if (!isIcmp && !isIcmpv6) {
    throw unsupportedFilter(
      termName,
      [...protocols],
      `icmp-types specified for non-icmp protocols in term: ${termName}`,
    );
  }

  const family = normalizeAddressFamily(af, termName);
  if ((isIcmp && family !== 4) || (isIcmpv6 && family !== 6)) {
    throw mismatchIcmpInet(termName, protocols[0], family);
  }

  const codes = table[family];
  const resolved: number[] = [];
  for (const icmpType of icmpTypes) {
    if (!Object.hasOwn(codes, icmpType)) {
      throw unknownIcmpType(termName, icmpType, family);
    }
    resolved.push(codes[icmpType]);
  }
  return resolved.sort((a, b) => a - b);
}
