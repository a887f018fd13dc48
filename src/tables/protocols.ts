/**
 * AclKit — Protocol and address family tables.
 * Both directions of every mapping are frozen at module load.
 */

import type { AddressFamilyName, AddressFamilyNumber } from '../types/index.js';

export const PROTOCOLS: Readonly<Record<string, number>> = Object.freeze({
  'ip': 0,
  'icmp': 1,
  'igmp': 2,
  'ggp': 3,
  'ipencap': 4,
  'tcp': 6,
  'egp': 8,
  'igp': 9,
  'udp': 17,
  'rdp': 27,
  'ipv6': 41,
  'ipv6-route': 43,
  'ipv6-frag': 44,
  'rsvp': 46,
  'gre': 47,
  'esp': 50,
  'ah': 51,
  'icmpv6': 58,
  'ipv6-nonxt': 59,
  'ipv6-opts': 60,
  'ospf': 89,
  'ipip': 94,
  'pim': 103,
  'vrrp': 112,
  'l2tp': 115,
  'sctp': 132,
});

export const PROTOCOLS_BY_NUMBER: ReadonlyMap<number, string> = new Map(
  Object.entries(PROTOCOLS).map(([name, num]) => [num, name]),
);

export const ADDRESS_FAMILIES: Readonly<Record<AddressFamilyName, AddressFamilyNumber>> = Object.freeze({
  inet: 4,
  inet6: 6,
  // legacy alias; selects output without adding a numeric space
  bridge: 4,
});

export const ADDRESS_FAMILIES_BY_NUMBER: Readonly<Record<AddressFamilyNumber, AddressFamilyName>> = Object.freeze({
  4: 'inet',
  6: 'inet6',
});

export function protocolNumber(name: string): number | undefined {
  return Object.hasOwn(PROTOCOLS, name) ? PROTOCOLS[name] : undefined;
}

export function protocolName(num: number): string | undefined {
  return PROTOCOLS_BY_NUMBER.get(num);
}

export function isAddressFamilyName(value: unknown): value is AddressFamilyName {
  return typeof value === 'string' && Object.hasOwn(ADDRESS_FAMILIES, value);
}

export function isAddressFamilyNumber(value: unknown): value is AddressFamilyNumber {
  return value === 4 || value === 6;
}
