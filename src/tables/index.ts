/**
 * AclKit Tables — Public API
 */

export {
  PROTOCOLS, PROTOCOLS_BY_NUMBER, ADDRESS_FAMILIES, ADDRESS_FAMILIES_BY_NUMBER,
  protocolNumber, protocolName, isAddressFamilyName, isAddressFamilyNumber,
} from './protocols.js';
export { ICMP_TYPES, parseIcmpTypeTable } from './icmp.js';
export type { IcmpTypeTable } from './icmp.js';
export { ABBREVIATIONS } from './abbreviations.js';
