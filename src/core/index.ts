/**
 * AclKit Core — Public API
 */

export { AclGenerator } from './generator.js';
export type { AclGeneratorOptions } from './generator.js';
export { normalizeAddressFamily, normalizeIcmpTypes, ANY_ICMP_TYPE } from './normalize.js';
export type { IcmpCodeList } from './normalize.js';
export {
  validateKeywords, unsupportedKeywords, isTermActive, isPopulated, INTERNAL_FIELD_PREFIX,
} from './keywords.js';
export { fixHighPorts, collapsePortList, effectiveProtocols, HIGH_PORTS } from './ports.js';
export { fixTermLength } from './term-name.js';
export type { FixTermLengthOptions } from './term-name.js';
export {
  filtersForPlatform, findDuplicateTermNames, assertUniqueTermNames, noAddressFamilyMessage,
} from './filters.js';
export type { AddressDirection } from './filters.js';
export { AclError, AclErrorCode, isAclError } from './errors.js';
export type { AclErrorDetails, AclErrorDetailsMap } from './errors.js';
