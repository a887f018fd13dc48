/**
 * Error taxonomy for term normalization and validation.
 *
 * Every failure is an `AclError` with a stable `code` and a payload whose
 * shape is fixed by that code. Codes are safe to match on downstream.
 */

export const AclErrorCode = {
  UNSUPPORTED_ADDRESS_FAMILY: 'UNSUPPORTED_ADDRESS_FAMILY',
  UNSUPPORTED_FILTER: 'UNSUPPORTED_FILTER',
  UNKNOWN_ICMP_TYPE: 'UNKNOWN_ICMP_TYPE',
  MISMATCH_ICMP_INET: 'MISMATCH_ICMP_INET',
  ESTABLISHED_OPTION: 'ESTABLISHED_OPTION',
  TERM_NAME_TOO_LONG: 'TERM_NAME_TOO_LONG',
  DUPLICATE_TERM_NAME: 'DUPLICATE_TERM_NAME',
  NO_PLATFORM_POLICY: 'NO_PLATFORM_POLICY',
  INVALID_DOCUMENT: 'INVALID_DOCUMENT',
} as const;

export type AclErrorCode = (typeof AclErrorCode)[keyof typeof AclErrorCode];

export interface AclErrorDetailsMap {
  UNSUPPORTED_ADDRESS_FAMILY: { term: string; addressFamily: string; platform?: string };
  UNSUPPORTED_FILTER: { term: string; platform?: string; values: string[] };
  UNKNOWN_ICMP_TYPE: { term: string; icmpType: string; addressFamily: number };
  MISMATCH_ICMP_INET: { term: string; protocol: string; addressFamily: number };
  ESTABLISHED_OPTION: { term: string; protocols: string[]; platform?: string };
  TERM_NAME_TOO_LONG: { name: string; original: string; maxLength: number; length: number };
  DUPLICATE_TERM_NAME: { term: string; platform?: string };
  NO_PLATFORM_POLICY: { platform: string };
  INVALID_DOCUMENT: { source: string; issues: string[] };
}

export type AclErrorDetails<C extends AclErrorCode = AclErrorCode> = AclErrorDetailsMap[C];

export class AclError<C extends AclErrorCode = AclErrorCode> extends Error {
  readonly code: C;
  readonly details: AclErrorDetails<C>;

  constructor(code: C, details: AclErrorDetails<C>, message: string) {
    super(message);
    this.name = 'AclError';
    this.code = code;
    this.details = details;
  }

  toJSON(): { code: C; message: string; details: AclErrorDetails<C> } {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export function isAclError<C extends AclErrorCode>(err: unknown, code?: C): err is AclError<C> {
  return err instanceof AclError && (code === undefined || err.code === code);
}

// ─── Constructors ────────────────────────────────────────────────────

export function unsupportedAddressFamily(
  term: string, addressFamily: string | number, platform?: string,
): AclError<'UNSUPPORTED_ADDRESS_FAMILY'> {
  const af = String(addressFamily);
  const message = platform
    ? `Address family ${af}, found in ${term}, unsupported by ${platform}`
    : `Address family ${af} is not supported, term ${term}.`;
  return new AclError(AclErrorCode.UNSUPPORTED_ADDRESS_FAMILY, { term, addressFamily: af, platform }, message);
}

export function unsupportedFilter(
  term: string, values: string[], message: string, platform?: string,
): AclError<'UNSUPPORTED_FILTER'> {
  return new AclError(AclErrorCode.UNSUPPORTED_FILTER, { term, platform, values }, message);
}

export function unknownIcmpType(term: string, icmpType: string, addressFamily: number): AclError<'UNKNOWN_ICMP_TYPE'> {
  return new AclError(
    AclErrorCode.UNKNOWN_ICMP_TYPE,
    { term, icmpType, addressFamily },
    `Unrecognized ICMP-type (${icmpType}) specified in term ${term}`,
  );
}

export function mismatchIcmpInet(term: string, protocol: string, addressFamily: number): AclError<'MISMATCH_ICMP_INET'> {
  return new AclError(
    AclErrorCode.MISMATCH_ICMP_INET,
    { term, protocol, addressFamily },
    `ICMP/ICMPv6 mismatch with address family IPv4/IPv6 in term ${term}`,
  );
}

export function establishedOption(
  term: string, protocols: string[], platform?: string,
): AclError<'ESTABLISHED_OPTION'> {
  return new AclError(
    AclErrorCode.ESTABLISHED_OPTION,
    { term, protocols, platform },
    `Established option supplied with inappropriate protocol(s) ${protocols.join(', ')} in term ${term}`,
  );
}

export function termNameTooLong(
  name: string, original: string, maxLength: number,
): AclError<'TERM_NAME_TOO_LONG'> {
  return new AclError(
    AclErrorCode.TERM_NAME_TOO_LONG,
    { name, original, maxLength, length: name.length },
    `Term ${name} (originally ${original}) is too long. Limit is ${maxLength} characters ` +
      `(vs. ${name.length}) and no abbreviations remain or abbreviations disabled.`,
  );
}

export function duplicateTermName(term: string, platform?: string): AclError<'DUPLICATE_TERM_NAME'> {
  const where = platform ? ` for ${platform}` : '';
  return new AclError(AclErrorCode.DUPLICATE_TERM_NAME, { term, platform }, `Duplicate term name${where}: ${term}`);
}

export function noPlatformPolicy(platform: string): AclError<'NO_PLATFORM_POLICY'> {
  return new AclError(
    AclErrorCode.NO_PLATFORM_POLICY,
    { platform },
    `Policy has no filter header targeting platform ${platform}`,
  );
}

export function invalidDocument(source: string, issues: string[]): AclError<'INVALID_DOCUMENT'> {
  return new AclError(
    AclErrorCode.INVALID_DOCUMENT,
    { source, issues },
    `Invalid document ${source}:\n  ${issues.join('\n  ')}`,
  );
}
