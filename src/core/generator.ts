/**
 * AclKit — Generator context.
 *
 * One instance per (policy, platform). Construction validates keywords for
 * every term aimed at the platform, so a renderer never starts emitting
 * output for a policy it cannot express. The methods are the sanctioned
 * way for a renderer to normalize and adapt terms before rendering them.
 */

import type { AddressFamilyNumber, FilterEntry, PlatformCapabilities, Policy, Term } from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { validateKeywords } from './keywords.js';
import { normalizeAddressFamily, normalizeIcmpTypes, type IcmpCodeList } from './normalize.js';
import { fixHighPorts } from './ports.js';
import { fixTermLength } from './term-name.js';
import {
  assertUniqueTermNames, filtersForPlatform, noAddressFamilyMessage, type AddressDirection,
} from './filters.js';

export interface AclGeneratorOptions {
  logger?: Logger;
}

export class AclGenerator {
  readonly policy: Policy;
  readonly capabilities: PlatformCapabilities;
  private readonly logger: Logger;

  constructor(policy: Policy, capabilities: PlatformCapabilities, options: AclGeneratorOptions = {}) {
    this.policy = policy;
    this.capabilities = capabilities;
    this.logger = options.logger ?? silentLogger;

    validateKeywords(policy, capabilities);
    this.logger.debug('Keywords validated', {
      platform: capabilities.platform,
      filters: policy.filters.length,
    });
  }

  get platform(): string {
    return this.capabilities.platform;
  }

  /** Filters targeting this platform; throws NO_PLATFORM_POLICY when there are none. */
  filters(): FilterEntry[] {
    return filtersForPlatform(this.policy, this.platform);
  }

  normalizeAddressFamily(af: unknown, term: Term): AddressFamilyNumber {
    return normalizeAddressFamily(af, term.name);
  }

  normalizeIcmpTypes(term: Term, af: unknown): IcmpCodeList {
    return normalizeIcmpTypes(term.icmp_type ?? [], term.protocol ?? [], af, term.name);
  }

  fixHighPorts(term: Term, af = 'inet', allProtocolsStateful = this.capabilities.allProtocolsStateful): Term {
    const fixed = fixHighPorts(term, this.capabilities, af, allProtocolsStateful);
    if (fixed !== term) {
      this.logger.debug('Added high ports for established term', { term: term.name, af });
    }
    return fixed;
  }

  fixTermLength(name: string, abbreviate = false, truncate = false): string {
    const fitted = fixTermLength(name, { abbreviate, truncate, maxLength: this.capabilities.termMaxLength });
    if (fitted !== name) {
      this.logger.info('Shortened term name', { from: name, to: fitted, platform: this.platform });
    }
    return fitted;
  }

  assertUniqueTermNames(terms: readonly Pick<Term, 'name'>[]): void {
    assertUniqueTermNames(terms, this.platform);
  }

  /**
   * Report a term dropped because none of its addresses in one direction
   * belong to the address family being rendered.
   */
  logSkippedTerm(term: Term, direction: AddressDirection, af: string): void {
    this.logger.warn(noAddressFamilyMessage(term.name, direction, af), { platform: this.platform });
  }
}
