/**
 * AclKit — Keyword validation.
 *
 * Rejects a policy that asks a platform for keywords it cannot render.
 * Runs once, when a generator is built, over every term that is active
 * on the target platform.
 */

import type { Policy, PlatformCapabilities, Term } from '../types/index.js';
import { validKeywords } from '../platforms/index.js';
import { unsupportedFilter } from './errors.js';

/** Fields starting with this marker are implementation state, not keywords. */
export const INTERNAL_FIELD_PREFIX = 'flatten';

/**
 * Whether a policy value counts as set. Empty lists, empty records,
 * empty strings, zero and false are all unset.
 */
export function isPopulated(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (value === 0 || value === '') return false;
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Set || value instanceof Map) return value.size > 0;
  if (typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length > 0;
  }
  return true;
}

/**
 * A term is active unless its platform list omits the platform or its
 * platform_exclude list names it.
 */
export function isTermActive(term: Term, platform: string): boolean {
  if (term.platform && term.platform.length > 0 && !term.platform.includes(platform)) return false;
  if (term.platform_exclude && term.platform_exclude.length > 0 && term.platform_exclude.includes(platform)) {
    return false;
  }
  return true;
}

/** Populated fields of a term that the keyword set does not cover. */
export function unsupportedKeywords(term: Term, keywords: ReadonlySet<string>): string[] {
  const found: string[] = [];
  for (const [field, value] of Object.entries(term)) {
    if (!isPopulated(value)) continue;
    if (keywords.has(field) || field.startsWith(INTERNAL_FIELD_PREFIX)) continue;
    found.push(field);
  }
  return found;
}

/**
 * Check every active term of every filter targeting the platform.
 * Throws UNSUPPORTED_FILTER naming all offending fields of the first
 * failing term.
 */
export function validateKeywords(policy: Policy, platform: PlatformCapabilities): void {
  const keywords = validKeywords(platform);

  for (const { header, terms } of policy.filters) {
    if (!header.platforms.includes(platform.platform)) continue;

    for (const term of terms) {
      if (!isTermActive(term, platform.platform)) continue;

      const unsupported = unsupportedKeywords(term, keywords);
      if (unsupported.length > 0) {
        throw unsupportedFilter(
          term.name,
          unsupported,
          `${term.name} unsupported optional keywords for target ${platform.platform} in policy: ${unsupported.join(' ')}`,
          platform.platform,
        );
      }
    }
  }
}
