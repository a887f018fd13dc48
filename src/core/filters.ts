/**
 * AclKit — Filter-level helpers shared by renderers.
 */

import type { FilterEntry, Policy, Term } from '../types/index.js';
import { duplicateTermName, noPlatformPolicy } from './errors.js';

/** Filters whose header targets the platform, in policy order. */
export function filtersForPlatform(policy: Policy, platform: string): FilterEntry[] {
  const filters = policy.filters.filter(f => f.header.platforms.includes(platform));
  if (filters.length === 0) throw noPlatformPolicy(platform);
  return filters;
}

/** Names that appear more than once, each reported once, in first-seen order. */
export function findDuplicateTermNames(terms: readonly Pick<Term, 'name'>[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const { name } of terms) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  return [...duplicates];
}

/**
 * Throw DUPLICATE_TERM_NAME for the first repeated name. Pass the names a
 * renderer will emit (after fitting) to catch collisions introduced by
 * abbreviation or truncation.
 */
export function assertUniqueTermNames(terms: readonly Pick<Term, 'name'>[], platform?: string): void {
  const [first] = findDuplicateTermNames(terms);
  if (first !== undefined) throw duplicateTermName(first, platform);
}

export type AddressDirection = 'source' | 'destination';

export function noAddressFamilyMessage(termName: string, direction: AddressDirection, af: string): string {
  return `Term ${termName} will not be rendered, as it has ${direction} address match specified ` +
    `but no ${direction} addresses of ${af} address family are present.`;
}
