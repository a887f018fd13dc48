/**
 * AclKit — Term name fitting.
 *
 * Shortens a name in two optional steps: ordered abbreviation, then hard
 * truncation. Same input and flags always give the same output.
 */

import { ABBREVIATIONS } from '../tables/index.js';
import { DEFAULT_TERM_MAX_LENGTH } from '../platforms/index.js';
import { termNameTooLong } from './errors.js';

export interface FixTermLengthOptions {
  /** Replace known words with their short codes (default: false) */
  abbreviate?: boolean;
  /** Drop trailing characters past the limit (default: false) */
  truncate?: boolean;
  /** Longest name the platform accepts (default: 62) */
  maxLength?: number;
}

/**
 * Return `name` fitted to `maxLength`, or throw TERM_NAME_TOO_LONG when the
 * enabled steps cannot make it fit.
 */
export function fixTermLength(name: string, options: FixTermLengthOptions = {}): string {
  const { abbreviate = false, truncate = false, maxLength = DEFAULT_TERM_MAX_LENGTH } = options;

  let fitted = name;
  if (abbreviate) {
    for (const [word, short] of ABBREVIATIONS) {
      if (fitted.length <= maxLength) return fitted;
      fitted = fitted.replaceAll(word, short);
    }
  }
  if (truncate) {
    fitted = fitted.slice(0, maxLength);
  }
  if (fitted.length <= maxLength) return fitted;

  throw termNameTooLong(fitted, name, maxLength);
}
