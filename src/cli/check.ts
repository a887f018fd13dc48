/**
 * AclKit CLI — Policy checks.
 * Runs every core operation a renderer would run for each active term and
 * collects failures as diagnostics instead of stopping at the first one.
 */

import { AclErrorCode, AclGenerator, isAclError, isTermActive } from '../core/index.js';
import type { FilterEntry, PlatformCapabilities, Policy, Term, TermDiagnostic } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export interface CheckOptions {
  /** Address family name terms are rendered for */
  af: string;
  abbreviate: boolean;
  truncate: boolean;
  logger?: Logger;
}

export interface CheckResult {
  diagnostics: TermDiagnostic[];
  termsChecked: number;
  /** Term names as they would be emitted, per filter */
  names: string[][];
}

function toDiagnostic(err: unknown, file: string, platform: string, term?: string): TermDiagnostic {
  if (!isAclError(err)) throw err;
  return { level: 'error', message: err.message, file, term, platform };
}

function checkTerm(gen: AclGenerator, term: Term, options: CheckOptions): string {
  gen.normalizeIcmpTypes(term, options.af);
  gen.fixHighPorts(term, options.af);
  return gen.fixTermLength(term.name, options.abbreviate, options.truncate);
}

export function checkPolicy(
  file: string,
  policy: Policy,
  capabilities: PlatformCapabilities,
  options: CheckOptions,
): CheckResult {
  const platform = capabilities.platform;
  const result: CheckResult = { diagnostics: [], termsChecked: 0, names: [] };

  let gen: AclGenerator;
  try {
    gen = new AclGenerator(policy, capabilities, { logger: options.logger });
  } catch (err) {
    result.diagnostics.push(toDiagnostic(err, file, platform));
    return result;
  }

  let filters: FilterEntry[];
  try {
    filters = gen.filters();
  } catch (err) {
    if (!isAclError(err, AclErrorCode.NO_PLATFORM_POLICY)) throw err;
    result.diagnostics.push({
      level: 'warning',
      message: `No filter header targets platform ${platform}`,
      file,
      platform,
    });
    return result;
  }

  for (const { terms } of filters) {
    const emitted: string[] = [];
    for (const term of terms) {
      if (!isTermActive(term, platform)) continue;
      result.termsChecked++;
      try {
        emitted.push(checkTerm(gen, term, options));
      } catch (err) {
        result.diagnostics.push(toDiagnostic(err, file, platform, term.name));
      }
    }
    try {
      gen.assertUniqueTermNames(emitted.map(name => ({ name })));
    } catch (err) {
      result.diagnostics.push(toDiagnostic(err, file, platform));
    }
    result.names.push(emitted);
  }

  return result;
}
