#!/usr/bin/env node

/**
 * AclKit CLI
 *
 * Usage:
 *   aclkit validate <patterns...> -P <platform>   Check policy documents for a platform
 *   aclkit fit-name <name>                        Fit a term name to a platform limit
 *   aclkit platforms                              List known platform descriptors
 *   aclkit protocols                              Print the protocol table
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { fixTermLength, isAclError } from '../core/index.js';
import { loadPlatforms, type PlatformRegistry } from '../platforms/index.js';
import { loadPolicies } from '../policy/index.js';
import { PROTOCOLS } from '../tables/index.js';
import { createLogger, isLogLevel, type Logger, type LogLevel } from '../utils/logger.js';
import type { PlatformCapabilities, TermDiagnostic } from '../types/index.js';
import { checkPolicy } from './check.js';

const program = new Command();

program
  .name('aclkit')
  .description('AclKit — Term normalization and validation for multi-platform ACL generators.')
  .version('1.0.0')
  .option('-r, --root <dir>', 'Project root holding .aclkit/platforms.json', '.')
  .option('-v, --verbose', 'Log debug output');

// ─── Shared setup ────────────────────────────────────────────────────

interface GlobalOptions {
  root: string;
  verbose?: boolean;
}

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function makeLogger(opts: GlobalOptions): Logger {
  const envLevel = process.env.ACLKIT_LOG_LEVEL;
  const level: LogLevel = opts.verbose ? 'debug' : isLogLevel(envLevel) ? envLevel : 'warn';
  return createLogger({ level });
}

function registry(opts: GlobalOptions): PlatformRegistry {
  return loadPlatforms({ root: resolve(opts.root) });
}

function requirePlatform(reg: PlatformRegistry, name: string): PlatformCapabilities {
  const caps = reg.get(name);
  if (!caps) {
    console.error(chalk.red(`Unknown platform "${name}". Known platforms: ${reg.names().join(', ')}`));
    process.exit(2);
  }
  return caps;
}

function parseLength(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Must be a positive integer.');
  return n;
}

// ─── validate ────────────────────────────────────────────────────────

program
  .command('validate')
  .description('Check policy documents against a platform: keywords, ICMP types, established ports, term names')
  .argument('<patterns...>', 'Policy JSON files or glob patterns')
  .requiredOption('-P, --platform <name>', 'Target platform')
  .option('--af <family>', 'Address family to check terms for', 'inet')
  .option('--abbreviate', 'Allow abbreviation of long term names')
  .option('--truncate', 'Allow truncation of long term names')
  .action(async (patterns: string[], opts: { platform: string; af: string; abbreviate?: boolean; truncate?: boolean }) => {
    const global = globalOptions();
    const logger = makeLogger(global);
    const caps = requirePlatform(registry(global), opts.platform);

    const policies = await loadPolicies(patterns);
    if (policies.length === 0) {
      console.error(chalk.yellow(`No policy files matched ${patterns.join(' ')}`));
      process.exit(1);
    }

    const diagnostics: TermDiagnostic[] = [];
    let terms = 0;
    for (const { file, policy } of policies) {
      const result = checkPolicy(file, policy, caps, {
        af: opts.af,
        abbreviate: opts.abbreviate ?? false,
        truncate: opts.truncate ?? false,
        logger,
      });
      diagnostics.push(...result.diagnostics);
      terms += result.termsChecked;
    }

    printDiagnostics(diagnostics);
    const errorCount = diagnostics.filter(d => d.level === 'error').length;
    if (errorCount === 0) {
      console.error(chalk.green(`✓ ${terms} term(s) in ${policies.length} file(s) valid for ${caps.platform}.`));
    }
    process.exit(errorCount > 0 ? 1 : 0);
  });

// ─── fit-name ────────────────────────────────────────────────────────

program
  .command('fit-name')
  .description('Fit a term name to a platform length limit')
  .argument('<name>', 'Term name')
  .option('-P, --platform <name>', 'Take the length limit from this platform')
  .option('-m, --max-length <n>', 'Length limit (overrides --platform)', parseLength)
  .option('--abbreviate', 'Allow abbreviation')
  .option('--truncate', 'Allow truncation')
  .action((name: string, opts: { platform?: string; maxLength?: number; abbreviate?: boolean; truncate?: boolean }) => {
    const global = globalOptions();
    const maxLength = opts.maxLength
      ?? (opts.platform ? requirePlatform(registry(global), opts.platform).termMaxLength : undefined);
    try {
      console.log(fixTermLength(name, { abbreviate: opts.abbreviate, truncate: opts.truncate, maxLength }));
    } catch (err) {
      if (!isAclError(err)) throw err;
      console.error(chalk.red(`✗ ${err.message}`));
      process.exit(1);
    }
  });

// ─── platforms ───────────────────────────────────────────────────────

program
  .command('platforms')
  .description('List known platform descriptors')
  .option('--json', 'Output as JSON')
  .action((opts: { json?: boolean }) => {
    const platforms = registry(globalOptions()).list();
    if (opts.json) {
      console.log(JSON.stringify(platforms.map(p => ({
        ...p,
        requiredKeywords: [...p.requiredKeywords].sort(),
        optionalKeywords: [...p.optionalKeywords].sort(),
      })), null, 2));
      return;
    }
    for (const p of platforms) {
      console.log(`${chalk.bold(p.platform.padEnd(22))} ` +
        `af=${p.supportedAddressFamilies.join(',')} ` +
        `max=${p.termMaxLength} ` +
        `default=${p.defaultProtocol}` +
        (p.allProtocolsStateful ? chalk.dim(' stateful') : ''));
    }
  });

// ─── protocols ───────────────────────────────────────────────────────

program
  .command('protocols')
  .description('Print the protocol name/number table')
  .action(() => {
    for (const [name, num] of Object.entries(PROTOCOLS)) {
      console.log(`${String(num).padStart(3)}  ${name}`);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});

// ─── Helpers ─────────────────────────────────────────────────────────

function printDiagnostics(diagnostics: TermDiagnostic[]) {
  for (const d of diagnostics) {
    const prefix = d.level === 'error' ? chalk.red('✗') : chalk.yellow('⚠');
    const where = d.term ? `${d.file} [${d.term}]` : d.file;
    console.error(`${prefix} ${where}: ${d.message}`);
  }
  if (diagnostics.length > 0) {
    const errors = diagnostics.filter(d => d.level === 'error').length;
    const warnings = diagnostics.filter(d => d.level === 'warning').length;
    console.error(`\n${errors} error(s), ${warnings} warning(s)\n`);
  }
}
