/**
 * AclKit — Policy document loading.
 * Expands file patterns and reads each match as a policy document.
 */

import fg from 'fast-glob';
import { readFile } from 'node:fs/promises';
import { relative } from 'node:path';
import { invalidDocument } from '../core/errors.js';
import type { Policy } from '../types/index.js';
import { parsePolicy } from './schema.js';

export interface LoadedPolicy {
  /** Path relative to the search root */
  file: string;
  policy: Policy;
}

export interface LoadPoliciesOptions {
  /** Directory patterns are resolved against (default: process.cwd()) */
  cwd?: string;
  /** Glob patterns to skip */
  exclude?: string[];
}

const DEFAULT_EXCLUDE = ['**/node_modules/**', '**/dist/**', '**/.git/**'];

export async function loadPolicyFile(path: string, label = path): Promise<Policy> {
  const text = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw invalidDocument(label, [err instanceof Error ? err.message : String(err)]);
  }
  return parsePolicy(raw, label);
}

/**
 * Load every policy matching the patterns, sorted by path so runs are
 * reproducible.
 */
export async function loadPolicies(patterns: string[], options: LoadPoliciesOptions = {}): Promise<LoadedPolicy[]> {
  const cwd = options.cwd ?? process.cwd();
  const files = await fg(patterns, {
    cwd,
    ignore: options.exclude ?? DEFAULT_EXCLUDE,
    absolute: true,
    onlyFiles: true,
  });
  files.sort();

  const loaded: LoadedPolicy[] = [];
  for (const path of files) {
    const file = relative(cwd, path);
    loaded.push({ file, policy: await loadPolicyFile(path, file) });
  }
  return loaded;
}
