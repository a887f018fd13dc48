/**
 * AclKit — Platform registry.
 *
 * Resolution order (highest to lowest priority):
 *   1. File named by ACLKIT_PLATFORMS
 *   2. Project file: <root>/.aclkit/platforms.json
 *   3. Built-in descriptors: data/platforms.json
 *
 * A platform defined by a higher-priority source replaces the whole
 * descriptor of the same name; fields are not merged.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { invalidDocument } from '../core/errors.js';
import type { PlatformCapabilities, PlatformDefinition } from '../types/index.js';
import { definePlatform } from './define.js';

// ─── Schema ──────────────────────────────────────────────────────────

const keyword = z.string().regex(/^[a-z][a-z0-9_]*$/, 'keywords are lowercase snake_case');

export const PlatformDefinitionSchema = z.object({
  platform: z.string().min(1),
  defaultProtocol: z.string().min(1).optional(),
  supportedAddressFamilies: z.array(z.string().min(1)).nonempty().optional(),
  filterBlacklist: z.record(z.string(), z.array(z.string().min(1))).optional(),
  requiredKeywords: z.array(keyword).optional(),
  optionalKeywords: z.array(keyword).optional(),
  termMaxLength: z.number().int().positive().optional(),
  allProtocolsStateful: z.boolean().optional(),
}).strict();

export const PlatformFileSchema = z.object({
  platforms: z.array(PlatformDefinitionSchema),
});

// ─── Paths ───────────────────────────────────────────────────────────

const BUILTIN_PLATFORMS_URL = new URL('../../data/platforms.json', import.meta.url);

/** Project-level descriptors: <root>/.aclkit/platforms.json */
export function projectPlatformsPath(root: string): string {
  return join(root, '.aclkit', 'platforms.json');
}

// ─── Loading ─────────────────────────────────────────────────────────

export function parsePlatformFile(raw: unknown, source: string): PlatformDefinition[] {
  const result = PlatformFileSchema.safeParse(raw);
  if (!result.success) {
    throw invalidDocument(source, result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  return result.data.platforms;
}

function readPlatformFile(path: string | URL, source: string): PlatformDefinition[] | null {
  if (!existsSync(path)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw invalidDocument(source, [err instanceof Error ? err.message : String(err)]);
  }
  return parsePlatformFile(raw, source);
}

export interface LoadPlatformsOptions {
  /** Project root searched for .aclkit/platforms.json */
  root?: string;
  /** Environment to read ACLKIT_PLATFORMS from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export class PlatformRegistry {
  private readonly platforms = new Map<string, PlatformCapabilities>();

  constructor(definitions: Iterable<PlatformDefinition> = []) {
    for (const def of definitions) this.register(def);
  }

  register(def: PlatformDefinition): PlatformCapabilities {
    const caps = definePlatform(def);
    this.platforms.set(caps.platform, caps);
    return caps;
  }

  get(platform: string): PlatformCapabilities | undefined {
    return this.platforms.get(platform);
  }

  has(platform: string): boolean {
    return this.platforms.has(platform);
  }

  names(): string[] {
    return [...this.platforms.keys()].sort();
  }

  list(): PlatformCapabilities[] {
    return this.names().map(name => this.platforms.get(name)).filter(isDefined);
  }
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

/** Built-in descriptors shipped in data/platforms.json. */
export function builtinPlatforms(): PlatformDefinition[] {
  return readPlatformFile(BUILTIN_PLATFORMS_URL, 'platforms.json') ?? [];
}

/**
 * Build a registry from built-ins, then project config, then the
 * ACLKIT_PLATFORMS file, each replacing earlier definitions by name.
 */
export function loadPlatforms(options: LoadPlatformsOptions = {}): PlatformRegistry {
  const env = options.env ?? process.env;
  const registry = new PlatformRegistry(builtinPlatforms());

  if (options.root) {
    const path = projectPlatformsPath(options.root);
    for (const def of readPlatformFile(path, path) ?? []) registry.register(def);
  }

  const envPath = env.ACLKIT_PLATFORMS;
  if (envPath) {
    const defs = readPlatformFile(envPath, envPath);
    if (!defs) throw invalidDocument(envPath, ['file named by ACLKIT_PLATFORMS does not exist']);
    for (const def of defs) registry.register(def);
  }

  return registry;
}
