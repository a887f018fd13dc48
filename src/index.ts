/**
 * AclKit
 *
 * Library entry point. Re-exports the core operations, tables, platform
 * descriptors and policy document loading.
 *
 * Usage:
 *   import { AclGenerator, loadPlatforms } from 'aclkit';
 *   import { fixTermLength, collapsePortList } from 'aclkit';
 *   import type { Term, Policy, PlatformCapabilities } from 'aclkit';
 */

export * from './types/index.js';
export * from './core/index.js';
export * from './tables/index.js';
export * from './platforms/index.js';
export * from './policy/index.js';
export { createLogger, silentLogger, isLogLevel } from './utils/logger.js';
export type { Logger, LogLevel, LogContext, CreateLoggerOptions } from './utils/logger.js';
