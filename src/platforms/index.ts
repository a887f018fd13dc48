/**
 * AclKit Platforms — Public API
 */

export {
  definePlatform, validKeywords, REQUIRED_KEYWORDS,
  DEFAULT_PROTOCOL, DEFAULT_ADDRESS_FAMILIES, DEFAULT_TERM_MAX_LENGTH,
} from './define.js';
export {
  PlatformRegistry, loadPlatforms, builtinPlatforms, parsePlatformFile, projectPlatformsPath,
  PlatformDefinitionSchema, PlatformFileSchema,
} from './registry.js';
export type { LoadPlatformsOptions } from './registry.js';
