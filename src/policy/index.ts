/**
 * AclKit Policy — Public API
 */

export { parsePolicy, PolicySchema, TermSchema, HeaderSchema, PortRangeSchema } from './schema.js';
export { loadPolicies, loadPolicyFile } from './load.js';
export type { LoadedPolicy, LoadPoliciesOptions } from './load.js';
