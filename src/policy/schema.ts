/**
 * AclKit — Policy document schema.
 *
 * A policy document is the JSON form of the object graph the policy front
 * end produces: `{ filters: [{ header, terms }] }`. Unknown term fields are
 * kept so keyword validation can reject them per platform.
 */

import { z } from 'zod';
import { invalidDocument } from '../core/errors.js';
import type { Policy } from '../types/index.js';

const port = z.number().int().min(0).max(65535);

export const PortRangeSchema = z
  .union([port, z.tuple([port, port])])
  .transform((p): [number, number] => (typeof p === 'number' ? [p, p] : p))
  .refine(([low, high]) => low <= high, 'port range low bound exceeds high bound');

const strings = z.array(z.string());

export const TermSchema = z.object({
  name: z.string().min(1),
  action: strings.optional(),
  comment: strings.optional(),
  protocol: strings.optional(),
  option: strings.optional(),
  source_address: strings.optional(),
  source_address_exclude: strings.optional(),
  source_port: z.array(PortRangeSchema).optional(),
  destination_address: strings.optional(),
  destination_address_exclude: strings.optional(),
  destination_port: z.array(PortRangeSchema).optional(),
  icmp_type: strings.optional(),
  platform: strings.optional(),
  platform_exclude: strings.optional(),
  verbatim: strings.optional(),
  translated: z.boolean().optional(),
}).passthrough();

export const HeaderSchema = z.object({
  platforms: z.array(z.string().min(1)).nonempty(),
  options: z.record(z.string(), strings).optional(),
  comment: strings.optional(),
});

export const PolicySchema = z.object({
  filters: z.array(z.object({
    header: HeaderSchema,
    terms: z.array(TermSchema),
  })),
});

export function parsePolicy(raw: unknown, source = '<policy>'): Policy {
  const result = PolicySchema.safeParse(raw);
  if (!result.success) {
    throw invalidDocument(source, result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  return result.data;
}
