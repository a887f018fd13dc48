/**
 * AclKit — ICMP type table.
 * Loaded once from data/icmp-types.json and frozen.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { invalidDocument } from '../core/errors.js';
import type { AddressFamilyNumber } from '../types/index.js';

export type IcmpTypeTable = Readonly<Record<AddressFamilyNumber, Readonly<Record<string, number>>>>;

const icmpCodes = z.record(z.string(), z.number().int().min(0).max(255));

const IcmpTypeFileSchema = z.object({
  '4': icmpCodes,
  '6': icmpCodes,
});

const ICMP_TYPES_URL = new URL('../../data/icmp-types.json', import.meta.url);

export function parseIcmpTypeTable(raw: unknown, source: string): IcmpTypeTable {
  const result = IcmpTypeFileSchema.safeParse(raw);
  if (!result.success) {
    throw invalidDocument(source, result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  return Object.freeze({
    4: Object.freeze({ ...result.data['4'] }),
    6: Object.freeze({ ...result.data['6'] }),
  });
}

export const ICMP_TYPES: IcmpTypeTable = parseIcmpTypeTable(
  JSON.parse(readFileSync(ICMP_TYPES_URL, 'utf-8')),
  'icmp-types.json',
);
