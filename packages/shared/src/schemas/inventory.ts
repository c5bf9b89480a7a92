/**
 * @opsdeck/shared - Inventory File Zod Schemas
 */

import { z } from 'zod';

export const instanceRecordSchema = z.object({
  id: z.string().min(1),
  privateAddress: z.string().min(1),
  publicAddress: z.string().min(1).optional(),
  keyName: z.string().min(1),
  groups: z.array(z.string()).default([]),
  appName: z.string().min(1).optional(),
  envType: z.string().min(1).optional(),
  environmentName: z.string().min(1).optional(),
});

export const keyPairRecordSchema = z.object({
  name: z.string().min(1),
  fingerprint: z.string().regex(/^([0-9a-f]{2}:)+[0-9a-f]{2}$/, 'expected colon-separated hex fingerprint'),
});

export const inventoryFileSchema = z.object({
  instances: z.array(instanceRecordSchema).default([]),
  keyPairs: z.array(keyPairRecordSchema).default([]),
});

export type InventoryFile = z.infer<typeof inventoryFileSchema>;
