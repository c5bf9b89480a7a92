/**
 * @opsdeck/shared - Configuration Zod Schemas
 */

import { z } from 'zod';

export const platformNameSchema = z.enum(['local', 'heroku', 'eb']);

export const opsConfigSchema = z.object({
  region: z.string().min(1).optional(),
  inventoryPath: z.string().min(1).optional(),
  keyDir: z.string().min(1).optional(),
  instanceUser: z.string().min(1).default('ec2-user'),
  bastion: z.object({
    user: z.string().min(1).default('root'),
    port: z.number().int().positive().default(22),
  }).default({}),
  herokuBinary: z.string().min(1).default('heroku'),
  ebRunBinary: z.string().min(1).default('opsdeck'),
});

export type PlatformName = z.infer<typeof platformNameSchema>;
export type OpsConfig = z.infer<typeof opsConfigSchema>;
