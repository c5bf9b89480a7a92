/**
 * @opsdeck/cli - Configuration Loading
 *
 * ~/.opsdeck/config.json, or the file named by OPSDECK_CONFIG.
 * A missing file means all defaults.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import {
  UserMessageError,
  errorMessage,
  inventoryFileSchema,
  opsConfigSchema,
  type InventoryFile,
  type OpsConfig,
} from '@opsdeck/shared';
import type { ZodError, ZodTypeAny, output } from 'zod';

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.OPSDECK_CONFIG || join(homedir(), '.opsdeck', 'config.json');
}

/** Expand a leading `~` and resolve relative paths against `base`. */
export function expandPath(path: string, base: string = process.cwd()): string {
  if (path === '~' || path.startsWith('~/')) {
    return join(homedir(), path.slice(1));
  }
  return isAbsolute(path) ? path : resolve(base, path);
}

export function loadConfig(path: string = configPath()): OpsConfig {
  if (!existsSync(path)) {
    return opsConfigSchema.parse({});
  }
  return readJsonFile(path, opsConfigSchema, 'config');
}

export function loadInventoryFile(path: string): InventoryFile {
  if (!existsSync(path)) {
    throw new UserMessageError(`Inventory file not found: ${path}`, { path });
  }
  return readJsonFile(path, inventoryFileSchema, 'inventory');
}

// ============================================================================
// Helpers
// ============================================================================

function readJsonFile<S extends ZodTypeAny>(path: string, schema: S, label: string): output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new UserMessageError(`Cannot read ${label} file ${path}: ${errorMessage(error)}`, { path });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new UserMessageError(`Invalid ${label} file ${path}: ${formatIssues(parsed.error)}`, { path });
  }
  return parsed.data;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
