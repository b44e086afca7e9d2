/**
 * structmerge configuration — `.structmerge/config.json` in the repository,
 * overridable from the command line.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONCURRENCY, DEFAULT_EXTENSIONS } from '@structmerge/core';

export const STRUCTMERGE_DIR = '.structmerge';

export const mergeConfigSchema = z.object({
  /** Output directory, relative to the repository root unless absolute. */
  outDir: z.string().min(1).default(path.join(STRUCTMERGE_DIR, 'out')),
  /** File extensions considered for merging. */
  extensions: z.array(z.string().regex(/^\.[\w.]+$/, 'must look like ".ts"')).min(1).default(DEFAULT_EXTENSIONS),
  /** Files merged concurrently. */
  concurrency: z.number().int().min(1).max(64).default(DEFAULT_CONCURRENCY),
  /** Write diff3-style markers for conflicted units instead of the Base text. */
  conflictMarkers: z.boolean().default(false),
}).strict();

export type MergeConfig = z.infer<typeof mergeConfigSchema>;

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, message: string) {
    super(`Invalid config ${configPath}: ${message}`);
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

export function getConfigPath(repoRoot: string): string {
  return path.join(repoRoot, STRUCTMERGE_DIR, 'config.json');
}

/** Defaults for every field. */
export function defaultConfig(): MergeConfig {
  return mergeConfigSchema.parse({});
}

/**
 * Load and validate the config file. A missing file yields the defaults;
 * malformed JSON or an invalid field throws ConfigError naming the field.
 */
export function loadConfig(configPath: string): MergeConfig {
  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(configPath, err instanceof Error ? err.message : String(err));
  }

  const parsed = mergeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(configPath, `${field}: ${issue.message}`);
  }
  return parsed.data;
}

export interface ConfigOverrides {
  outDir?: string;
  concurrency?: number;
  conflictMarkers?: boolean;
}

/** Apply CLI flags over file values; undefined flags leave the file value. */
export function applyOverrides(config: MergeConfig, overrides: ConfigOverrides): MergeConfig {
  return {
    ...config,
    outDir: overrides.outDir ?? config.outDir,
    concurrency: overrides.concurrency ?? config.concurrency,
    conflictMarkers: overrides.conflictMarkers ?? config.conflictMarkers,
  };
}
