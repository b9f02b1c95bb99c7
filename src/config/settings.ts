/**
 * @fileoverview pagecite settings
 *
 * Settings are resolved from three layers, later layers winning:
 * built-in defaults, an optional YAML file, and environment variables.
 * The merged object is validated with zod before anything uses it.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../core/errors.js';

export const DEFAULT_CONFIG_FILE = 'pagecite.config.yaml';

// ============================================================================
// SCHEMA
// ============================================================================

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const SettingsSchema = z.object({
  /** SQLite database holding every collection */
  storePath: z.string().min(1),
  /** Chunks retrieved per collection query */
  similarityTopK: z.number().int().positive(),
  /** Use parent-merging retrieval when a collection stores its chunk hierarchy */
  enableAutoMerging: z.boolean(),
  /** Fraction of a parent's children that must be retrieved before they merge */
  autoMergeRatio: z.number().gt(0).lte(1),
  /** Chunk sizes in characters, coarsest first */
  chunkSizes: z.array(z.number().int().positive()).min(1),
  embeddingDimensions: z.number().int().positive(),
  federation: z.object({
    maxParallelCollections: z.number().int().positive(),
    collectionTimeoutMs: z.number().int().nonnegative(),
  }),
  logLevel: LogLevelSchema,
}).strict();

export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = {
  storePath: 'data/pagecite.db',
  similarityTopK: 6,
  enableAutoMerging: true,
  autoMergeRatio: 0.5,
  chunkSizes: [4096, 1024, 512],
  embeddingDimensions: 384,
  federation: {
    maxParallelCollections: 4,
    collectionTimeoutMs: 30000,
  },
  logLevel: 'info',
};

type SettingsOverrides = Partial<Omit<Settings, 'federation'>> & {
  federation?: Partial<Settings['federation']>;
};

// ============================================================================
// SOURCES
// ============================================================================

export interface LoadSettingsOptions {
  /** Directory searched for pagecite.config.yaml (default: process.cwd()) */
  cwd?: string;
  /** Explicit config file; overrides PAGECITE_CONFIG */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: SettingsOverrides;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function readConfigFile(filePath: string, required: boolean): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (!required && isMissingFile(error)) {
      return {};
    }
    throw new ConfigurationError('configPath', `cannot read ${filePath}: ${describeError(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigurationError('configPath', `invalid YAML in ${filePath}: ${describeError(error)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError('configPath', `${filePath} must contain a mapping`);
  }
  return { ...parsed };
}

function parseNumber(key: string, value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigurationError(key, `expected a number, got "${value}"`);
  }
  return parsed;
}

function parseBoolean(key: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(key, `expected a boolean, got "${value}"`);
}

function readEnv(env: NodeJS.ProcessEnv): SettingsOverrides {
  const fromEnv: SettingsOverrides = {};
  const federation: Partial<Settings['federation']> = {};

  if (env.PAGECITE_STORE_PATH) fromEnv.storePath = env.PAGECITE_STORE_PATH;
  if (env.SIMILARITY_TOP_K) fromEnv.similarityTopK = parseNumber('SIMILARITY_TOP_K', env.SIMILARITY_TOP_K);
  if (env.ENABLE_AUTO_MERGING) fromEnv.enableAutoMerging = parseBoolean('ENABLE_AUTO_MERGING', env.ENABLE_AUTO_MERGING);
  if (env.AUTO_MERGE_RATIO) fromEnv.autoMergeRatio = parseNumber('AUTO_MERGE_RATIO', env.AUTO_MERGE_RATIO);
  if (env.CHUNK_SIZES) {
    fromEnv.chunkSizes = env.CHUNK_SIZES.split(',').map((size) => parseNumber('CHUNK_SIZES', size));
  }
  if (env.EMBEDDING_DIMENSIONS) {
    fromEnv.embeddingDimensions = parseNumber('EMBEDDING_DIMENSIONS', env.EMBEDDING_DIMENSIONS);
  }
  if (env.MAX_PARALLEL_COLLECTIONS) {
    federation.maxParallelCollections = parseNumber('MAX_PARALLEL_COLLECTIONS', env.MAX_PARALLEL_COLLECTIONS);
  }
  if (env.COLLECTION_TIMEOUT_MS) {
    federation.collectionTimeoutMs = parseNumber('COLLECTION_TIMEOUT_MS', env.COLLECTION_TIMEOUT_MS);
  }
  if (env.PAGECITE_LOG_LEVEL) {
    const level = LogLevelSchema.safeParse(env.PAGECITE_LOG_LEVEL.trim().toLowerCase());
    if (!level.success) {
      throw new ConfigurationError('PAGECITE_LOG_LEVEL', `unknown level "${env.PAGECITE_LOG_LEVEL}"`);
    }
    fromEnv.logLevel = level.data;
  }

  if (Object.keys(federation).length > 0) fromEnv.federation = federation;
  return fromEnv;
}

function mergeLayer(base: Record<string, unknown>, layer: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(layer)) {
    if (value === undefined) continue;
    const current = merged[key];
    if (isPlainObject(current) && isPlainObject(value)) {
      merged[key] = { ...current, ...value };
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// LOADING
// ============================================================================

/**
 * Validate a candidate settings object, reporting every issue at once.
 */
export function parseSettings(candidate: unknown): Settings {
  const parsed = SettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError('settings', issues);
  }
  return parsed.data;
}

export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicitPath = options.configPath ?? env.PAGECITE_CONFIG;
  const filePath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

  let merged: Record<string, unknown> = { ...DEFAULT_SETTINGS };
  merged = mergeLayer(merged, readConfigFile(filePath, explicitPath !== undefined));
  merged = mergeLayer(merged, readEnv(env));
  if (options.overrides) merged = mergeLayer(merged, options.overrides);

  return parseSettings(merged);
}
