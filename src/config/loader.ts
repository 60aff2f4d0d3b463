/**
 * Chat Archiver — Configuration Loader
 *
 * Validates command-line input into typed configs. Anything invalid is a
 * ConfigError, raised before a session or backfill starts.
 */

import { readFileSync } from 'node:fs';
import type { z } from 'zod';
import {
  ArchiveConfigSchema,
  BackfillConfigSchema,
  ElasticConfigSchema,
  RotationConfigSchema,
  type ArchiveConfig,
  type BackfillConfig,
  type OutputConfig,
} from './types.js';
import { INDEX_CHANNEL_PLACEHOLDER, PASSWORD_ENV_VAR } from './defaults.js';

// ============================================================================
// ERROR
// ============================================================================

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid ${what}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

// ============================================================================
// SECRETS
// ============================================================================

/**
 * Read a credential from a file, trimming surrounding whitespace.
 */
export function readSecretFile(path: string, what: string): string {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Failed to read ${what} from ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const secret = content.trim();
  if (!secret) {
    throw new ConfigError(`${what} file ${path} is empty`);
  }
  return secret;
}

// ============================================================================
// ARCHIVE
// ============================================================================

export interface ArchiveCliOptions {
  channel?: string[];
  nick?: string;
  pass?: string;
  passFile?: string;
  dontFilter?: boolean;
}

/**
 * Build the live-session config. The password comes from `--pass`,
 * then `--pass-file`, then the CHAT_ARCHIVER_PASS environment variable.
 */
export function loadArchiveConfig(
  options: ArchiveCliOptions,
  env: NodeJS.ProcessEnv = process.env
): ArchiveConfig {
  let pass = options.pass;
  if (pass === undefined && options.passFile) {
    pass = readSecretFile(options.passFile, 'password');
  }
  if (pass === undefined && env[PASSWORD_ENV_VAR]) {
    pass = env[PASSWORD_ENV_VAR];
  }

  return parseOrThrow(ArchiveConfigSchema, {
    channels: options.channel ?? [],
    nick: options.nick,
    pass,
    dontFilter: options.dontFilter ?? false,
  }, 'archive options');
}

/**
 * Map each channel to its index. A single index is a pattern whose `*`
 * is replaced by the channel; otherwise indices pair with channels by
 * position.
 */
export function buildIndexMapping(channels: string[], indices: string[]): Map<string, string> {
  if (indices.length === 1) {
    const [pattern] = indices;
    return new Map(channels.map((ch) => [ch, pattern.replaceAll(INDEX_CHANNEL_PLACEHOLDER, ch)]));
  }

  if (indices.length !== channels.length) {
    throw new ConfigError(`Expected 1 or ${channels.length} indices, got ${indices.length}`);
  }

  return new Map(channels.map((ch, i) => [ch, indices[i]]));
}

export function loadRotatingOutput(
  kind: 'irc' | 'json',
  file: string | undefined,
  rotationLimit: string | undefined
): OutputConfig {
  const rotation = parseOrThrow(RotationConfigSchema, { file, rotationLimit }, `${kind} output options`);
  return { kind, rotation };
}

export function loadElasticOutput(
  channels: string[],
  address: string,
  apiKeyFile: string,
  indices: string[]
): OutputConfig {
  const config = parseOrThrow(ElasticConfigSchema, { address, apiKeyFile, indices }, 'elastic output options');
  const mapping = buildIndexMapping(channels, config.indices);
  const apiKey = readSecretFile(config.apiKeyFile, 'API key');
  return { kind: 'elastic', address: config.address, apiKey, indices: mapping };
}

// ============================================================================
// BACKFILL
// ============================================================================

export interface BackfillCliOptions {
  index?: string;
  dontFilter?: boolean;
  chunkSize?: string;
}

export function loadBackfillConfig(
  input: string | undefined,
  output: string | undefined,
  options: BackfillCliOptions
): BackfillConfig {
  return parseOrThrow(BackfillConfigSchema, {
    input,
    output,
    index: options.index,
    dontFilter: options.dontFilter ?? false,
    chunkSize: options.chunkSize,
  }, 'backfill options');
}
