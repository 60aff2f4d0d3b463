/**
 * Chat Archiver — Configuration Types & Schema
 */

import { z } from 'zod';
import {
  ANONYMOUS_NICK,
  CHAT_HOST,
  CHAT_TLS_PORT,
  DEFAULT_BACKFILL_INDEX,
  DEFAULT_BACKFILL_PATTERN,
  DEFAULT_ROTATION_LIMIT,
} from './defaults.js';

// ============================================================================
// ZOD SCHEMA
// ============================================================================

export const ReconnectConfigSchema = z.object({
  /** Length of one backoff unit. */
  unitMs: z.number().int().nonnegative().default(1_000),
  maxDelayUnits: z.number().int().positive().default(32),
  /** Treat the connection as dead after this long without any data. */
  watchdogTimeoutMs: z.number().int().positive().default(6 * 60 * 1000),
});

export const ServerConfigSchema = z.object({
  host: z.string().min(1).default(CHAT_HOST),
  port: z.number().int().positive().default(CHAT_TLS_PORT),
});

/** `#Foo` → `foo` */
export const ChannelSchema = z
  .string()
  .trim()
  .transform((name) => name.replace(/^#/, '').toLowerCase())
  .pipe(z.string().min(1, 'Channel name must not be empty'));

export const ArchiveConfigSchema = z.object({
  channels: z.array(ChannelSchema).min(1, 'At least one channel is required'),
  nick: z.string().min(1).default(ANONYMOUS_NICK),
  pass: z.string().min(1).optional(),
  dontFilter: z.boolean().default(false),
  server: ServerConfigSchema.default({}),
  reconnect: ReconnectConfigSchema.default({}),
});

export const RotationConfigSchema = z.object({
  file: z.string().min(1).optional(),
  rotationLimit: z.coerce.number().int().positive().default(DEFAULT_ROTATION_LIMIT),
});

export const ElasticConfigSchema = z.object({
  address: z.string().url().transform((url) => url.replace(/\/+$/, '')),
  apiKeyFile: z.string().min(1),
  indices: z.array(z.string().min(1)).min(1),
});

export const BackfillConfigSchema = z.object({
  input: z.string().min(1).optional(),
  output: z.string().min(1).default(DEFAULT_BACKFILL_PATTERN),
  index: z.string().min(1).default(DEFAULT_BACKFILL_INDEX),
  dontFilter: z.boolean().default(false),
  /** Byte budget per output file; unbounded when absent. */
  chunkSize: z.coerce.number().int().positive().optional(),
});

// ============================================================================
// INFERRED TYPES
// ============================================================================

export type ReconnectConfig = z.infer<typeof ReconnectConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ArchiveConfig = z.infer<typeof ArchiveConfigSchema>;
export type RotationConfig = z.infer<typeof RotationConfigSchema>;
export type ElasticConfig = z.infer<typeof ElasticConfigSchema>;
export type BackfillConfig = z.infer<typeof BackfillConfigSchema>;

/** Where archived messages go; chosen once at startup. */
export type OutputConfig =
  | { kind: 'irc'; rotation: RotationConfig }
  | { kind: 'json'; rotation: RotationConfig }
  | { kind: 'elastic'; address: string; apiKey: string; indices: Map<string, string> };
