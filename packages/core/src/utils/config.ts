import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { envAdapter } from 'zod-config/env-adapter';

/**
 * Centralised configuration schema for FlatTree.
 *
 * All hard-coded defaults belong here – this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // CLI mode - when true, reduces logging verbosity for embedding tools
  CLI_MODE: z.coerce.boolean().default(false),

  // Node count at which descendant counting / index lookup switch from a
  // plain loop to the chunked scan
  FLAT_TREE_SCAN_THRESHOLD: z.coerce.number().int().min(0).default(2000),

  // Slots per chunk for the chunked scan
  FLAT_TREE_SCAN_CHUNK_SIZE: z.coerce.number().int().min(1).default(1024),

  // Parent-index slots allocated up front for a new tree
  FLAT_TREE_INITIAL_CAPACITY: z.coerce.number().int().min(1).default(16),

  // Depth above which validation reports a deep_nesting warning
  FLAT_TREE_MAX_DEPTH: z.coerce.number().int().min(1).default(64),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg: AppConfig = await loadConfig({
  schema: configSchema,
  adapters: [
    // Order matters: later adapters win -> env overrides `.env` defaults.
    dotEnvAdapter({ path: '.env', silent: true }),
    envAdapter(),
  ],
});
