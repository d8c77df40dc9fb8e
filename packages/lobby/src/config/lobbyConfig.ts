/**
 * @fileoverview Lobby configuration loading from YAML.
 * Validates and caches configuration for the lobby process.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const LobbyConfigSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default('0.0.0.0'),
      port: z.number().int().min(0).max(65535).default(3002),
    })
    .default({}),
  gameServer: z.object({
    /** Interface spawned game servers are expected to listen on */
    bindHost: z.string().min(1).default('127.0.0.1'),
    /** Host name handed to players in connection info */
    publicHost: z.string().min(1),
    /** Interpreter for server entry points; defaults to the running node binary */
    command: z.string().min(1).optional(),
    readyTimeoutMs: z.number().int().positive().default(3000),
  }),
  storage: z.object({
    blobRoot: z.string().min(1),
    runtimeRoot: z.string().min(1),
    /** Accounts, catalog, play records and ratings; kept in memory only when unset */
    dataFile: z.string().min(1).optional(),
    /** Password hashes; kept in memory only when unset */
    credentialsFile: z.string().min(1).optional(),
  }),
  rooms: z
    .object({
      maxRooms: z.number().int().min(0).default(0),
      closedGraceSeconds: z.number().int().min(0).default(30),
      reapIntervalMs: z.number().int().positive().default(5000),
    })
    .default({}),
  auth: z
    .object({
      sessionTimeoutSeconds: z.number().int().positive().default(3600),
      onlineTimeoutSeconds: z.number().int().positive().default(20),
      loginLockSeconds: z.number().int().min(0).default(30),
    })
    .default({}),
  ratings: z
    .object({
      minScore: z.number().int().default(1),
      maxScore: z.number().int().default(5),
    })
    .refine((r) => r.minScore <= r.maxScore, {
      message: 'minScore must not exceed maxScore',
    })
    .default({}),
});

export type LobbyConfig = z.infer<typeof LobbyConfigSchema>;

let cachedConfig: LobbyConfig | null = null;

/**
 * Load and validate lobby configuration from YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - CONFIG_PATH environment variable if set
 * - Otherwise from ./config/lobby.yaml relative to cwd (project root)
 *
 * A numeric PORT environment variable overrides `server.port`.
 */
export function loadLobbyConfig(): LobbyConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const configPath = process.env['CONFIG_PATH'] ?? join(process.cwd(), 'config/lobby.yaml');

  try {
    const fileContents = readFileSync(configPath, 'utf8');
    const rawConfig: unknown = parseYaml(fileContents);
    const validatedConfig = LobbyConfigSchema.parse(rawConfig);
    cachedConfig = applyEnvOverrides(validatedConfig);
    return cachedConfig;
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error(`Invalid lobby configuration in ${configPath}: ${error.message}`);
    }
    throw error;
  }
}

function applyEnvOverrides(config: LobbyConfig): LobbyConfig {
  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const port = Number(process.env['PORT']);
  if (Number.isInteger(port) && port > 0) {
    return { ...config, server: { ...config.server, port } };
  }
  return config;
}

/**
 * Clear the cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
