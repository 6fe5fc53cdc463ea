import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../services/bridge/bridge.errors.js';

dotenv.config();

const MIN_SESSION_TTL_MS = 60_000;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  BRIDGE_PUBLIC_URL: z.string().trim().min(1).url(),
  BRIDGE_CLIENT_ID: z.string().trim().min(1),
  BRIDGE_CLIENT_SECRET: z.string().trim().min(1),
  BRIDGE_WS_PATH: z.string().startsWith('/').default('/bridge/connect'),
  BRIDGE_SESSION_TTL_MS: z.coerce.number().int().min(MIN_SESSION_TTL_MS).default(30 * 60 * 1000),
  BRIDGE_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  BRIDGE_STAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  BRIDGE_HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
});

export interface BridgeConfig {
  port: number;
  publicUrl: string;
  clientId: string;
  clientSecret: string;
  wsPath: string;
  sessionTtlMs: number;
  sweepIntervalMs: number;
  stageTimeoutMs: number;
  heartbeatIntervalMs: number;
}

/**
 * Load and validate bridge configuration.
 * Fatal at startup: throws ConfigurationError naming every offending key.
 */
export function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))];
    throw new ConfigurationError(`Invalid bridge configuration: ${keys.join(', ')}`, keys);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    publicUrl: values.BRIDGE_PUBLIC_URL.replace(/\/+$/, ''),
    clientId: values.BRIDGE_CLIENT_ID,
    clientSecret: values.BRIDGE_CLIENT_SECRET,
    wsPath: values.BRIDGE_WS_PATH,
    sessionTtlMs: values.BRIDGE_SESSION_TTL_MS,
    sweepIntervalMs: values.BRIDGE_SWEEP_INTERVAL_MS,
    stageTimeoutMs: values.BRIDGE_STAGE_TIMEOUT_MS,
    heartbeatIntervalMs: values.BRIDGE_HEARTBEAT_INTERVAL_MS,
  };
}
