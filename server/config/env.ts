import { type CapabilityHolders } from '../margin/Capabilities';
import { type LogLevel, parseLogLevel } from '../utils/logger';

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: LogLevel;
  allowedOrigins: string[];
  /** Bearer token -> account id. */
  apiKeys: Map<string, string>;
  capabilityHolders: CapabilityHolders;
  eventJournalDir: string | null;
  ws: {
    heartbeatIntervalMs: number;
    staleConnectionMs: number;
    maxSubscriptionsPerClient: number;
  };
}

type Env = Record<string, string | undefined>;

const DEV_ORIGINS = [
  'http://localhost:5173',
  'http://localhost:5174',
  'http://127.0.0.1:5173',
  'http://127.0.0.1:5174',
];

function intFrom(env: Env, key: string, fallback: number, min: number): number {
  const raw = String(env[key] ?? '').trim();
  if (!raw) {
    return fallback;
  }
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`[config] ${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

function listFrom(env: Env, key: string): string[] {
  return String(env[key] || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/** `account:token` pairs. Tokens must be unique; an account may hold several. */
export function parseApiKeys(raw: string | undefined): Map<string, string> {
  const keys = new Map<string, string>();
  for (const entry of String(raw || '').split(',').map((s) => s.trim()).filter(Boolean)) {
    const sep = entry.indexOf(':');
    const account = sep > 0 ? entry.slice(0, sep).trim() : '';
    const token = sep > 0 ? entry.slice(sep + 1).trim() : '';
    if (!account || !token) {
      throw new Error(`[config] API_KEYS entry must look like account:token, got "${entry}"`);
    }
    if (keys.has(token)) {
      throw new Error(`[config] API_KEYS token for "${account}" is already assigned`);
    }
    keys.set(token, account);
  }
  return keys;
}

function logLevelFrom(env: Env): LogLevel {
  const raw = String(env.LOG_LEVEL ?? '').trim();
  if (!raw) {
    return 'info';
  }
  const level = parseLogLevel(raw);
  if (level !== raw.toLowerCase()) {
    throw new Error(`[config] LOG_LEVEL must be one of debug, info, warn, error, silent, got "${raw}"`);
  }
  return level;
}

function requiredAccount(env: Env, key: string): string {
  const value = String(env[key] || '').trim();
  if (!value) {
    throw new Error(`[config] Missing ${key}. Set it in .env before starting the server.`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const apiKeys = parseApiKeys(env.API_KEYS);
  if (apiKeys.size === 0) {
    throw new Error('[config] Missing API_KEYS. Set it in .env before starting the server.');
  }

  const journalRaw = env.EVENT_JOURNAL_DIR;
  const eventJournalDir = journalRaw === undefined ? './data/events' : journalRaw.trim() || null;

  return {
    port: intFrom(env, 'PORT', 8787, 0),
    host: String(env.HOST || '0.0.0.0'),
    nodeEnv: String(env.NODE_ENV || 'development'),
    logLevel: logLevelFrom(env),
    allowedOrigins: [...DEV_ORIGINS, ...listFrom(env, 'ALLOWED_ORIGINS')],
    apiKeys,
    capabilityHolders: {
      ADMIN: requiredAccount(env, 'ADMIN_ACCOUNT'),
      LIQUIDITY_PROVIDER: requiredAccount(env, 'LP_ACCOUNT'),
      ORACLE_OPERATOR: requiredAccount(env, 'ORACLE_ACCOUNT'),
    },
    eventJournalDir,
    ws: {
      heartbeatIntervalMs: intFrom(env, 'WS_HEARTBEAT_INTERVAL_MS', 15_000, 1_000),
      staleConnectionMs: intFrom(env, 'WS_STALE_CONNECTION_MS', 60_000, 2_000),
      maxSubscriptionsPerClient: intFrom(env, 'WS_MAX_SUBSCRIPTIONS_PER_CLIENT', 50, 1),
    },
  };
}
