// environment.ts

import dotenv from 'dotenv';
dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function listFromEnv(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (!raw) return fallback;
  return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export const ENV = {
  // Discord
  DISCORD_TOKEN: process.env.DISCORD_TOKEN || '',
  MOD_LOG_CHANNELS: listFromEnv('MOD_LOG_CHANNELS', ['mod-log', 'moderation', 'admin-log', 'security-log']),

  // Database (PostgreSQL)
  DATABASE_URL: process.env.DATABASE_URL || '',
  DB_HOST: process.env.DB_HOST || 'localhost',
  DB_PORT: intFromEnv('DB_PORT', 5432),
  DB_NAME: process.env.DB_NAME || 'vigil',
  DB_USER: process.env.DB_USER || 'vigil',
  DB_PASSWORD: process.env.DB_PASSWORD || '',

  // Redis
  REDIS_HOST: process.env.REDIS_HOST || 'localhost',
  REDIS_PORT: intFromEnv('REDIS_PORT', 6379),
  REDIS_PROFILE_TTL_SECONDS: intFromEnv('REDIS_PROFILE_TTL_SECONDS', 300),

  // Profile storage: 'memory' or 'postgres'
  PROFILE_STORE: process.env.PROFILE_STORE === 'postgres' ? 'postgres' : 'memory',

  // Optional external link reputation service
  THREAT_INTEL_URL: process.env.THREAT_INTEL_URL || '',

  // Security overrides (everything else lives in security.config.ts)
  SECURITY_OVERRIDES: {
    spamThreshold: optionalNumber('SPAM_THRESHOLD'),
    spamTimeframeMs: optionalNumber('SPAM_TIMEFRAME_MS'),
    capsRatioThreshold: optionalNumber('CAPS_RATIO_THRESHOLD'),
    mentionLimit: optionalNumber('MENTION_LIMIT'),
    trustThreshold: optionalNumber('TRUST_THRESHOLD'),
    quarantineThreshold: optionalNumber('QUARANTINE_THRESHOLD'),
    recoveryStep: optionalNumber('RECOVERY_STEP'),
    recoveryIntervalMs: optionalNumber('RECOVERY_INTERVAL_MS'),
    violationRetentionMs: optionalNumber('VIOLATION_RETENTION_MS'),
    maxLevelAction: process.env.MAX_LEVEL_ACTION || undefined,
    profileScope: process.env.PROFILE_SCOPE || undefined,
  },

  // Operator API (0 disables it)
  API_PORT: intFromEnv('API_PORT', 3000),

  // Maintenance sweep schedule (node-cron syntax)
  SWEEP_CRON: process.env.SWEEP_CRON || '*/30 * * * *',

  // Development
  NODE_ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_DIR: process.env.LOG_DIR || 'logs',
  LOG_TO_FILE: process.env.LOG_TO_FILE !== undefined
    ? process.env.LOG_TO_FILE === 'true'
    : process.env.NODE_ENV !== 'test',
};
