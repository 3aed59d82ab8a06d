import dotenv from 'dotenv';

dotenv.config();

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

interface Config {
  discordToken: string;
  databaseUrl: string;
  redisUrl?: string;
  environment: 'development' | 'production' | 'test';
  logLevel: LogLevelName;
  instanceId: string;
  liveEvents: {
    natsUrl: string;
    subject: string;
    maxReconnectAttempts: number;
    reconnectWaitMs: number;
  };
  refresh: {
    tickIntervalMs: number;
    publishSpacingMs: number;
    reconcileIntervalMs: number;
    pageSize: number;
  };
  scoring: {
    resortIntervalMs: number;
  };
  healthCheck: {
    enabled: boolean;
    port: number;
  };
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] || defaultValue;
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getPositiveInt(key: string, defaultValue: number): number {
  const raw = getEnvVar(key, String(defaultValue));
  const parsed = parseInt(raw, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${key}: must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

function parseEnvironment(raw: string): Config['environment'] {
  if (raw === 'production' || raw === 'test') {
    return raw;
  }
  return 'development';
}

function parseLogLevel(raw: string): LogLevelName {
  const normalized = raw.toLowerCase();
  if (normalized === 'debug' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return 'info';
}

const environment = parseEnvironment(getEnvVar('NODE_ENV', 'development'));

export const config: Config = {
  discordToken: getEnvVar('DISCORD_TOKEN'),
  databaseUrl: getEnvVar('DATABASE_URL', 'postgres://localhost:5432/review_queue'),
  redisUrl: process.env.REDIS_URL?.trim() || undefined,
  environment,
  logLevel: parseLogLevel(getEnvVar('LOG_LEVEL', 'info')),
  instanceId: getEnvVar('INSTANCE_ID', `${process.env.HOSTNAME || 'unknown'}-${process.pid}`),
  liveEvents: {
    natsUrl: getEnvVar('NATS_URL', 'nats://localhost:4222'),
    subject: getEnvVar('LIVE_EVENTS_SUBJECT', 'LIVE.events'),
    maxReconnectAttempts: getPositiveInt('NATS_MAX_RECONNECT_ATTEMPTS', 10),
    reconnectWaitMs: getPositiveInt('NATS_RECONNECT_WAIT_MS', 2000),
  },
  refresh: {
    tickIntervalMs: getPositiveInt('REFRESH_TICK_INTERVAL_MS', 10_000),
    publishSpacingMs: getPositiveInt('REFRESH_PUBLISH_SPACING_MS', 1_000),
    reconcileIntervalMs: getPositiveInt('REFRESH_RECONCILE_INTERVAL_MS', 5 * 60_000),
    pageSize: getPositiveInt('QUEUE_PAGE_SIZE', 10),
  },
  scoring: {
    resortIntervalMs: getPositiveInt('SCORE_RESORT_INTERVAL_MS', 30_000),
  },
  healthCheck: {
    enabled: process.env.HEALTH_CHECK_ENABLED !== 'false',
    port: getPositiveInt('HEALTH_CHECK_PORT', 3000),
  },
};
