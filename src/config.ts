import { FailurePolicyName, LOG_LEVELS, LineFormat, LogLevel } from './types.js';

export interface ServerConfig {
  loki: {
    url: string;
    tenantId?: string;
    timeout: number;
    pushTimeout: number;
    healthTimeout: number;
    lineFormat: LineFormat;
  };

  // Application log shipping through the buffer
  shipping: {
    enabled: boolean;
    batchSize: number;
    flushInterval: number;
    tickerEnabled: boolean;
    backgroundTimeout: number;
    flushDeadline: number;
    maxInFlight: number;
    maxQueuedBatches: number;
    failurePolicy: FailurePolicyName;
    retryAttempts: number;
    retryDelay: number;
    deadLetterCapacity: number;
  };

  labels: {
    service: string;
    environment: string;
    instance: string;
  };

  grafana: {
    url: string;
    adminUser: string;
    adminPassword: string;
  };

  logLevel: LogLevel;

  // Environment values that could not be read; reported by validateConfig
  issues: string[];
}

const FAILURE_POLICIES: readonly FailurePolicyName[] = ['drop', 'retry', 'dead-letter'];
const LINE_FORMATS: readonly LineFormat[] = ['text', 'json'];

function readInt(name: string, fallback: number): number {
  return parseInt(process.env[name] || String(fallback), 10);
}

function readChoice<T extends string>(
  name: string,
  choices: readonly T[],
  fallback: T,
  issues: string[]
): T {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const choice = choices.find(candidate => candidate === raw);
  if (choice === undefined) {
    issues.push(`${name} must be one of: ${choices.join(', ')}`);
    return fallback;
  }
  return choice;
}

export function loadConfig(): ServerConfig {
  const issues: string[] = [];

  return {
    loki: {
      url: process.env.LOKI_URL || 'http://localhost:3100',
      ...(process.env.LOKI_TENANT_ID && { tenantId: process.env.LOKI_TENANT_ID }),
      timeout: readInt('LOKI_TIMEOUT', 30000),
      pushTimeout: readInt('LOKI_PUSH_TIMEOUT', 2000),
      healthTimeout: readInt('LOKI_HEALTH_TIMEOUT', 3000),
      lineFormat: readChoice('LOKI_LINE_FORMAT', LINE_FORMATS, 'text', issues)
    },

    shipping: {
      enabled: process.env.LOKI_HANDLER_ENABLED !== 'false',
      batchSize: readInt('LOKI_BUFFER_SIZE', 50),
      flushInterval: readInt('LOKI_FLUSH_INTERVAL', 5000),
      tickerEnabled: process.env.LOKI_FLUSH_TICKER === 'true',
      backgroundTimeout: readInt('LOKI_BACKGROUND_TIMEOUT', 1000),
      flushDeadline: readInt('LOKI_FLUSH_DEADLINE', 5000),
      maxInFlight: readInt('LOKI_MAX_IN_FLIGHT', 2),
      maxQueuedBatches: readInt('LOKI_MAX_QUEUED_BATCHES', 10),
      failurePolicy: readChoice('LOKI_FAILURE_POLICY', FAILURE_POLICIES, 'drop', issues),
      retryAttempts: readInt('LOKI_RETRY_ATTEMPTS', 3),
      retryDelay: readInt('LOKI_RETRY_DELAY', 500),
      deadLetterCapacity: readInt('LOKI_DEAD_LETTER_CAPACITY', 20)
    },

    labels: {
      service: process.env.SERVICE_NAME || 'loki-mcp',
      environment: process.env.ENVIRONMENT || 'development',
      instance: process.env.HOSTNAME || 'unknown'
    },

    grafana: {
      url: process.env.GRAFANA_URL || 'http://localhost:3000',
      adminUser: process.env.GRAFANA_ADMIN_USER || 'admin',
      adminPassword: process.env.GRAFANA_ADMIN_PASSWORD || 'admin'
    },

    logLevel: readChoice('LOG_LEVEL', LOG_LEVELS, 'INFO', issues),

    issues
  };
}

export function validateConfig(config: ServerConfig): { isValid: boolean; errors: string[] } {
  const errors: string[] = [...config.issues];

  if (!/^https?:\/\//.test(config.loki.url)) {
    errors.push('LOKI_URL must be an http:// or https:// URL');
  }

  const timeouts: [string, number][] = [
    ['LOKI_TIMEOUT', config.loki.timeout],
    ['LOKI_PUSH_TIMEOUT', config.loki.pushTimeout],
    ['LOKI_HEALTH_TIMEOUT', config.loki.healthTimeout],
    ['LOKI_BACKGROUND_TIMEOUT', config.shipping.backgroundTimeout],
    ['LOKI_FLUSH_DEADLINE', config.shipping.flushDeadline]
  ];
  for (const [name, value] of timeouts) {
    if (!Number.isFinite(value) || value <= 0) {
      errors.push(`${name} must be a positive number of milliseconds`);
    }
  }
  if (config.loki.healthTimeout >= config.loki.timeout) {
    errors.push('LOKI_HEALTH_TIMEOUT must be shorter than LOKI_TIMEOUT');
  }

  const { shipping } = config;
  if (!(shipping.batchSize >= 1 && shipping.batchSize <= 1000)) {
    errors.push('LOKI_BUFFER_SIZE must be between 1 and 1000');
  }
  if (!(shipping.flushInterval >= 100)) {
    errors.push('LOKI_FLUSH_INTERVAL must be at least 100ms');
  }
  if (!(shipping.maxInFlight >= 1)) {
    errors.push('LOKI_MAX_IN_FLIGHT must be at least 1');
  }
  if (!(shipping.maxQueuedBatches >= 1)) {
    errors.push('LOKI_MAX_QUEUED_BATCHES must be at least 1');
  }
  if (shipping.failurePolicy === 'retry' && !(shipping.retryAttempts >= 1)) {
    errors.push('LOKI_RETRY_ATTEMPTS must be at least 1');
  }
  if (shipping.failurePolicy === 'dead-letter' && !(shipping.deadLetterCapacity >= 1)) {
    errors.push('LOKI_DEAD_LETTER_CAPACITY must be at least 1');
  }

  return {
    isValid: errors.length === 0,
    errors
  };
}
