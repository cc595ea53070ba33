import 'dotenv/config';
import { RetryOptions } from '../utils/retry.util';

export type StoreDriver = 'mongo' | 'memory';

export interface AppConfig {
  store: {
    driver: StoreDriver;
    mongoUri?: string;
    dbName: string;
  };
  simulation: {
    tickIntervalMs: number;
    timeUnitMs: number;               // real milliseconds per abstract time unit
    incidentWaitUnitsPerDay: number;
    incidentProbabilityPercent: number;
    resolverHistoryLimit: number;
  };
  trackingId: {
    maxAttempts: number;
  };
  retry: RetryOptions;
  api: {
    port: number;
  };
}

function readInt(name: string, fallback: number, min: number, max: number): number {
  const raw = process.env[name];
  const value = raw === undefined || raw === '' ? fallback : parseInt(raw, 10);
  if (Number.isNaN(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}`);
  }
  return value;
}

function readStoreDriver(): StoreDriver {
  const driver = process.env.STORE_DRIVER || 'mongo';
  if (driver !== 'mongo' && driver !== 'memory') {
    throw new Error(`STORE_DRIVER must be "mongo" or "memory", got "${driver}"`);
  }
  return driver;
}

export function loadConfig(): AppConfig {
  const driver = readStoreDriver();
  const mongoUri = process.env.MONGO_URI;
  if (driver === 'mongo' && !mongoUri) {
    throw new Error('MONGO_URI environment variable is required when STORE_DRIVER is "mongo"');
  }

  const jitterFactor = parseFloat(process.env.RETRY_JITTER_FACTOR || '0.1');
  if (Number.isNaN(jitterFactor) || jitterFactor < 0 || jitterFactor > 1) {
    throw new Error('RETRY_JITTER_FACTOR must be between 0 and 1');
  }

  return {
    store: {
      driver,
      mongoUri,
      dbName: process.env.MONGO_DB_NAME || 'tracking'
    },
    simulation: {
      tickIntervalMs: readInt('TICK_INTERVAL_MS', 1000, 100, 60000),
      timeUnitMs: readInt('TIME_UNIT_MS', 1000, 1, 3600000),
      incidentWaitUnitsPerDay: readInt('INCIDENT_WAIT_UNITS_PER_DAY', 5, 0, 1000),
      incidentProbabilityPercent: readInt('INCIDENT_PROBABILITY_PERCENT', 15, 0, 100),
      resolverHistoryLimit: readInt('RESOLVER_HISTORY_LIMIT', 100, 1, 10000)
    },
    trackingId: {
      maxAttempts: readInt('TRACKING_ID_MAX_ATTEMPTS', 5, 1, 100)
    },
    retry: {
      maxRetries: readInt('RETRY_MAX_ATTEMPTS', 3, 0, 20),
      baseDelay: readInt('RETRY_BASE_DELAY_MS', 1000, 0, 60000),
      maxDelay: readInt('RETRY_MAX_DELAY_MS', 10000, 0, 600000),
      jitterFactor
    },
    api: {
      port: readInt('API_PORT', 5000, 1, 65535)
    }
  };
}
