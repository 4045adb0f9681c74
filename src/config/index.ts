import { config } from 'dotenv';
import { EngineMode } from '@/types/result.types';
import { ConfigurationError } from '@/utils/errors';

config();

export type LogLevel = 'error' | 'warn' | 'notify' | 'info' | 'debug';

interface AppConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  LOG_LEVEL: LogLevel;
  LOG_TO_FILE: boolean;
  ALERT_WEBHOOK_URL?: string;
  ENABLE_WEBHOOK_ALERTS: boolean;
  MONITOR: {
    PRODUCT: string;
    WINDOW_SIZE: number;
    MODE: EngineMode;
    REQUIRE_CONSECUTIVE: number;
    HISTORY_LIMIT: number;
  };
  SENSOR: {
    ENDPOINT_URL?: string;
    POLL_SCHEDULE: string;
    TIMEOUT_MS: number;
  };
  EXPORT: {
    DIR: string;
    EVERY: number;
  };
  ALLOWED_ORIGINS: string[];
}

type Env = Record<string, string | undefined>;

function validateEnvironmentVariable(name: string, value: string | undefined, defaultValue: string): string {
  if (value === undefined) {
    return defaultValue;
  }
  if (value.trim() === '') {
    throw new ConfigurationError(`Environment variable ${name} cannot be empty`);
  }
  return value.trim();
}

function validateOptionalVariable(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function validateNumericEnvironmentVariable(name: string, value: string | undefined, defaultValue: number, min: number, max: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const numericValue = Number(value);
  if (!Number.isInteger(numericValue)) {
    throw new ConfigurationError(`Environment variable ${name} must be a valid integer, got: ${value}`);
  }
  if (numericValue < min || numericValue > max) {
    throw new ConfigurationError(`${name} must be between ${min} and ${max}. Got: ${numericValue}`);
  }
  return numericValue;
}

function validateBooleanVariable(name: string, value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized !== 'true' && normalized !== 'false') {
    throw new ConfigurationError(`Environment variable ${name} must be true or false, got: ${value}`);
  }
  return normalized === 'true';
}

function validateUrl(name: string, value: string | undefined): string | undefined {
  if (value !== undefined && !/^https?:\/\//.test(value)) {
    throw new ConfigurationError(`${name} must be a valid URL starting with http/https. Got: ${value}`);
  }
  return value;
}

const isNodeEnv = (value: string): value is AppConfig['NODE_ENV'] =>
  value === 'development' || value === 'production' || value === 'test';

const isLogLevel = (value: string): value is LogLevel =>
  ['error', 'warn', 'notify', 'info', 'debug'].includes(value);

const isMode = (value: string): value is EngineMode => value === 'adaptive' || value === 'simple';

function loadConfig(env: Env = process.env): AppConfig {
  const nodeEnv = validateEnvironmentVariable('NODE_ENV', env.NODE_ENV, 'development');
  if (!isNodeEnv(nodeEnv)) {
    throw new ConfigurationError(`NODE_ENV must be one of: development, production, test. Got: ${nodeEnv}`);
  }

  const logLevel = validateEnvironmentVariable('LOG_LEVEL', env.LOG_LEVEL, 'info');
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of: error, warn, notify, info, debug. Got: ${logLevel}`);
  }

  const mode = validateEnvironmentVariable('MONITOR_MODE', env.MONITOR_MODE, 'adaptive');
  if (!isMode(mode)) {
    throw new ConfigurationError(`MONITOR_MODE must be one of: adaptive, simple. Got: ${mode}`);
  }

  const appConfig: AppConfig = {
    NODE_ENV: nodeEnv,
    PORT: validateNumericEnvironmentVariable('PORT', env.PORT, 5000, 1024, 65535),
    LOG_LEVEL: logLevel,
    LOG_TO_FILE: validateBooleanVariable('LOG_TO_FILE', env.LOG_TO_FILE, nodeEnv !== 'test'),
    ALERT_WEBHOOK_URL: validateUrl('ALERT_WEBHOOK_URL', validateOptionalVariable(env.ALERT_WEBHOOK_URL)),
    ENABLE_WEBHOOK_ALERTS: validateBooleanVariable('ENABLE_WEBHOOK_ALERTS', env.ENABLE_WEBHOOK_ALERTS, false),
    MONITOR: {
      PRODUCT: validateEnvironmentVariable('MONITOR_PRODUCT', env.MONITOR_PRODUCT, 'vaccine'),
      WINDOW_SIZE: validateNumericEnvironmentVariable('MONITOR_WINDOW_SIZE', env.MONITOR_WINDOW_SIZE, 30, 2, 1000),
      MODE: mode,
      REQUIRE_CONSECUTIVE: validateNumericEnvironmentVariable('MONITOR_REQUIRE_CONSECUTIVE', env.MONITOR_REQUIRE_CONSECUTIVE, 2, 1, 20),
      HISTORY_LIMIT: validateNumericEnvironmentVariable('MONITOR_HISTORY_LIMIT', env.MONITOR_HISTORY_LIMIT, 500, 1, 100000),
    },
    SENSOR: {
      ENDPOINT_URL: validateUrl('SENSOR_ENDPOINT_URL', validateOptionalVariable(env.SENSOR_ENDPOINT_URL)),
      POLL_SCHEDULE: validateEnvironmentVariable('SENSOR_POLL_SCHEDULE', env.SENSOR_POLL_SCHEDULE, '*/3 * * * * *'),
      TIMEOUT_MS: validateNumericEnvironmentVariable('SENSOR_TIMEOUT_MS', env.SENSOR_TIMEOUT_MS, 3000, 100, 60000),
    },
    EXPORT: {
      DIR: validateEnvironmentVariable('EXPORT_DIR', env.EXPORT_DIR, 'exports'),
      EVERY: validateNumericEnvironmentVariable('EXPORT_EVERY', env.EXPORT_EVERY, 10, 0, 100000),
    },
    ALLOWED_ORIGINS: (validateOptionalVariable(env.ALLOWED_ORIGINS) ?? '')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin !== ''),
  };

  if (appConfig.ENABLE_WEBHOOK_ALERTS && !appConfig.ALERT_WEBHOOK_URL) {
    throw new ConfigurationError('ENABLE_WEBHOOK_ALERTS is true but ALERT_WEBHOOK_URL is not set');
  }

  return appConfig;
}

let Config: AppConfig;

try {
  Config = loadConfig();
} catch (error) {
  console.error('Configuration Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
}

export { Config, ConfigurationError, loadConfig };
export type { AppConfig };
export default Config;
