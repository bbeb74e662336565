import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

type NodeEnv = 'development' | 'production' | 'test';

/**
 * Application configuration parsed and validated at startup
 */
export interface Config {
  // Server
  port: number;
  nodeEnv: NodeEnv;
  jsonBodyLimit: string;

  // Database
  databaseUrl?: string;

  // Logging
  logLevel: string;
  serviceName: string;
}

function isNodeEnv(value: string): value is NodeEnv {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Parse and validate environment variables
 * Throws an error if any variable is present but invalid
 */
function parseConfig(): Config {
  const errors: string[] = [];

  // Helper to parse an optional number with a fallback
  const getNumber = (key: string, fallback: number): number => {
    const value = process.env[key];
    if (!value || value.trim() === '') {
      return fallback;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      errors.push(`Invalid number for ${key}: ${value}`);
      return fallback;
    }
    return parsed;
  };

  const rawNodeEnv = process.env.NODE_ENV || 'development';
  let nodeEnv: NodeEnv = 'development';
  if (isNodeEnv(rawNodeEnv)) {
    nodeEnv = rawNodeEnv;
  } else {
    errors.push(`Invalid NODE_ENV: ${rawNodeEnv}. Must be development, production, or test`);
  }

  const port = getNumber('PORT', 8000);
  if (port < 0 || port > 65535) {
    errors.push(`Invalid PORT: ${port}`);
  }

  const config: Config = {
    port,
    nodeEnv,
    jsonBodyLimit: process.env.JSON_BODY_LIMIT || '1mb',
    databaseUrl: process.env.DATABASE_URL || undefined,
    logLevel: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'debug'),
    serviceName: process.env.SERVICE_NAME || 'api',
  };

  // Throw if any errors
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return config;
}

/**
 * Singleton config instance
 * Parsed and validated at module load time
 */
export const config: Config = parseConfig();
