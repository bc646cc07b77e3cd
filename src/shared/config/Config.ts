/**
 * Runtime configuration for the listing experiments service.
 *
 * This centralises environment variables and provides
 * typed access throughout the codebase.
 */
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export type AppEnv = 'development' | 'test' | 'production';

export interface AppConfig {
  env: AppEnv;
  port: number;
  serviceName: string;
  serviceVersion: string;

  /**
   * Root directory holding one JSON document per experiment plan.
   */
  experimentsDir: string;

  /**
   * Fixed seed for the significance sampler. Unset in production.
   */
  significanceSeed?: number;
}

const DEFAULT_PORT = 4000;

function parsePort(raw: string | undefined, fallback: number): number {
  const port = raw ? Number(raw) : fallback;
  if (Number.isNaN(port) || port <= 0) {
    return fallback;
  }
  return port;
}

export function parseEnv(raw: string | undefined): AppEnv {
  if (raw === 'production' || raw === 'test') return raw;
  return 'development';
}

function parseSeed(raw: string | undefined): number | undefined {
  if (!raw || raw.trim().length === 0) return undefined;
  const seed = Number(raw);
  return Number.isInteger(seed) ? seed : undefined;
}

/**
 * Load configuration from environment variables with sane defaults.
 */
export const config: AppConfig = {
  env: parseEnv(process.env.NODE_ENV),
  port: parsePort(process.env.PORT, DEFAULT_PORT),
  serviceName: process.env.SERVICE_NAME || 'listing-experiments-service',
  serviceVersion: process.env.SERVICE_VERSION || '0.1.0',
  experimentsDir: path.resolve(process.env.EXPERIMENTS_DIR || 'experiments_store'),
  significanceSeed: parseSeed(process.env.SIGNIFICANCE_SEED),
};

/**
 * Path of the service-account key used for the publishing API.
 * Throws if not configured to fail fast on startup.
 */
export function getServiceAccountKeyFile(): string {
  const keyFile = process.env.GOOGLE_SERVICE_ACCOUNT_JSON;

  if (!keyFile || keyFile.trim().length === 0) {
    throw new Error(
      'GOOGLE_SERVICE_ACCOUNT_JSON is not configured. Point it to your service account JSON file.',
    );
  }

  return keyFile;
}
