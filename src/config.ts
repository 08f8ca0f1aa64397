import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  port: number;
  logLevel: string;
  logPretty: boolean;
  ingress: {
    corsAllowedOrigins: string[];
    jsonBodyLimit: string;
  };
  simulator: {
    baseUrl: string;
  };
  staticDir: string;
}

function parsePositiveInt(raw: string | undefined, fallback: number, label: string): number {
  const parsed = Number(raw ?? fallback);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`[config] ${label} must be a positive integer`);
  }
  return parsed;
}

// Trailing slashes are dropped so proxied paths can be appended as-is.
export function parseSimulatorUrl(raw: string | undefined): string {
  const value = (raw ?? 'http://localhost:5000').trim();
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`[config] SIMULATOR_URL must be an absolute URL, got "${value}"`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error('[config] SIMULATOR_URL must use http or https');
  }
  return value.replace(/\/+$/, '');
}

export function parseOrigins(raw: string | undefined): string[] {
  return (raw ?? 'http://localhost:5173')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    port: parsePositiveInt(env.PORT, 3000, 'PORT'),
    logLevel: env.LOG_LEVEL ?? 'info',
    logPretty: (env.LOG_PRETTY ?? 'true').toLowerCase() === 'true',
    ingress: {
      corsAllowedOrigins: parseOrigins(env.CORS_ALLOWED_ORIGINS),
      jsonBodyLimit: env.JSON_BODY_LIMIT ?? '1mb',
    },
    simulator: {
      baseUrl: parseSimulatorUrl(env.SIMULATOR_URL),
    },
    staticDir: path.resolve(process.cwd(), env.STATIC_DIR ?? 'frontend/dist'),
  };
}

const config: Config = loadConfig();

export default config;
