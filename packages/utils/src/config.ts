// ──────────────────────────────────────────────
// Scrubline - Environment Configuration Helper
// ──────────────────────────────────────────────

import type { ScopePolicy } from "@scrubline/types";
import { SCOPE_POLICIES } from "@scrubline/types";

export function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function getEnvAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

export function getEnvAsPositiveInt(key: string, defaultValue: number): number {
  const parsed = getEnvAsNumber(key, defaultValue);
  if (parsed < 1) {
    throw new Error(`Environment variable ${key} must be a positive integer, got: ${parsed}`);
  }
  return parsed;
}

export function getEnvAsScopePolicy(key: string, defaultValue: ScopePolicy): ScopePolicy {
  const value = process.env[key];
  if (!value) return defaultValue;
  const policy = SCOPE_POLICIES.find((candidate) => candidate === value);
  if (!policy) {
    throw new Error(
      `Environment variable ${key} must be one of ${SCOPE_POLICIES.join(", ")}, got: ${value}`
    );
  }
  return policy;
}

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;

  backend: {
    port: number;
    host: string;
  };

  rateLimit: {
    max: number;
    windowMs: number;
  };

  quota: {
    maxRows: number;
    maxColumns: number;
    maxOperations: number;
  };

  cleaning: {
    scopePolicy: ScopePolicy;
    dateSampleSize: number;
  };
}

export function loadConfig(): AppConfig {
  return {
    nodeEnv: getEnvOrDefault("NODE_ENV", "development"),
    logLevel: getEnvOrDefault("LOG_LEVEL", "info"),

    backend: {
      port: getEnvAsNumber("BACKEND_PORT", 4000),
      host: getEnvOrDefault("BACKEND_HOST", "0.0.0.0"),
    },

    rateLimit: {
      max: getEnvAsPositiveInt("RATE_LIMIT_MAX", 100),
      windowMs: getEnvAsPositiveInt("RATE_LIMIT_WINDOW_MS", 60000),
    },

    quota: {
      maxRows: getEnvAsPositiveInt("QUOTA_MAX_ROWS", 100000),
      maxColumns: getEnvAsPositiveInt("QUOTA_MAX_COLUMNS", 500),
      maxOperations: getEnvAsPositiveInt("QUOTA_MAX_OPERATIONS", 50),
    },

    cleaning: {
      scopePolicy: getEnvAsScopePolicy("CLEANING_SCOPE_POLICY", "permissive"),
      dateSampleSize: getEnvAsPositiveInt("CLEANING_DATE_SAMPLE_SIZE", 100),
    },
  };
}
