// src/config/env.ts
import dotenv from 'dotenv';

dotenv.config();

export interface HashParameters {
  timeCost: number;
  memoryCost: number; // KiB
  parallelism: number;
  hashLength: number;
  saltLength: number;
}

export interface AppConfig {
  port: number;
  mongoURI?: string;
  allowedOrigins: string[];
  jwtSecret: string;
  tokenTtlSeconds: number;
  hash: HashParameters;
  notificationIntervalMs: number;
  handshakeTimeoutMs: number;
  logoutGraceMs: number;
}

export const DEFAULT_HASH_PARAMETERS: HashParameters = {
  timeCost: 5,
  memoryCost: 7 * 1024,
  parallelism: 4,
  hashLength: 32,
  saltLength: 16
};

// Lowest values argon2 accepts
const HASH_MINIMUMS: HashParameters = {
  timeCost: 2,
  memoryCost: 1024,
  parallelism: 1,
  hashLength: 4,
  saltLength: 8
};

const readInt = (env: NodeJS.ProcessEnv, key: string, fallback: number, min = 0): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer of at least ${min}, got "${raw}"`);
  }
  return value;
};

/**
 * Reads the service configuration from the environment.
 * Throws when JWT_SECRET is missing or a number is out of range; the server
 * treats that as fatal.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) {
    throw new Error('JWT_SECRET is not defined');
  }

  return {
    port: readInt(env, 'PORT', 5000),
    mongoURI: env.MONGODB_URI,
    allowedOrigins: env.ALLOWED_ORIGINS
      ? env.ALLOWED_ORIGINS.split(',').map(origin => origin.trim())
      : ['http://localhost:3000'],
    jwtSecret,
    tokenTtlSeconds: readInt(env, 'TOKEN_TTL_SECONDS', 60 * 60, 1),
    hash: {
      timeCost: readInt(env, 'HASH_TIME_COST', DEFAULT_HASH_PARAMETERS.timeCost, HASH_MINIMUMS.timeCost),
      memoryCost: readInt(env, 'HASH_MEMORY_COST', DEFAULT_HASH_PARAMETERS.memoryCost, HASH_MINIMUMS.memoryCost),
      parallelism: readInt(env, 'HASH_PARALLELISM', DEFAULT_HASH_PARAMETERS.parallelism, HASH_MINIMUMS.parallelism),
      hashLength: readInt(env, 'HASH_LENGTH', DEFAULT_HASH_PARAMETERS.hashLength, HASH_MINIMUMS.hashLength),
      saltLength: readInt(env, 'HASH_SALT_LENGTH', DEFAULT_HASH_PARAMETERS.saltLength, HASH_MINIMUMS.saltLength)
    },
    notificationIntervalMs: readInt(env, 'NOTIFICATION_INTERVAL_MS', 20 * 1000),
    handshakeTimeoutMs: readInt(env, 'HANDSHAKE_TIMEOUT_MS', 5000),
    logoutGraceMs: readInt(env, 'LOGOUT_GRACE_MS', 1000)
  };
};
