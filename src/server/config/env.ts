/**
 * Environment Variable Validation
 *
 * Centralized validation of all environment variables. Every invalid variable is
 * collected and reported in a single error so a misconfigured deployment fails
 * once with the full list.
 */

// Load dotenv early to ensure environment variables are available before validation
import * as dotenv from 'dotenv';
dotenv.config();

import { logger } from '../utils/logger.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return (NODE_ENVS as readonly string[]).includes(value);
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: NodeEnv;
  PORT: number;

  // Analysis webhook
  ANALYSIS_WEBHOOK_URL: string;
  ANALYSIS_TIMEOUT_SECONDS: number;

  // Uploads
  MAX_FILE_SIZE_MB: number;

  // CORS Configuration
  ALLOWED_ORIGINS: string[];

  // Layout
  SKILLS_TWO_COLUMN_MIN_BULLETS: number;

  // Logging Configuration
  LOG_LEVEL?: string;
  LOG_PRETTY: boolean;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If any variable is invalid
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  // Validate NODE_ENV
  const nodeEnvRaw = process.env.NODE_ENV || 'development';
  let nodeEnv: NodeEnv = 'development';
  if (isNodeEnv(nodeEnvRaw)) {
    nodeEnv = nodeEnvRaw;
  } else {
    errors.push(`NODE_ENV: Invalid value "${nodeEnvRaw}". Must be development, production, or test.`);
  }

  // Validate PORT
  const port = parseNumericEnv(process.env.PORT, 8000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  // Validate ANALYSIS_WEBHOOK_URL
  const webhookUrl = process.env.ANALYSIS_WEBHOOK_URL || 'http://localhost:5678/webhook/resume';
  if (!isHttpUrl(webhookUrl)) {
    errors.push(`ANALYSIS_WEBHOOK_URL: Invalid value "${webhookUrl}". Must be an http(s) URL.`);
  }

  const timeoutSeconds = parseNumericEnv(process.env.ANALYSIS_TIMEOUT_SECONDS, 120);
  if (timeoutSeconds <= 0) {
    errors.push(`ANALYSIS_TIMEOUT_SECONDS: Invalid value "${process.env.ANALYSIS_TIMEOUT_SECONDS}". Must be greater than 0.`);
  }

  const maxFileSizeMb = parseNumericEnv(process.env.MAX_FILE_SIZE_MB, 5);
  if (maxFileSizeMb <= 0) {
    errors.push(`MAX_FILE_SIZE_MB: Invalid value "${process.env.MAX_FILE_SIZE_MB}". Must be greater than 0.`);
  }

  const twoColumnMinBullets = parseNumericEnv(process.env.SKILLS_TWO_COLUMN_MIN_BULLETS, 6);
  if (twoColumnMinBullets < 1) {
    errors.push(`SKILLS_TWO_COLUMN_MIN_BULLETS: Invalid value "${process.env.SKILLS_TWO_COLUMN_MIN_BULLETS}". Must be at least 1.`);
  }

  const allowedOrigins = (process.env.ALLOWED_ORIGINS || '*')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  // If there are validation errors, throw
  if (errors.length > 0) {
    logger.error({ errors }, 'Environment variable validation failed');
    throw new Error(
      `Environment variable validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}\n\n` +
        'Please check your .env file or environment variables.'
    );
  }

  validatedEnv = Object.freeze({
    NODE_ENV: nodeEnv,
    PORT: port,

    ANALYSIS_WEBHOOK_URL: webhookUrl,
    ANALYSIS_TIMEOUT_SECONDS: timeoutSeconds,

    MAX_FILE_SIZE_MB: maxFileSizeMb,

    ALLOWED_ORIGINS: allowedOrigins.length > 0 ? allowedOrigins : ['*'],

    SKILLS_TWO_COLUMN_MIN_BULLETS: twoColumnMinBullets,

    LOG_LEVEL: process.env.LOG_LEVEL,
    LOG_PRETTY: parseBooleanEnv(process.env.LOG_PRETTY, nodeEnv === 'development'),
  });

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
