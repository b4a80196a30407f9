/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - No secrets are logged or exposed in error messages
 * - Production requires a proper JWT secret (validated at startup)
 * - Development uses an auto-generated secret if not provided
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getRequired() for mandatory production values
 * - Use getOptional() for values with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';
import { randomBytes } from 'crypto';
import { DISPATCH_DEFAULTS } from '../core/constants';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get required environment variable (throws if missing in production)
 */
function getRequired(key: string, devDefault?: string): string {
  const value = process.env[key];

  if (value && value.trim() !== '') {
    return value;
  }

  if (process.env.NODE_ENV !== 'production') {
    if (devDefault) {
      console.warn(`⚠️  [CONFIG] ${key} not set, using development default`);
      return devDefault;
    }
    // Tests and local runs get a throwaway secret
    return randomBytes(32).toString('hex');
  }

  throw new Error(`❌ FATAL: ${key} is required in production!`);
}

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', 'localhost'),

  // JWT - tokens are issued by the identity service, we only verify them
  jwt: {
    secret: getRequired('JWT_SECRET'),
  },

  // Storage - empty path keeps everything in memory
  database: {
    file: getOptional('DISPATCH_DB_FILE', ''),
  },

  // Dispatch rules
  dispatch: {
    workloadWarningThreshold: getNumber('DISPATCH_WORKLOAD_THRESHOLD', DISPATCH_DEFAULTS.WORKLOAD_WARNING_THRESHOLD),
    requireReasonForInProgressReassignment: getBoolean(
      'DISPATCH_REQUIRE_REASON_IN_PROGRESS',
      DISPATCH_DEFAULTS.REQUIRE_REASON_FOR_IN_PROGRESS_REASSIGNMENT
    ),
  },

  // Identity service (technician directory)
  identity: {
    baseUrl: getOptional('IDENTITY_SERVICE_URL', 'http://localhost:8080'),
    validationEnabled: getBoolean('IDENTITY_VALIDATION_ENABLED', true),
    failOpen: getBoolean('IDENTITY_FAIL_OPEN', true),
    timeoutMs: getNumber('IDENTITY_TIMEOUT_MS', 3000),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'debug'),

  // CORS
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is missing
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.dispatch.workloadWarningThreshold < 1) {
    errors.push('DISPATCH_WORKLOAD_THRESHOLD must be at least 1');
  }

  if (config.identity.timeoutMs < 1) {
    errors.push('IDENTITY_TIMEOUT_MS must be a positive number of milliseconds');
  }

  if (config.isProduction) {
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    if (!config.identity.validationEnabled) {
      warnings.push('IDENTITY_VALIDATION_ENABLED is false - technicians are assigned without directory checks');
    } else if (config.identity.failOpen) {
      warnings.push('IDENTITY_FAIL_OPEN is true - assignments proceed when the identity service is down');
    }

    if (!config.database.file) {
      warnings.push('DISPATCH_DB_FILE is empty - dispatch data is lost on restart');
    }
  }

  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

validateConfig();
