/**
 * Registry Configuration
 *
 * Externalized configuration for the server registry.
 * All settings can be overridden via environment variables.
 */

import os from 'os';
import path from 'path';

/**
 * Registry configuration interface
 */
export interface RegistryConfig {
  /** JSON file holding the saved server list */
  preferencesPath: string;
  /** Directory scanned for *.cfg files when no saved list exists */
  serverDirectory: string;
  /** TCP connect timeout in milliseconds (default: 5000) */
  connectTimeoutMs: number;
}

/**
 * Default registry configuration values
 */
const defaults: RegistryConfig = {
  preferencesPath: path.join(os.homedir(), '.config', 'server-registry', 'preferences.json'),
  serverDirectory: path.join(process.cwd(), 'servers'),
  connectTimeoutMs: 5000
};

/**
 * Parse an integer from environment variable with fallback
 */
function parseIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Parse a path from environment variable with fallback
 */
function parsePathEnv(value: string | undefined, fallback: string): string {
  return value !== undefined && value !== '' ? path.resolve(value) : fallback;
}

/**
 * Load registry configuration from environment variables
 *
 * Environment Variables:
 * - SERVER_REGISTRY_PREFERENCES_PATH: Saved server list (default: ~/.config/server-registry/preferences.json)
 * - SERVER_REGISTRY_SERVER_DIR: Directory of *.cfg files (default: ./servers)
 * - SERVER_REGISTRY_CONNECT_TIMEOUT_MS: TCP connect timeout in milliseconds (default: 5000)
 */
export function loadRegistryConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  return {
    preferencesPath: parsePathEnv(env.SERVER_REGISTRY_PREFERENCES_PATH, defaults.preferencesPath),
    serverDirectory: parsePathEnv(env.SERVER_REGISTRY_SERVER_DIR, defaults.serverDirectory),
    connectTimeoutMs: parseIntEnv(env.SERVER_REGISTRY_CONNECT_TIMEOUT_MS, defaults.connectTimeoutMs)
  };
}

/**
 * Validate registry configuration
 * @returns Array of validation error messages, empty if valid
 */
export function validateRegistryConfig(config: RegistryConfig): string[] {
  const errors: string[] = [];

  if (config.preferencesPath.trim() === '') {
    errors.push('Invalid preferencesPath: must not be empty.');
  }

  if (config.serverDirectory.trim() === '') {
    errors.push('Invalid serverDirectory: must not be empty.');
  }

  if (config.connectTimeoutMs < 1) {
    errors.push(`Invalid connectTimeoutMs: ${config.connectTimeoutMs}. Must be at least 1ms.`);
  }

  return errors;
}

/**
 * Get the default registry configuration
 */
export function getDefaultRegistryConfig(): RegistryConfig {
  return { ...defaults };
}

/**
 * Create a registry configuration with custom overrides
 */
export function createRegistryConfig(overrides: Partial<RegistryConfig> = {}): RegistryConfig {
  return {
    ...loadRegistryConfig(),
    ...overrides
  };
}
