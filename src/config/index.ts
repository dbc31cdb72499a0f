/**
 * Configuration Module
 *
 * Centralized configuration management for the server registry.
 */

export {
  type RegistryConfig,
  loadRegistryConfig,
  validateRegistryConfig,
  getDefaultRegistryConfig,
  createRegistryConfig
} from './registry.js';
