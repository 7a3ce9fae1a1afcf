/**
 * Configuration module for the reporting MCP server
 *
 * Handles environment validation and server configuration.
 */

import { ServerConfig, ConfigurationError } from '../types/index.js';

/**
 * Create a ServerConfig from environment variables after validating required values.
 *
 * @throws ConfigurationError if `REPORTING_PRINCIPAL` is missing or blank.
 */
export function validateEnvironment(): ServerConfig {
  const principal = process.env['REPORTING_PRINCIPAL'];
  const stateFile = process.env['REPORTING_STATE_FILE'];

  if (principal === undefined) {
    throw new ConfigurationError('REPORTING_PRINCIPAL environment variable is required but not set');
  }

  if (principal.trim().length === 0) {
    throw new ConfigurationError('REPORTING_PRINCIPAL must be a non-empty string');
  }

  const config: ServerConfig = {
    principal: principal.trim(),
  };

  const trimmedStateFile = stateFile?.trim();
  if (trimmedStateFile && trimmedStateFile.length > 0) {
    config.stateFile = trimmedStateFile;
  }

  return config;
}

export type { ServerConfig } from '../types/index.js';
