/**
 * Centralized Configuration File
 *
 * Single Source of Truth for library configuration.
 * Values are read from environment variables once, when the module loads.
 */

import path from 'path';
import { DEFAULT_LOCALE, LOG_LEVELS } from '../utils/constants';

const ENVIRONMENTS: readonly string[] = ['development', 'production', 'test'];

export interface Config {
  env: string;

  logging: {
    level: string;
    enableFileLogging: boolean;
    logDir: string;
  };

  formatting: {
    locale: string;
  };
}

/**
 * Configuration object
 * All environment variables centralized here
 */
export const config: Config = {
  // Environment
  env: process.env.NODE_ENV || 'development',

  // Logging Configuration
  logging: {
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
    enableFileLogging: process.env.ENABLE_FILE_LOGGING === 'true',
    logDir: process.env.LOG_DIR || path.join(__dirname, '..', 'logs'),
  },

  // Date Formatting
  formatting: {
    // Month names and the AM/PM marker are rendered in this locale
    locale: process.env.DATE_FORMAT_LOCALE || DEFAULT_LOCALE,
  },
};

function isSupportedLocale(locale: string): boolean {
  try {
    return Intl.DateTimeFormat.supportedLocalesOf([locale]).length > 0;
  } catch {
    // supportedLocalesOf throws RangeError on malformed tags
    return false;
  }
}

/**
 * Validate configuration
 * @param candidate - Configuration to check (defaults to the loaded config)
 * @throws {Error} If any value is invalid; the message lists every problem
 */
export function validateConfig(candidate: Config = config): void {
  const errors: string[] = [];

  if (!ENVIRONMENTS.includes(candidate.env)) {
    errors.push(`NODE_ENV must be one of ${ENVIRONMENTS.join(', ')} (got "${candidate.env}")`);
  }

  const levels = [...Object.keys(LOG_LEVELS), 'silent'];
  if (!levels.includes(candidate.logging.level)) {
    errors.push(`LOG_LEVEL must be one of ${levels.join(', ')} (got "${candidate.logging.level}")`);
  }

  if (!isSupportedLocale(candidate.formatting.locale)) {
    errors.push(`DATE_FORMAT_LOCALE "${candidate.formatting.locale}" is not a supported locale`);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}

export default config;
