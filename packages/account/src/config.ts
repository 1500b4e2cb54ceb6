/**
 * @mailroot/account - Configuration
 *
 * Defaults for accounts created without explicit options, read from the
 * environment. Variables already set take precedence over the root .env file.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';

import { LOG_LEVELS } from '@mailroot/logger';

import { AccountError } from './interfaces/mailbox-protocol';
import { ACCESS_TYPES } from './interfaces/types';

import type { AccessType } from './interfaces/types';
import type { LogLevel } from '@mailroot/logger';

dotenvConfig({ path: resolve(__dirname, '../../../.env') });

// =============================================================================
// Types
// =============================================================================

export interface AccountSettings {
  /** Locale of localized default folder names (e.g. da_DK) */
  locale: string;
  /** Verify TLS certificates during autodiscovery */
  verifySsl: boolean;
  /** Access type of accounts created without credentials, when set */
  accessType?: AccessType;
  logLevel: LogLevel;
}

export const DEFAULT_LOCALE = 'da_DK';

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Variable Helpers
// =============================================================================

function getOptionalEnv(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value ? value : defaultValue;
}

function getBooleanEnv(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) {
    return defaultValue;
  }
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new AccountError(
        `Invalid ${key} '${value}', expected one of: true, false, 1, 0`,
        'INVALID_ARGUMENT'
      );
  }
}

function getChoiceEnv<T extends string>(env: Env, key: string, choices: readonly T[]): T | undefined {
  const value = env[key];
  if (!value) {
    return undefined;
  }
  const choice = choices.find((c) => c === value.toLowerCase());
  if (!choice) {
    throw new AccountError(
      `Invalid ${key} '${value}', expected one of: ${choices.join(', ')}`,
      'INVALID_ARGUMENT'
    );
  }
  return choice;
}

// =============================================================================
// Loader
// =============================================================================

export function loadAccountSettings(env: Env = process.env): AccountSettings {
  const accessType = getChoiceEnv(env, 'MAILBOX_ACCESS_TYPE', ACCESS_TYPES);

  return {
    locale: getOptionalEnv(env, 'MAILBOX_LOCALE', DEFAULT_LOCALE),
    verifySsl: getBooleanEnv(env, 'MAILBOX_VERIFY_SSL', true),
    ...(accessType && { accessType }),
    logLevel: getChoiceEnv(env, 'LOG_LEVEL', LOG_LEVELS) ?? 'info',
  };
}
