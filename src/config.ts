/**
 * Client configuration from environment variables
 */

import type { ClientConfig } from './types/config.js';
import { validateClientConfig } from './lib/validation.js';
import { InvalidArgumentError } from './utils/errors.js';

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`${name} must be a number, got '${raw}'`, name);
  }
  return value;
}

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Build and validate client config from NOTION_* variables
 */
export function loadConfig(env: Env = process.env): ClientConfig {
  const apiKey = readString(env, 'NOTION_API_KEY');
  if (!apiKey) {
    throw new InvalidArgumentError('NOTION_API_KEY is not set', 'NOTION_API_KEY');
  }

  const config: ClientConfig = {
    apiKey,
    notionVersion: readString(env, 'NOTION_VERSION'),
    databaseId: readString(env, 'NOTION_DATABASE_ID'),
    baseUrl: readString(env, 'NOTION_API_BASE_URL'),
    timeout: readNumber(env, 'NOTION_TIMEOUT_MS'),
    pollAttempts: readNumber(env, 'NOTION_POLL_ATTEMPTS'),
    pollInitialDelay: readNumber(env, 'NOTION_POLL_INITIAL_DELAY_MS'),
  };

  validateClientConfig(config);
  return config;
}
