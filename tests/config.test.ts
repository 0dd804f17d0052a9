/**
 * Environment configuration tests
 *
 * Run with: node --import tsx --test tests/config.test.ts
 */

import { test, describe } from 'node:test';
import assert from 'node:assert';
import { loadConfig } from '../src/config.js';
import { InvalidArgumentError } from '../src/utils/errors.js';

describe('loadConfig', () => {
  test('reads every NOTION_* variable', () => {
    const config = loadConfig({
      NOTION_API_KEY: 'test-secret',
      NOTION_VERSION: '2022-06-28',
      NOTION_DATABASE_ID: 'db-1',
      NOTION_API_BASE_URL: 'http://localhost:8080/v1',
      NOTION_TIMEOUT_MS: '5000',
      NOTION_POLL_ATTEMPTS: '3',
      NOTION_POLL_INITIAL_DELAY_MS: '250',
    });

    assert.deepStrictEqual(config, {
      apiKey: 'test-secret',
      notionVersion: '2022-06-28',
      databaseId: 'db-1',
      baseUrl: 'http://localhost:8080/v1',
      timeout: 5000,
      pollAttempts: 3,
      pollInitialDelay: 250,
    });
  });

  test('unset and blank variables stay undefined', () => {
    const config = loadConfig({ NOTION_API_KEY: 'test-secret', NOTION_DATABASE_ID: '  ' });

    assert.strictEqual(config.apiKey, 'test-secret');
    assert.strictEqual(config.databaseId, undefined);
    assert.strictEqual(config.timeout, undefined);
  });

  test('the API key is required', () => {
    assert.throws(
      () => loadConfig({}),
      (error: unknown) => error instanceof InvalidArgumentError && error.message === 'NOTION_API_KEY is not set'
    );
  });

  test('numbers must parse', () => {
    assert.throws(
      () => loadConfig({ NOTION_API_KEY: 'test-secret', NOTION_TIMEOUT_MS: 'soon' }),
      (error: unknown) =>
        error instanceof InvalidArgumentError && error.message === "NOTION_TIMEOUT_MS must be a number, got 'soon'"
    );
  });

  test('values are validated', () => {
    assert.throws(
      () => loadConfig({ NOTION_API_KEY: 'test-secret', NOTION_POLL_ATTEMPTS: '0' }),
      (error: unknown) => error instanceof InvalidArgumentError && error.field === 'pollAttempts'
    );
    assert.throws(
      () => loadConfig({ NOTION_API_KEY: 'test-secret', NOTION_API_BASE_URL: 'ftp://example.com' }),
      (error: unknown) => error instanceof InvalidArgumentError && error.field === 'baseUrl'
    );
  });
});
