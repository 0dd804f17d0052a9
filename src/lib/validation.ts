/**
 * Validation utilities for URLs, ids, sizes, and configuration
 */

import type { ClientConfig } from '../types/config.js';
import { InvalidArgumentError, errorMessage } from '../utils/errors.js';

/**
 * Validate file size
 */
export function validateFileSize(size: number): void {
  if (!Number.isSafeInteger(size) || size < 0) {
    throw new InvalidArgumentError(
      `File size must be a non-negative integer, got ${size}`,
      'fileSizeBytes'
    );
  }
}

/**
 * Validate an external file URL; the server only fetches over https
 */
export function validateExternalUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new InvalidArgumentError(`Invalid external URL: ${errorMessage(error)}`, 'externalUrl');
  }

  if (parsed.protocol !== 'https:') {
    throw new InvalidArgumentError(
      `External URL must start with https://, got ${parsed.protocol}//`,
      'externalUrl'
    );
  }
}

/**
 * Validate API base URL
 */
export function validateBaseUrl(url: string): void {
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error('Protocol must be http or https');
    }
  } catch (error) {
    throw new InvalidArgumentError(`Invalid base URL: ${errorMessage(error)}`, 'baseUrl');
  }
}

/**
 * Validate a page, database, or upload id
 */
export function validateId(id: string, field: string): void {
  if (!id || id.trim().length === 0) {
    throw new InvalidArgumentError(`${field} cannot be empty`, field);
  }

  if (/[/?#\s]/.test(id)) {
    throw new InvalidArgumentError(`${field} contains invalid characters`, field);
  }
}

export function validatePositiveInteger(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${field} must be a positive integer, got ${value}`, field);
  }
}

export function validateNonNegativeNumber(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(`${field} must be a non-negative number, got ${value}`, field);
  }
}

/**
 * Validate client configuration
 */
export function validateClientConfig(config: ClientConfig): void {
  if (!config.apiKey || config.apiKey.trim().length === 0) {
    throw new InvalidArgumentError('API key cannot be empty', 'apiKey');
  }

  if (config.baseUrl !== undefined) {
    validateBaseUrl(config.baseUrl);
  }

  if (config.databaseId !== undefined) {
    validateId(config.databaseId, 'databaseId');
  }

  if (config.timeout !== undefined) {
    validatePositiveInteger(config.timeout, 'timeout');
  }

  if (config.pollAttempts !== undefined) {
    validatePositiveInteger(config.pollAttempts, 'pollAttempts');
  }

  if (config.pollInitialDelay !== undefined) {
    validateNonNegativeNumber(config.pollInitialDelay, 'pollInitialDelay');
  }
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';

  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return `${(bytes / Math.pow(k, i)).toFixed(2)} ${sizes[i]}`;
}
