/**
 * Upload planning tests
 *
 * Run with: node --import tsx --test tests/planner.test.ts
 */

import { test, describe } from 'node:test';
import assert from 'node:assert';
import { MULTIPART_THRESHOLD, PART_SIZE, partRange, plan } from '../src/lib/planner.js';
import { InvalidArgumentError } from '../src/utils/errors.js';

const MiB = 1024 * 1024;

describe('plan', () => {
  test('thresholds match the API limits', () => {
    assert.strictEqual(MULTIPART_THRESHOLD, 20 * MiB);
    assert.strictEqual(PART_SIZE, 10 * MiB);
  });

  test('files up to 20 MiB go up in one request', () => {
    for (const size of [0, 1, 5 * MiB, 20 * MiB]) {
      assert.deepStrictEqual(plan(size), { mode: 'single_part', partSizeBytes: PART_SIZE });
    }
  });

  test('unknown size is a single part upload', () => {
    assert.deepStrictEqual(plan(), { mode: 'single_part', partSizeBytes: PART_SIZE });
  });

  test('files above 20 MiB are split into 10 MiB parts', () => {
    assert.deepStrictEqual(plan(20 * MiB + 1), {
      mode: 'multi_part',
      partSizeBytes: PART_SIZE,
      numberOfParts: 3,
      fileSizeBytes: 20 * MiB + 1,
    });

    const twentyFour = plan(25_165_824);
    assert.strictEqual(twentyFour.mode, 'multi_part');
    assert.strictEqual(twentyFour.mode === 'multi_part' && twentyFour.numberOfParts, 3);

    const hundred = plan(100 * MiB);
    assert.strictEqual(hundred.mode === 'multi_part' && hundred.numberOfParts, 10);
  });

  test('external URL wins over size', () => {
    assert.deepStrictEqual(plan(50 * MiB, 'https://example.com/video.mp4'), {
      mode: 'external_url',
      partSizeBytes: PART_SIZE,
      externalUrl: 'https://example.com/video.mp4',
    });
  });

  test('insecure external URL is rejected', () => {
    assert.throws(
      () => plan(undefined, 'http://example.com/a.png'),
      (error: unknown) =>
        error instanceof InvalidArgumentError &&
        error.field === 'externalUrl' &&
        error.message === 'External URL must start with https://, got http://'
    );
  });

  test('unparseable external URL is rejected', () => {
    assert.throws(() => plan(undefined, 'example.com/a.png'), InvalidArgumentError);
  });

  test('negative and fractional sizes are rejected', () => {
    assert.throws(() => plan(-1), InvalidArgumentError);
    assert.throws(() => plan(1.5), InvalidArgumentError);
  });

  test('same input gives the same plan', () => {
    assert.deepStrictEqual(plan(64 * MiB), plan(64 * MiB));
  });
});

describe('partRange', () => {
  test('parts are contiguous and the last one is short', () => {
    assert.deepStrictEqual(partRange(1, 10, 25), { start: 0, end: 10 });
    assert.deepStrictEqual(partRange(2, 10, 25), { start: 10, end: 20 });
    assert.deepStrictEqual(partRange(3, 10, 25), { start: 20, end: 25 });
  });
});
