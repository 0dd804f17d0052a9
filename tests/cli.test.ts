/**
 * Command line parsing tests
 *
 * Run with: node --import tsx --test tests/cli.test.ts
 */

import { test, describe, mock } from 'node:test';
import assert from 'node:assert';
import { parseCommand, runCli } from '../src/cli.js';
import { InvalidArgumentError } from '../src/utils/errors.js';

describe('parseCommand', () => {
  test('no command shows help', () => {
    assert.deepStrictEqual(parseCommand([]), { name: 'help' });
    assert.deepStrictEqual(parseCommand(['upload', '--help']), { name: 'help' });
  });

  test('create-page with properties', () => {
    assert.deepStrictEqual(
      parseCommand([
        'create-page',
        '--title', 'Notes',
        '--content', 'Body',
        '--tags', 'a, b,,c',
        '--pinned',
        '--file-count', '2',
        '--created', '2024-05-01T00:00:00Z',
      ]),
      {
        name: 'create-page',
        debug: false,
        title: 'Notes',
        content: 'Body',
        contentFile: undefined,
        parentId: undefined,
        properties: {
          tags: ['a', 'b', 'c'],
          pinned: true,
          fileCount: 2,
          createdAt: new Date('2024-05-01T00:00:00.000Z'),
        },
      }
    );
  });

  test('create-page needs a title', () => {
    assert.throws(
      () => parseCommand(['create-page']),
      (error: unknown) => error instanceof InvalidArgumentError && error.message === '--title is required'
    );
  });

  test('update-page takes the page id and a property', () => {
    assert.deepStrictEqual(parseCommand(['update-page', 'page-1', '--no-pinned', '--debug']), {
      name: 'update-page',
      debug: true,
      pageId: 'page-1',
      title: undefined,
      properties: { pinned: false },
    });

    assert.throws(() => parseCommand(['update-page', 'page-1']), InvalidArgumentError);
  });

  test('upload from a file or an external URL', () => {
    assert.deepStrictEqual(parseCommand(['upload', './a.png', '--page', 'page-1']), {
      name: 'upload',
      debug: false,
      pageId: 'page-1',
      filePath: './a.png',
      externalUrl: undefined,
      fileName: undefined,
      contentType: undefined,
    });

    const external = parseCommand([
      'upload', '--external-url', 'https://example.com/a.png', '--name', 'a.png', '--page', 'page-1',
    ]);
    assert.strictEqual(external.name === 'upload' && external.externalUrl, 'https://example.com/a.png');

    assert.throws(() => parseCommand(['upload', '--external-url', 'https://example.com/a.png', '--page', 'p']), InvalidArgumentError);
    assert.throws(() => parseCommand(['upload', './a.png']), InvalidArgumentError);
  });

  test('counts must be non-negative integers', () => {
    assert.throws(
      () => parseCommand(['create-page', '--title', 'T', '--file-count=abc']),
      (error: unknown) =>
        error instanceof InvalidArgumentError &&
        error.field === 'file-count' &&
        error.message === "--file-count must be a non-negative integer, got 'abc'"
    );
  });

  test('unknown flags and commands are rejected', () => {
    assert.throws(() => parseCommand(['create-page', '--title', 'T', '--colour', 'red']), InvalidArgumentError);
    assert.throws(
      () => parseCommand(['delete-page']),
      (error: unknown) => error instanceof InvalidArgumentError && error.message === 'Unknown command: delete-page'
    );
  });
});

describe('runCli', () => {
  test('exits with 1 when the API key is missing', async (t) => {
    const errors = t.mock.method(console, 'error', () => {});

    const code = await runCli(['create-page', '--title', 'T'], {});

    assert.strictEqual(code, 1);
    assert.ok(errors.mock.callCount() >= 1);
  });

  test('prints usage for help', async () => {
    const log = mock.method(console, 'log', () => {});
    try {
      assert.strictEqual(await runCli(['--help'], {}), 0);
      assert.strictEqual(log.mock.callCount(), 1);
    } finally {
      log.mock.restore();
    }
  });
});
