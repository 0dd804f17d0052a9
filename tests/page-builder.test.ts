/**
 * Page property mapping and block building tests
 *
 * Run with: node --import tsx --test tests/page-builder.test.ts
 */

import { test, describe } from 'node:test';
import assert from 'node:assert';
import {
  batchBlocks,
  buildCreatePayload,
  buildPageProperties,
  buildUpdatePayload,
  chunkText,
  determineBlockType,
  fileBlock,
  paragraphBlocks,
  parsePageProperties,
} from '../src/lib/page-builder.js';
import type { PageProperties } from '../src/types/page.js';
import { InvalidArgumentError } from '../src/utils/errors.js';

describe('chunkText', () => {
  test('splits into chunks of at most the given length', () => {
    assert.deepStrictEqual(Array.from(chunkText('abcdefg', 3)), ['abc', 'def', 'g']);
  });

  test('empty text yields nothing', () => {
    assert.deepStrictEqual(Array.from(chunkText('', 3)), []);
  });

  test('never splits a surrogate pair', () => {
    assert.deepStrictEqual(Array.from(chunkText('a😀b', 2)), ['a😀', 'b']);
  });

  test('uses 1950 characters by default', () => {
    const chunks = Array.from(chunkText('x'.repeat(4000)));
    assert.deepStrictEqual(
      chunks.map((chunk) => chunk.length),
      [1950, 1950, 100]
    );
  });

  test('rejects a non-positive length', () => {
    assert.throws(() => Array.from(chunkText('abc', 0)), InvalidArgumentError);
  });
});

describe('buildPageProperties', () => {
  test('maps every property onto the database schema', () => {
    const wire = buildPageProperties('Weekly notes', {
      source: 'Email',
      tags: ['work', 'urgent'],
      pinned: true,
      sourceUrl: 'https://example.com/thread/1',
      createdAt: new Date('2024-03-01T10:00:00.000Z'),
      updatedAt: new Date('2024-03-02T12:30:00.000Z'),
      fileCount: 2,
      linkCount: 0,
      status: 'Inbox',
      summary: 'Short summary',
    });

    assert.deepStrictEqual(wire, {
      Title: { title: [{ type: 'text', text: { content: 'Weekly notes' } }] },
      Source: { select: { name: 'Email' } },
      Tags: { multi_select: [{ name: 'work' }, { name: 'urgent' }] },
      Pinned: { checkbox: true },
      'Source URL': { url: 'https://example.com/thread/1' },
      Created: { date: { start: '2024-03-01T10:00:00.000Z' } },
      Updated: { date: { start: '2024-03-02T12:30:00.000Z' } },
      'File Count': { number: 2 },
      'Link Count': { number: 0 },
      Status: { select: { name: 'Inbox' } },
      Summary: { rich_text: [{ type: 'text', text: { content: 'Short summary' } }] },
    });
  });

  test('skips empty selects and tags but keeps false and zero', () => {
    const wire = buildPageProperties('T', { source: '', tags: [], pinned: false, fileCount: 0 });

    assert.deepStrictEqual(Object.keys(wire), ['Title', 'Pinned', 'File Count']);
    assert.deepStrictEqual(wire.Pinned, { checkbox: false });
  });

  test('long titles are split across rich text items', () => {
    const wire = buildPageProperties('y'.repeat(2000));
    const title = wire.Title;
    assert.ok('title' in title);
    assert.deepStrictEqual(
      title.title.map((item) => item.text.content.length),
      [1950, 50]
    );
  });

  test('invalid dates are rejected', () => {
    assert.throws(
      () => buildPageProperties('T', { createdAt: new Date('not a date') }),
      (error: unknown) => error instanceof InvalidArgumentError && error.field === 'createdAt'
    );
  });
});

describe('buildCreatePayload', () => {
  test('parents the page on the database and omits empty children', () => {
    assert.deepStrictEqual(buildCreatePayload('T', undefined, 'db-1'), {
      parent: { type: 'database_id', database_id: 'db-1' },
      properties: { Title: { title: [{ type: 'text', text: { content: 'T' } }] } },
    });
  });

  test('includes children when given', () => {
    const payload = buildCreatePayload('T', {}, 'db-1', paragraphBlocks('body'));
    assert.deepStrictEqual(payload.children, [
      { object: 'block', type: 'paragraph', paragraph: { rich_text: [{ type: 'text', text: { content: 'body' } }] } },
    ]);
  });
});

describe('buildUpdatePayload', () => {
  test('only sends the properties that are set', () => {
    assert.deepStrictEqual(buildUpdatePayload({ status: 'Done', linkCount: 3 }), {
      properties: {
        'Link Count': { number: 3 },
        Status: { select: { name: 'Done' } },
      },
    });
  });

  test('renames the page when a title is given', () => {
    assert.deepStrictEqual(buildUpdatePayload({ title: 'Renamed' }), {
      properties: { Title: { title: [{ type: 'text', text: { content: 'Renamed' } }] } },
    });
  });
});

describe('blocks', () => {
  test('batches blocks in groups of 100', () => {
    const blocks = paragraphBlocks('z'.repeat(1950 * 250));
    assert.deepStrictEqual(
      batchBlocks(blocks).map((batch) => batch.length),
      [100, 100, 50]
    );
  });

  test('picks the block type from the MIME type', () => {
    assert.strictEqual(determineBlockType('image/png'), 'image');
    assert.strictEqual(determineBlockType('video/mp4'), 'video');
    assert.strictEqual(determineBlockType('audio/mpeg'), 'audio');
    assert.strictEqual(determineBlockType('application/pdf'), 'pdf');
    assert.strictEqual(determineBlockType('application/zip'), 'file');
  });

  test('file blocks reference the upload and carry the file name', () => {
    assert.deepStrictEqual(fileBlock({ uploadId: 'up-1', fileName: 'photo.png', contentType: 'image/png' }), {
      object: 'block',
      type: 'image',
      image: {
        type: 'file_upload',
        file_upload: { id: 'up-1' },
        caption: [{ type: 'text', text: { content: 'photo.png' } }],
      },
    });
  });
});

describe('parsePageProperties', () => {
  test('reads back what buildPageProperties writes', () => {
    const properties: PageProperties = {
      source: 'Web',
      tags: ['a', 'b'],
      pinned: false,
      sourceUrl: 'https://example.com/',
      createdAt: new Date('2024-01-15T08:00:00.000Z'),
      updatedAt: new Date('2024-01-16T09:15:00.000Z'),
      fileCount: 1,
      linkCount: 4,
      status: 'Archived',
      summary: 'Summary text',
    };

    assert.deepStrictEqual(parsePageProperties(buildPageProperties('Round trip', properties)), {
      title: 'Round trip',
      properties,
    });
  });

  test('prefers plain_text from API responses and ignores unknown properties', () => {
    const parsed = parsePageProperties({
      Title: {
        id: 'title',
        type: 'title',
        title: [
          { type: 'text', text: { content: 'Hello ' }, plain_text: 'Hello ' },
          { type: 'text', text: { content: 'world' }, plain_text: 'world' },
        ],
      },
      Status: { id: 'abc', type: 'select', select: null },
      Extra: { type: 'formula', formula: { string: 'x' } },
    });

    assert.deepStrictEqual(parsed, { title: 'Hello world', properties: {} });
  });
});
