/**
 * Maps typed page properties onto the database's wire schema and back,
 * and builds the content blocks appended to pages
 */

import type {
  Block,
  FileBlock,
  FileBlockType,
  CreatePageRequest,
  ParagraphBlock,
  RichTextItem,
  UpdatePageRequest,
  WirePageProperties,
} from '../types/api.js';
import type { PageProperties } from '../types/page.js';
import type { CompletedUpload } from '../types/upload.js';
import { InvalidArgumentError } from '../utils/errors.js';
import { isRecord } from '../utils/guards.js';

/** Longest text content the API accepts per rich text item, with headroom */
export const MAX_TEXT_LENGTH = 1950;

/** Most children the API accepts in one create or append request */
export const MAX_BLOCKS_PER_REQUEST = 100;

/**
 * Property names in the target database
 */
export const PROPERTY_NAMES = {
  title: 'Title',
  source: 'Source',
  tags: 'Tags',
  pinned: 'Pinned',
  sourceUrl: 'Source URL',
  createdAt: 'Created',
  updatedAt: 'Updated',
  fileCount: 'File Count',
  linkCount: 'Link Count',
  status: 'Status',
  summary: 'Summary',
} as const;

const MEDIA_BLOCK_TYPES = ['image', 'video', 'audio', 'pdf'] as const;

const FILE_TYPE_MIME_MAPPING: Record<(typeof MEDIA_BLOCK_TYPES)[number], ReadonlySet<string>> = {
  image: new Set(['image/jpeg', 'image/png', 'image/gif', 'image/webp', 'image/svg+xml']),
  video: new Set(['video/mp4', 'video/quicktime', 'video/x-msvideo', 'video/webm']),
  audio: new Set(['audio/mpeg', 'audio/mp4', 'audio/wav', 'audio/ogg', 'audio/webm']),
  pdf: new Set(['application/pdf']),
};

/**
 * Split text into chunks of at most maxLength characters.
 * Splits between code points, never inside a surrogate pair.
 */
export function* chunkText(text: string, maxLength: number = MAX_TEXT_LENGTH): Generator<string, void, void> {
  if (maxLength <= 0) {
    throw new InvalidArgumentError('Chunk length must be positive', 'maxLength');
  }

  let chunk = '';
  let length = 0;
  for (const char of text) {
    chunk += char;
    length++;
    if (length === maxLength) {
      yield chunk;
      chunk = '';
      length = 0;
    }
  }

  if (length > 0) {
    yield chunk;
  }
}

function textItem(content: string): RichTextItem {
  return { type: 'text', text: { content } };
}

function richText(text: string): RichTextItem[] {
  return Array.from(chunkText(text), textItem);
}

function isoDate(value: Date, field: string): { start: string } {
  if (Number.isNaN(value.getTime())) {
    throw new InvalidArgumentError(`${field} is not a valid date`, field);
  }
  return { start: value.toISOString() };
}

/**
 * Wire values for every property that is set.
 * Selects, tags and URLs are skipped when empty; checkboxes, numbers and
 * rich text are written whenever they are defined.
 */
function mapProperties(properties: PageProperties): WirePageProperties {
  const wire: WirePageProperties = {};

  if (properties.source) {
    wire[PROPERTY_NAMES.source] = { select: { name: properties.source } };
  }

  if (properties.tags && properties.tags.length > 0) {
    wire[PROPERTY_NAMES.tags] = { multi_select: properties.tags.map((name) => ({ name })) };
  }

  if (properties.pinned !== undefined) {
    wire[PROPERTY_NAMES.pinned] = { checkbox: properties.pinned };
  }

  if (properties.sourceUrl) {
    wire[PROPERTY_NAMES.sourceUrl] = { url: properties.sourceUrl };
  }

  if (properties.createdAt) {
    wire[PROPERTY_NAMES.createdAt] = { date: isoDate(properties.createdAt, 'createdAt') };
  }

  if (properties.updatedAt) {
    wire[PROPERTY_NAMES.updatedAt] = { date: isoDate(properties.updatedAt, 'updatedAt') };
  }

  if (properties.fileCount !== undefined) {
    wire[PROPERTY_NAMES.fileCount] = { number: properties.fileCount };
  }

  if (properties.linkCount !== undefined) {
    wire[PROPERTY_NAMES.linkCount] = { number: properties.linkCount };
  }

  if (properties.status) {
    wire[PROPERTY_NAMES.status] = { select: { name: properties.status } };
  }

  if (properties.summary !== undefined) {
    wire[PROPERTY_NAMES.summary] = { rich_text: richText(properties.summary) };
  }

  return wire;
}

export function buildPageProperties(title: string, properties: PageProperties = {}): WirePageProperties {
  return {
    [PROPERTY_NAMES.title]: { title: richText(title) },
    ...mapProperties(properties),
  };
}

export function buildCreatePayload(
  title: string,
  properties: PageProperties | undefined,
  containerId: string,
  children: Block[] = []
): CreatePageRequest {
  const payload: CreatePageRequest = {
    parent: { type: 'database_id', database_id: containerId },
    properties: buildPageProperties(title, properties),
  };

  if (children.length > 0) {
    payload.children = children;
  }

  return payload;
}

export function buildUpdatePayload(properties: PageProperties & { title?: string }): UpdatePageRequest {
  const { title, ...rest } = properties;
  const wire = mapProperties(rest);

  if (title !== undefined) {
    wire[PROPERTY_NAMES.title] = { title: richText(title) };
  }

  return { properties: wire };
}

export function paragraphBlock(content: string): ParagraphBlock {
  return {
    object: 'block',
    type: 'paragraph',
    paragraph: { rich_text: [textItem(content)] },
  };
}

/**
 * One paragraph per chunk of text
 */
export function paragraphBlocks(text: string): ParagraphBlock[] {
  return Array.from(chunkText(text), paragraphBlock);
}

/**
 * Split blocks into request-sized batches
 */
export function batchBlocks<T extends Block>(blocks: T[], size: number = MAX_BLOCKS_PER_REQUEST): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < blocks.length; i += size) {
    batches.push(blocks.slice(i, i + size));
  }
  return batches;
}

export function determineBlockType(mimeType: string): FileBlockType {
  for (const type of MEDIA_BLOCK_TYPES) {
    if (FILE_TYPE_MIME_MAPPING[type].has(mimeType)) {
      return type;
    }
  }
  return 'file';
}

/**
 * Block referencing a completed upload, captioned with the file name
 */
export function fileBlock(upload: Pick<CompletedUpload, 'uploadId' | 'fileName' | 'contentType'>): FileBlock {
  const type = determineBlockType(upload.contentType);
  const block: FileBlock = { object: 'block', type };

  block[type] = {
    type: 'file_upload',
    file_upload: { id: upload.uploadId },
    ...(upload.fileName ? { caption: [textItem(upload.fileName)] } : {}),
  };

  return block;
}

// Reading properties back

export interface ParsedPage {
  title: string;
  properties: PageProperties;
}

function readPlainText(items: unknown): string | undefined {
  if (!Array.isArray(items)) return undefined;

  return items
    .map((item: unknown) => {
      if (!isRecord(item)) return '';
      if (typeof item.plain_text === 'string') return item.plain_text;
      return isRecord(item.text) && typeof item.text.content === 'string' ? item.text.content : '';
    })
    .join('');
}

function readSelect(value: unknown): string | undefined {
  return isRecord(value) && isRecord(value.select) && typeof value.select.name === 'string'
    ? value.select.name
    : undefined;
}

function readDate(value: unknown): Date | undefined {
  if (!isRecord(value) || !isRecord(value.date) || typeof value.date.start !== 'string') {
    return undefined;
  }
  const date = new Date(value.date.start);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function readNumber(value: unknown): number | undefined {
  return isRecord(value) && typeof value.number === 'number' ? value.number : undefined;
}

/**
 * Inverse of buildPageProperties for the fixed schema; unknown or empty
 * properties are left out
 */
export function parsePageProperties(wire: Record<string, unknown>): ParsedPage {
  const get = (name: string): unknown => wire[name];
  const properties: PageProperties = {};

  const title = get(PROPERTY_NAMES.title);
  const source = readSelect(get(PROPERTY_NAMES.source));
  if (source !== undefined) properties.source = source;

  const tags = get(PROPERTY_NAMES.tags);
  if (isRecord(tags) && Array.isArray(tags.multi_select)) {
    properties.tags = tags.multi_select.flatMap((option: unknown) =>
      isRecord(option) && typeof option.name === 'string' ? [option.name] : []
    );
  }

  const pinned = get(PROPERTY_NAMES.pinned);
  if (isRecord(pinned) && typeof pinned.checkbox === 'boolean') {
    properties.pinned = pinned.checkbox;
  }

  const sourceUrl = get(PROPERTY_NAMES.sourceUrl);
  if (isRecord(sourceUrl) && typeof sourceUrl.url === 'string') {
    properties.sourceUrl = sourceUrl.url;
  }

  const createdAt = readDate(get(PROPERTY_NAMES.createdAt));
  if (createdAt) properties.createdAt = createdAt;

  const updatedAt = readDate(get(PROPERTY_NAMES.updatedAt));
  if (updatedAt) properties.updatedAt = updatedAt;

  const fileCount = readNumber(get(PROPERTY_NAMES.fileCount));
  if (fileCount !== undefined) properties.fileCount = fileCount;

  const linkCount = readNumber(get(PROPERTY_NAMES.linkCount));
  if (linkCount !== undefined) properties.linkCount = linkCount;

  const status = readSelect(get(PROPERTY_NAMES.status));
  if (status !== undefined) properties.status = status;

  const summary = get(PROPERTY_NAMES.summary);
  const summaryText = isRecord(summary) ? readPlainText(summary.rich_text) : undefined;
  if (summaryText !== undefined) properties.summary = summaryText;

  return {
    title: (isRecord(title) ? readPlainText(title.title) : undefined) ?? '',
    properties,
  };
}
