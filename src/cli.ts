/**
 * notion-ingest command line: create pages, update their properties, and
 * upload files onto them
 */

import { parseArgs } from 'node:util';
import fs from 'fs/promises';
import chalk from 'chalk';
import ora from 'ora';
import { NotionClient } from './client.js';
import { loadConfig } from './config.js';
import { formatBytes } from './lib/validation.js';
import { getMimeType } from './platforms/common.js';
import type { PageProperties } from './types/page.js';
import type { CompletedUpload } from './types/upload.js';
import { InvalidArgumentError, errorMessage, isApiError } from './utils/errors.js';
import { initLogger, isLogLevel, type LogLevel } from './utils/logger.js';

export const USAGE = `Usage: notion-ingest <command> [options]

Commands:
  create-page --title <title> [--content <text> | --content-file <path>] [--parent <databaseId>]
  update-page <pageId> [--title <title>]
  upload <file> --page <pageId> [--content-type <mime>] [--name <fileName>]
  upload --external-url <https url> --name <fileName> --page <pageId>

Property options (create-page, update-page):
  --source <name>        --tags <a,b,...>     --pinned / --no-pinned
  --source-url <url>     --status <name>      --summary <text>
  --created <iso date>   --updated <iso date>
  --file-count <n>       --link-count <n>

Global options:
  --debug                Verbose logging
  --help                 Show this message`;

export type Command =
  | { name: 'help' }
  | {
      name: 'create-page';
      debug: boolean;
      title: string;
      content?: string;
      contentFile?: string;
      parentId?: string;
      properties: PageProperties;
    }
  | {
      name: 'update-page';
      debug: boolean;
      pageId: string;
      title?: string;
      properties: PageProperties;
    }
  | {
      name: 'upload';
      debug: boolean;
      pageId: string;
      filePath?: string;
      externalUrl?: string;
      fileName?: string;
      contentType?: string;
    };

const OPTIONS = {
  title: { type: 'string' },
  content: { type: 'string' },
  'content-file': { type: 'string' },
  parent: { type: 'string' },
  source: { type: 'string' },
  tags: { type: 'string' },
  pinned: { type: 'boolean' },
  'no-pinned': { type: 'boolean' },
  'source-url': { type: 'string' },
  status: { type: 'string' },
  summary: { type: 'string' },
  created: { type: 'string' },
  updated: { type: 'string' },
  'file-count': { type: 'string' },
  'link-count': { type: 'string' },
  page: { type: 'string' },
  'content-type': { type: 'string' },
  'external-url': { type: 'string' },
  name: { type: 'string' },
  debug: { type: 'boolean' },
  help: { type: 'boolean' },
} as const;

function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const count = Number(value);
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new InvalidArgumentError(`--${flag} must be a non-negative integer, got '${value}'`, flag);
  }
  return count;
}

function parseDate(value: string | undefined, flag: string): Date | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`--${flag} must be an ISO date, got '${value}'`, flag);
  }
  return date;
}

function required(value: string | undefined, flag: string): string {
  if (!value) {
    throw new InvalidArgumentError(`--${flag} is required`, flag);
  }
  return value;
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseCommand(argv: string[]): Command {
  let parsed;
  try {
    parsed = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }

  const { values, positionals } = parsed;
  const [name, target, ...extra] = positionals;

  if (values.help || name === undefined || name === 'help') {
    return { name: 'help' };
  }

  if (extra.length > 0) {
    throw new InvalidArgumentError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  if (values.pinned && values['no-pinned']) {
    throw new InvalidArgumentError('--pinned and --no-pinned cannot be combined', 'pinned');
  }

  const properties: PageProperties = {};
  if (values.source !== undefined) properties.source = values.source;
  if (values.tags !== undefined) {
    properties.tags = values.tags
      .split(',')
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);
  }
  if (values.pinned) properties.pinned = true;
  if (values['no-pinned']) properties.pinned = false;
  if (values['source-url'] !== undefined) properties.sourceUrl = values['source-url'];
  if (values.status !== undefined) properties.status = values.status;
  if (values.summary !== undefined) properties.summary = values.summary;

  const createdAt = parseDate(values.created, 'created');
  if (createdAt) properties.createdAt = createdAt;
  const updatedAt = parseDate(values.updated, 'updated');
  if (updatedAt) properties.updatedAt = updatedAt;
  const fileCount = parseCount(values['file-count'], 'file-count');
  if (fileCount !== undefined) properties.fileCount = fileCount;
  const linkCount = parseCount(values['link-count'], 'link-count');
  if (linkCount !== undefined) properties.linkCount = linkCount;

  const debug = values.debug ?? false;

  switch (name) {
    case 'create-page': {
      if (target !== undefined) {
        throw new InvalidArgumentError(`Unexpected argument: ${target}`);
      }
      if (values.content !== undefined && values['content-file'] !== undefined) {
        throw new InvalidArgumentError('--content and --content-file cannot be combined', 'content');
      }
      return {
        name: 'create-page',
        debug,
        title: required(values.title, 'title'),
        content: values.content,
        contentFile: values['content-file'],
        parentId: values.parent,
        properties,
      };
    }

    case 'update-page': {
      if (!target) {
        throw new InvalidArgumentError('update-page needs a page id', 'pageId');
      }
      if (values.title === undefined && Object.keys(properties).length === 0) {
        throw new InvalidArgumentError('update-page needs at least one property to change');
      }
      return { name: 'update-page', debug, pageId: target, title: values.title, properties };
    }

    case 'upload': {
      const externalUrl = values['external-url'];
      if (externalUrl !== undefined && target !== undefined) {
        throw new InvalidArgumentError('Give either a file or --external-url, not both', 'file');
      }
      if (externalUrl === undefined && target === undefined) {
        throw new InvalidArgumentError('upload needs a file or --external-url', 'file');
      }
      return {
        name: 'upload',
        debug,
        pageId: required(values.page, 'page'),
        filePath: target,
        externalUrl,
        fileName: externalUrl !== undefined ? required(values.name, 'name') : values.name,
        contentType: values['content-type'],
      };
    }

    default:
      throw new InvalidArgumentError(`Unknown command: ${name}`);
  }
}

async function createPage(
  client: NotionClient,
  command: Extract<Command, { name: 'create-page' }>
): Promise<void> {
  const content = command.contentFile
    ? await fs.readFile(command.contentFile, 'utf8')
    : command.content;

  const spinner = ora('Creating page...').start();
  try {
    const pageId = await client.createPage(command.title, {
      content,
      properties: command.properties,
      parentId: command.parentId,
    });
    spinner.succeed(`Page created: ${pageId}`);
    console.log(pageId);
  } catch (error) {
    spinner.fail('Page creation failed');
    throw error;
  }
}

async function updatePage(
  client: NotionClient,
  command: Extract<Command, { name: 'update-page' }>
): Promise<void> {
  const spinner = ora('Updating page...').start();
  try {
    const properties = command.title === undefined
      ? command.properties
      : { ...command.properties, title: command.title };
    await client.updatePage(command.pageId, properties);
    spinner.succeed(`Page updated: ${command.pageId}`);
  } catch (error) {
    spinner.fail('Page update failed');
    throw error;
  }
}

async function upload(
  client: NotionClient,
  command: Extract<Command, { name: 'upload' }>
): Promise<void> {
  const spinner = ora('Uploading file...').start();
  const onPart = (partNumber: number, bytes: number): void => {
    spinner.text = `Uploaded part ${partNumber} (${formatBytes(bytes)})`;
  };

  let result: CompletedUpload;
  try {
    if (command.externalUrl !== undefined) {
      const fileName = required(command.fileName, 'name');
      result = await client.uploadFile({
        fileName,
        contentType: command.contentType ?? getMimeType(fileName),
        externalUrl: command.externalUrl,
      });
    } else {
      result = await client.uploadFileFromPath(required(command.filePath, 'file'), {
        contentType: command.contentType,
        fileName: command.fileName,
        onPart,
      });
    }
    spinner.succeed(`Upload ${result.uploadId} confirmed (${result.mode})`);
  } catch (error) {
    spinner.fail('Upload failed');
    throw error;
  }

  const attach = ora('Attaching file to page...').start();
  try {
    await client.attachFile(command.pageId, result);
    attach.succeed(`Attached ${result.fileName} to ${command.pageId}`);
  } catch (error) {
    attach.fail('Attaching file failed');
    throw error;
  }
}

function describeError(error: unknown): string {
  if (isApiError(error)) {
    const status = error.statusCode !== undefined ? ` ${error.statusCode}` : '';
    return `[${error.kind}${status}] ${error.message}`;
  }
  if (error instanceof InvalidArgumentError) {
    return `[${error.kind}] ${error.message}`;
  }
  return errorMessage(error);
}

function logLevelFor(debug: boolean, env: Record<string, string | undefined>): LogLevel {
  if (debug) return 'debug';
  const fromEnv = env.LOG_LEVEL?.toLowerCase();
  // Spinners report progress; only warnings reach the log by default
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(
  argv: string[],
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  try {
    const command = parseCommand(argv);
    if (command.name === 'help') {
      console.log(USAGE);
      return 0;
    }

    initLogger({ level: logLevelFor(command.debug, env) });
    const config = loadConfig(env);

    await NotionClient.use(config, async (client) => {
      switch (command.name) {
        case 'create-page':
          return createPage(client, command);
        case 'update-page':
          return updatePage(client, command);
        case 'upload':
          return upload(client, command);
      }
    });

    console.log(chalk.green.bold('\n✓ Done'));
    return 0;
  } catch (error) {
    console.error(chalk.red.bold(`\n✗ ${describeError(error)}`));
    if (error instanceof InvalidArgumentError) {
      console.error(chalk.gray('Run notion-ingest --help for usage'));
    }
    return 1;
  }
}
