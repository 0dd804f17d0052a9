/**
 * Node.js file source backed by the filesystem
 */

import fs from 'fs/promises';
import path from 'path';
import { InvalidArgumentError, errorMessage } from '../utils/errors.js';
import type { FileSource } from './common.js';
import { getMimeType } from './common.js';

export class PathFileSource implements FileSource {
  private constructor(
    readonly filePath: string,
    readonly size: number
  ) {}

  /**
   * Stat the file and return a source over it
   */
  static async open(filePath: string): Promise<PathFileSource> {
    let stats;
    try {
      stats = await fs.stat(filePath);
    } catch (error) {
      throw new InvalidArgumentError(`Cannot read ${filePath}: ${errorMessage(error)}`, 'file');
    }

    if (!stats.isFile()) {
      throw new InvalidArgumentError(`${filePath} is not a regular file`, 'file');
    }

    return new PathFileSource(filePath, stats.size);
  }

  get fileName(): string {
    return path.basename(this.filePath);
  }

  get contentType(): string {
    return getMimeType(this.fileName);
  }

  async read(start: number, end: number): Promise<Uint8Array> {
    const length = Math.max(0, Math.min(end, this.size) - start);
    const buffer = Buffer.alloc(length);

    const handle = await fs.open(this.filePath, 'r');
    try {
      let offset = 0;
      while (offset < length) {
        const { bytesRead } = await handle.read(buffer, offset, length - offset, start + offset);
        if (bytesRead === 0) break;
        offset += bytesRead;
      }

      if (offset < length) {
        throw new Error(
          `File changed while reading ${this.filePath}: expected ${length} bytes at offset ${start}, got ${offset}`
        );
      }
      return buffer;
    } finally {
      await handle.close();
    }
  }
}
