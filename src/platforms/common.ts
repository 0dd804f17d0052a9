/**
 * Byte sources for uploads and file type helpers
 */

/**
 * Random-access view over the bytes of one file
 * Parts are read on demand so a large file is never held in memory whole
 */
export interface FileSource {
  /** Total size in bytes */
  readonly size: number;

  /**
   * Read bytes [start, end)
   */
  read(start: number, end: number): Promise<Uint8Array>;
}

/**
 * FileSource over bytes already in memory
 */
export class BufferFileSource implements FileSource {
  constructor(private readonly data: Uint8Array) {}

  get size(): number {
    return this.data.byteLength;
  }

  async read(start: number, end: number): Promise<Uint8Array> {
    return this.data.subarray(start, Math.min(end, this.data.byteLength));
  }
}

/**
 * Get file extension from filename
 */
export function getExtension(filename: string): string {
  const lastDot = filename.lastIndexOf('.');
  return lastDot === -1 ? '' : filename.slice(lastDot + 1).toLowerCase();
}

/**
 * Get MIME type from filename
 */
export function getMimeType(filename: string): string {
  const ext = getExtension(filename);

  // Basic MIME type mapping
  const mimeTypes: Record<string, string> = {
    // Images
    'jpg': 'image/jpeg',
    'jpeg': 'image/jpeg',
    'png': 'image/png',
    'gif': 'image/gif',
    'webp': 'image/webp',
    'svg': 'image/svg+xml',
    'heic': 'image/heic',

    // Documents
    'pdf': 'application/pdf',
    'txt': 'text/plain',
    'json': 'application/json',
    'xml': 'application/xml',
    'html': 'text/html',
    'htm': 'text/html',
    'md': 'text/markdown',
    'csv': 'text/csv',
    'docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',

    // Archives
    'zip': 'application/zip',
    'tar': 'application/x-tar',
    'gz': 'application/gzip',

    // Audio
    'mp3': 'audio/mpeg',
    'm4a': 'audio/mp4',
    'wav': 'audio/wav',
    'ogg': 'audio/ogg',

    // Video
    'mp4': 'video/mp4',
    'webm': 'video/webm',
    'mov': 'video/quicktime',
    'avi': 'video/x-msvideo',
  };

  return mimeTypes[ext] || 'application/octet-stream';
}
