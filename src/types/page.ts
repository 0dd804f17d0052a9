/**
 * Typed page properties of the target database
 */

export interface PageProperties {
  /** Select */
  source?: string;

  /** Multi-select */
  tags?: string[];

  /** Checkbox */
  pinned?: boolean;

  /** URL */
  sourceUrl?: string;

  /** Date */
  createdAt?: Date;

  /** Date */
  updatedAt?: Date;

  /** Number */
  fileCount?: number;

  /** Number */
  linkCount?: number;

  /** Select */
  status?: string;

  /** Rich text */
  summary?: string;
}

export interface CreatePageOptions {
  /** Body text, appended as paragraph blocks */
  content?: string;
  properties?: PageProperties;
  /** Overrides the client's container */
  parentId?: string;
}
