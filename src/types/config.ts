/**
 * Client Configuration Types
 */

/**
 * Configuration for NotionClient
 */
export interface ClientConfig {
  /**
   * Integration token, sent as a bearer credential
   */
  apiKey: string;

  /**
   * Value of the Notion-Version header
   * @default '2022-06-28'
   */
  notionVersion?: string;

  /**
   * Database new pages are created under
   */
  databaseId?: string;

  /**
   * API root
   * @default 'https://api.notion.com/v1'
   */
  baseUrl?: string;

  /**
   * Per-request timeout in milliseconds
   * @default 30000
   */
  timeout?: number;

  /**
   * Status polls before an upload is considered timed out
   * @default 6
   */
  pollAttempts?: number;

  /**
   * First backoff delay between status polls, in milliseconds
   * @default 5000
   */
  pollInitialDelay?: number;
}

export type ResolvedClientConfig = Required<Omit<ClientConfig, 'databaseId'>> &
  Pick<ClientConfig, 'databaseId'>;
