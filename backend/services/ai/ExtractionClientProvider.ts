import type { ParsingConfig } from '../../config/parsing.js';
import { createLogger } from '../../utils/LoggerUtils.js';
import { ExtractionClient } from './ExtractionClient.js';

const logger = createLogger('CREDENTIALS');

export type ExtractionClientFactory = (apiKey: string, config: ParsingConfig) => ExtractionClient;

/**
 * Holds the current API key and the client built from it.
 * Setting a different key drops the cached client; the next call builds a new one.
 */
export class ExtractionClientProvider {
  private apiKey = '';
  private client: ExtractionClient | null = null;

  constructor(
    private readonly config: ParsingConfig,
    private readonly factory: ExtractionClientFactory = ExtractionClient.fromApiKey
  ) {}

  setApiKey(apiKey: string): void {
    const key = apiKey.trim();
    if (key === this.apiKey) {
      return;
    }
    this.apiKey = key;
    this.client = null;
    logger.info(key ? 'API key updated, client will be rebuilt' : 'API key cleared');
  }

  hasApiKey(): boolean {
    return this.apiKey !== '';
  }

  /** The client for the current key, or null when no key is set. */
  getClient(): ExtractionClient | null {
    if (!this.apiKey) {
      return null;
    }
    if (!this.client) {
      this.client = this.factory(this.apiKey, this.config);
    }
    return this.client;
  }
}
