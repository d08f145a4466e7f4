import { createLogger } from '../../utils/LoggerUtils.js';

const logger = createLogger('JSON UTILS');

export type JsonRecord = Record<string, unknown>;

export function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class JsonUtils {
  /**
   * Reduce a model response to the JSON text it carries.
   * Returns '' when nothing that looks like JSON remains.
   */
  static cleanJsonResponse(response: string): string {
    if (!response) {
      return '';
    }

    const text = response
      .replace(/```(?:json)?\s*/gi, '')
      .replace(/```/g, '')
      .trim();

    if (text.startsWith('{') || text.startsWith('[')) {
      return text;
    }

    // Prose around the payload: take the outermost bracketed span
    const start = text.search(/[{[]/);
    const end = Math.max(text.lastIndexOf('}'), text.lastIndexOf(']'));
    if (start !== -1 && end > start) {
      return text.slice(start, end + 1).trim();
    }

    return '';
  }

  /**
   * Parse a model response into a JSON value, or null if it cannot be recovered.
   */
  static parseModelJson(response: string): unknown {
    const cleaned = this.cleanJsonResponse(response);
    if (!cleaned) {
      return null;
    }

    // Try to parse as-is first (most AI responses are already valid JSON)
    try {
      return JSON.parse(cleaned);
    } catch {
      logger.debug('Initial parse failed, attempting cleanup...');
    }

    const repaired = cleaned
      .replace(/,(\s*[}\]])/g, '$1')
      .replace(/[“”]/g, '"');

    try {
      return JSON.parse(repaired);
    } catch (error) {
      logger.warn('Cleanup parse also failed', error instanceof Error ? error.message : String(error));
      return null;
    }
  }

  /**
   * Accept either a bare list or an object carrying the list under one of `keys`.
   * An object without any of the keys yields an empty list; any other value yields null.
   */
  static extractItemList(data: unknown, keys: readonly string[]): unknown[] | null {
    if (Array.isArray(data)) {
      return data;
    }
    if (isJsonRecord(data)) {
      for (const key of keys) {
        const value = data[key];
        if (Array.isArray(value)) {
          return value;
        }
      }
      return [];
    }
    return null;
  }
}
