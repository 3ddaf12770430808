/**
 * Configuration Manager
 */

import { Config, OUTPUT_FORMATS, OutputFormat } from './types';

export const DEFAULT_ENDPOINT = 'http://localhost:8080';

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export class ConfigManager {
  constructor(private readonly env: Record<string, string | undefined> = process.env) {}

  /**
   * Load configuration from the environment
   */
  load(): Config {
    const output = this.env.PREWARM_OUTPUT ?? '';
    return {
      endpoint: this.env.PREWARM_ENDPOINT || DEFAULT_ENDPOINT,
      output: isOutputFormat(output) ? output : 'table',
    };
  }

  /**
   * Get endpoint
   */
  getEndpoint(): string {
    return this.load().endpoint;
  }
}

export const configManager = new ConfigManager();
