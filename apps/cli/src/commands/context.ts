/**
 * Shared command plumbing
 */

import { APIClient } from '../api';
import { configManager, isOutputFormat } from '../config';
import { Formatter } from '../formatter';

export type GlobalOptions = {
  endpoint?: string;
  output?: string;
};

export interface CommandContext {
  api: APIClient;
  formatter: Formatter;
}

export function createContext(options: GlobalOptions): CommandContext {
  const config = configManager.load();
  const output = options.output && isOutputFormat(options.output) ? options.output : config.output;
  return {
    api: new APIClient(options.endpoint || config.endpoint),
    formatter: new Formatter(output),
  };
}

/**
 * Print the error and exit with status 1
 */
export function reportError(error: unknown): never {
  const apiError = APIClient.handleError(error);
  console.error(`Error: ${apiError.message}`);
  if (apiError.details) {
    console.error(apiError.details);
  }
  process.exit(1);
}
