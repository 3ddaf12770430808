/**
 * Create Target Command
 */

import * as fs from 'fs';
import { CommandContext, reportError } from './context';

/**
 * Read a target definition from a JSON file
 */
export function readTargetFile(file: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new Error(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export async function createTargetCmd(file: string, { api, formatter }: CommandContext): Promise<void> {
  try {
    const snapshot = await api.createTarget(readTargetFile(file));
    console.log(formatter.formatTarget(snapshot));
  } catch (error) {
    reportError(error);
  }
}
