/**
 * Delete Target Command
 */

import { CommandContext, reportError } from './context';

export async function deleteTargetCmd(name: string, { api }: CommandContext): Promise<void> {
  try {
    await api.deleteTarget(name);
    console.log(`Target ${name} deleted`);
  } catch (error) {
    reportError(error);
  }
}
