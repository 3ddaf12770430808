/**
 * Get Target Command
 */

import { CommandContext, reportError } from './context';

export async function getTargetCmd(name: string, { api, formatter }: CommandContext): Promise<void> {
  try {
    const snapshot = await api.getTarget(name);
    console.log(formatter.formatTarget(snapshot));
  } catch (error) {
    reportError(error);
  }
}
