/**
 * List Targets Command
 */

import { CommandContext, reportError } from './context';

export async function listTargetsCmd({ api, formatter }: CommandContext): Promise<void> {
  try {
    const names = await api.listTargets();
    console.log(formatter.formatTargetList(names));
  } catch (error) {
    reportError(error);
  }
}
