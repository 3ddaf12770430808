/**
 * Available / Desired Images Commands
 */

import { CommandContext, reportError } from './context';

export async function availableImagesCmd(name: string, { api, formatter }: CommandContext): Promise<void> {
  try {
    const response = await api.getAvailable(name);
    console.log(formatter.formatImages(response));
  } catch (error) {
    reportError(error);
  }
}

export async function desiredImagesCmd(name: string, { api, formatter }: CommandContext): Promise<void> {
  try {
    const response = await api.getDesired(name);
    console.log(formatter.formatImages(response));
  } catch (error) {
    reportError(error);
  }
}
