/**
 * Commands Index
 */

export { listTargetsCmd } from './list';
export { getTargetCmd } from './get';
export { availableImagesCmd, desiredImagesCmd } from './images';
export { createTargetCmd } from './create';
export { deleteTargetCmd } from './delete';
export { createContext, reportError } from './context';
export type { CommandContext, GlobalOptions } from './context';
