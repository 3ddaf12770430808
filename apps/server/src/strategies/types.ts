/**
 * Desired image strategies
 */

import { RegistryProvider } from '../registry';
import { CachedImage, DesiredImages } from '../types';

/**
 * Decides which images a target should hold. Implementations must not
 * modify the common cache and must answer the same way for the same
 * registry state.
 */
export interface DesiredImageStrategy {
  readonly type: string;
  desiredImages(commonCache: readonly CachedImage[]): Promise<DesiredImages>;
}

export interface StrategyContext {
  registryFor: RegistryProvider;
}
