/**
 * Strategy configuration and construction
 */

import { z } from 'zod';
import { RankedStrategy, DEFAULT_REGISTRY_HOST } from './ranked';
import { StaticStrategy } from './static';
import { DesiredImageStrategy, StrategyContext } from './types';

const count = z.number().int().min(0);

export const staticStrategySchema = z.object({
  type: z.literal('static'),
  images: z.array(z.object({
    image_url: z.string().min(1),
    digest: z.string().min(1).nullable().optional(),
    name: z.string().optional(),
  })),
});

export const rankedStrategySchema = z.object({
  type: z.literal('ranked'),
  repo: z.string().min(1),
  registry_url: z.string().min(1).default(DEFAULT_REGISTRY_HOST),
  recommended_tag: z.string().min(1).optional(),
  num_releases: count.default(0),
  num_weeklies: count.default(0),
  num_dailies: count.default(0),
  cycle: z.number().int().min(0).optional(),
  alias_tags: z.array(z.string().min(1)).default([]),
});

/** Strategy configurations, told apart by `type` */
export const strategyConfigSchema = z.discriminatedUnion('type', [
  staticStrategySchema,
  rankedStrategySchema,
]);

export type StrategyConfig = z.infer<typeof strategyConfigSchema>;

export function createStrategy(config: StrategyConfig, context: StrategyContext): DesiredImageStrategy {
  switch (config.type) {
    case 'static':
      return new StaticStrategy(config.images);
    case 'ranked':
      return new RankedStrategy(config, context);
  }
}

export { RankedStrategy, StaticStrategy };
export type { DesiredImageStrategy, StrategyContext };
