/**
 * Ranked strategy - the newest releases, weeklies and dailies of one
 * repository, with alias tags (the recommended one first) ahead of them
 */

import { createLogger } from '../logger';
import { RegistryPort } from '../registry';
import { CatalogEntry, TagCatalog } from '../tags/catalog';
import { ClassifiedTag, classifyTag } from '../tags/grammar';
import { splitImageName } from '../cache/intersector';
import { CachedImage, DesiredImage, DesiredImages } from '../types';
import { DesiredImageStrategy, StrategyContext } from './types';

const logger = createLogger('ranked-strategy');

export const DEFAULT_REGISTRY_HOST = 'registry.hub.docker.com';

export interface RankedStrategyConfig {
  repo: string;
  registry_url?: string;
  recommended_tag?: string;
  num_releases: number;
  num_weeklies: number;
  num_dailies: number;
  /** Only offer images built for this cycle */
  cycle?: number;
  alias_tags?: string[];
}

export class RankedStrategy implements DesiredImageStrategy {
  readonly type = 'ranked';
  readonly registryHost: string;
  readonly repository: string;
  /** Recommended tag first, then the configured aliases in order */
  readonly aliasTags: readonly string[];
  private readonly registry: RegistryPort;

  constructor(private readonly config: RankedStrategyConfig, context: StrategyContext) {
    this.registryHost = config.registry_url || DEFAULT_REGISTRY_HOST;
    this.repository = config.repo;
    this.registry = context.registryFor(this.registryHost);

    const aliases = config.recommended_tag ? [config.recommended_tag] : [];
    for (const tag of config.alias_tags ?? []) {
      if (!aliases.includes(tag)) {
        aliases.push(tag);
      }
    }
    this.aliasTags = aliases;
  }

  imageURL(tag: string): string {
    return `${this.registryHost}/${this.repository}:${tag}`;
  }

  async desiredImages(commonCache: readonly CachedImage[]): Promise<DesiredImages> {
    // Reverse lexical order puts the newest builds first for the display list
    const tags = [...(await this.registry.listTags(this.repository))].sort().reverse();
    const classified = tags.map((tag) => classifyTag(tag, this.aliasTags));

    const candidates = classified.filter((tag) =>
      tag.kind !== 'alias' && (this.config.cycle === undefined || tag.cycle === this.config.cycle));
    const ranking = new TagCatalog(candidates.map((tag) => this.entry(tag, null)));

    const picks: CatalogEntry[] = [];
    for (const entry of [
      ...ranking.newest('release', this.config.num_releases),
      ...ranking.newest('weekly', this.config.num_weeklies),
      ...ranking.newest('daily', this.config.num_dailies),
    ]) {
      picks.push(this.entry(entry.tag, await this.registry.getDigest(this.repository, entry.tag.rawTag)));
    }

    const aliases: CatalogEntry[] = [];
    for (const alias of this.aliasTags) {
      const tag = classified.find((candidate) => candidate.kind === 'alias' && candidate.rawTag === alias);
      if (tag) {
        aliases.push(this.entry(tag, await this.registry.getDigest(this.repository, alias)));
      }
    }

    const catalog = new TagCatalog([...picks, ...this.cachedEntries(commonCache)]);
    const priority: DesiredImage[] = [];
    for (const alias of aliases) {
      const target = catalog.resolveAlias(alias);
      if (this.config.cycle !== undefined && target?.tag.cycle !== this.config.cycle) {
        logger.info('Skipping alias %s: it does not point at a cycle %d image', alias.tag.rawTag, this.config.cycle);
        continue;
      }
      priority.push({
        imageURL: alias.imageURL,
        digest: alias.digest,
        displayName: target ? `${alias.tag.displayName} (${target.tag.displayName})` : alias.tag.displayName,
      });
    }
    for (const pick of picks) {
      priority.push({ imageURL: pick.imageURL, digest: pick.digest, displayName: pick.tag.displayName });
    }

    // The display list names images by tag
    const all = tags.map((tag) => ({ imageURL: this.imageURL(tag), digest: null, displayName: tag }));

    logger.info('%s/%s: %d images to pull, %d known', this.registryHost, this.repository, priority.length, all.length);
    return { priority, all };
  }

  private entry(tag: ClassifiedTag, digest: string | null): CatalogEntry {
    return { tag, imageURL: this.imageURL(tag.rawTag), digest };
  }

  /**
   * Every tag the common cache knows this repository's images by, so an
   * alias can be named after an image that is resident but not picked.
   */
  private cachedEntries(commonCache: readonly CachedImage[]): CatalogEntry[] {
    const entries: CatalogEntry[] = [];
    const prefix = `${this.registryHost}/${this.repository}`;
    for (const image of commonCache) {
      const { repository, tag } = splitImageName(image.imageURL);
      if (repository !== prefix) continue;

      for (const name of [tag, ...image.tags]) {
        const classified = classifyTag(name, this.aliasTags);
        if (classified.kind !== 'alias') {
          entries.push(this.entry(classified, image.digest));
        }
      }
    }
    return entries;
  }
}
