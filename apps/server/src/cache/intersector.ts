/**
 * Cache intersector - which images are resident on every matching node
 *
 * A node reports its images as groups of names, one group per pulled image,
 * e.g. ["registry.example.com/lab@sha256:be4...", "registry.example.com/lab:w_2021_22",
 * "registry.example.com/lab:recommended"]. Names are grouped by repository
 * before nodes are compared.
 */

import { MalformedImageGroupError, errorMessage } from '../errors';
import { createLogger, Logger } from '../logger';
import { CachedImage, ClusterNode, Labels } from '../types';
import { DEFAULT_TAG } from '../tags/grammar';

const defaultLogger = createLogger('cache-intersector');

const PLACEHOLDER_NAMES = new Set(['<none>@<none>', '<none>:<none>']);

interface RepositoryEntry {
  digest: string | null;
  tags: string[];
}

export interface IntersectionResult {
  images: readonly CachedImage[];
  matchedNodes: number;
}

function freezeImage(imageURL: string, digest: string, tags: string[]): CachedImage {
  return Object.freeze({ imageURL, digest, tags: Object.freeze([...tags]) });
}

/**
 * Split `repository:tag`; a colon before the last slash belongs to a
 * registry port, not a tag.
 */
export function splitImageName(name: string): { repository: string; tag: string } {
  const colon = name.lastIndexOf(':');
  if (colon > name.lastIndexOf('/')) {
    return { repository: name.slice(0, colon), tag: name.slice(colon + 1) || DEFAULT_TAG };
  }
  return { repository: name, tag: DEFAULT_TAG };
}

/**
 * Turn one node image group into one CachedImage per repository and tag.
 * Throws MalformedImageGroupError when a tagged repository has no digest.
 */
export function parseImageGroup(names: readonly string[]): CachedImage[] {
  const entries = new Map<string, RepositoryEntry>();
  const entryFor = (repository: string): RepositoryEntry => {
    let entry = entries.get(repository);
    if (!entry) {
      entry = { digest: null, tags: [] };
      entries.set(repository, entry);
    }
    return entry;
  };

  for (const name of names) {
    if (PLACEHOLDER_NAMES.has(name)) {
      continue;
    }

    const at = name.indexOf('@');
    if (at !== -1) {
      entryFor(name.slice(0, at)).digest = name.slice(at + 1);
      continue;
    }

    const { repository, tag } = splitImageName(name);
    const entry = entryFor(repository);
    if (!entry.tags.includes(tag)) {
      entry.tags.push(tag);
    }
  }

  const images: CachedImage[] = [];
  for (const [repository, entry] of entries) {
    if (entry.tags.length === 0) {
      // Pulled by digest only
      continue;
    }
    if (entry.digest === null) {
      throw new MalformedImageGroupError(names, `no digest for ${repository}`);
    }
    for (const tag of entry.tags) {
      images.push(freezeImage(
        `${repository}:${tag}`,
        entry.digest,
        entry.tags.filter((other) => other !== tag),
      ));
    }
  }
  return images;
}

/**
 * Structured image set of one node. Malformed groups are logged and skipped.
 */
export function buildNodeImages(
  nodeName: string,
  groups: readonly (readonly string[])[],
  logger: Logger = defaultLogger,
): CachedImage[] {
  const images: CachedImage[] = [];
  for (const group of groups) {
    try {
      images.push(...parseImageGroup(group));
    } catch (error) {
      if (!(error instanceof MalformedImageGroupError)) {
        throw error;
      }
      logger.warn({ node: nodeName }, 'Skipping image group: %s', errorMessage(error));
    }
  }
  return images;
}

/**
 * True when every selector label is present on the node with the same value.
 */
export function labelsMatch(selector: Labels, labels: Labels): boolean {
  return Object.entries(selector).every(([key, value]) => labels[key] === value);
}

function mergeTags(left: readonly string[], right: readonly string[]): string[] {
  const merged = [...left];
  for (const tag of right) {
    if (!merged.includes(tag)) {
      merged.push(tag);
    }
  }
  return merged;
}

/**
 * Keep the images of `common` also on `node` (same URL and digest), with
 * the union of both tag sets.
 */
export function intersectImages(
  common: readonly CachedImage[],
  node: readonly CachedImage[],
): CachedImage[] {
  const result: CachedImage[] = [];
  for (const image of common) {
    const match = node.find(
      (candidate) => candidate.imageURL === image.imageURL && candidate.digest === image.digest,
    );
    if (match) {
      result.push(freezeImage(image.imageURL, image.digest, mergeTags(image.tags, match.tags)));
    }
  }
  return result;
}

/**
 * Images resident on every node whose labels satisfy the selector. No
 * matching node means no images.
 */
export function intersectCaches(
  nodes: readonly ClusterNode[],
  selector: Labels,
  logger: Logger = defaultLogger,
): IntersectionResult {
  let common: CachedImage[] | null = null;
  let matchedNodes = 0;

  for (const node of nodes) {
    if (!labelsMatch(selector, node.labels)) {
      continue;
    }
    matchedNodes++;

    const nodeImages = buildNodeImages(node.name, node.images, logger);
    logger.debug({ node: node.name, images: nodeImages.length }, 'Inspected node cache');
    common = common === null ? nodeImages : intersectImages(common, nodeImages);
  }

  return {
    images: Object.freeze(common ?? []),
    matchedNodes,
  };
}
