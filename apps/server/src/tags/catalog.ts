/**
 * Tag catalog - ranks classified tags of one repository
 */

import { ClassifiedTag, TagKind, compareTagsOrThrow } from './grammar';

export interface CatalogEntry {
  tag: ClassifiedTag;
  imageURL: string;
  digest: string | null;
}

/** Kinds an alias may point at, most preferred first */
const ALIAS_TARGET_KINDS: readonly TagKind[] = [
  'release',
  'weekly',
  'daily',
  'release_candidate',
  'experimental',
];

const ORDERED_KINDS = new Set<TagKind>([...ALIAS_TARGET_KINDS]);

export class TagCatalog {
  private readonly byKind = new Map<TagKind, CatalogEntry[]>();

  constructor(entries: Iterable<CatalogEntry>) {
    for (const entry of entries) {
      const list = this.byKind.get(entry.tag.kind) ?? [];
      list.push(entry);
      this.byKind.set(entry.tag.kind, list);
    }

    // Newest first; alias and unknown entries keep their insertion order
    for (const [kind, list] of this.byKind) {
      if (ORDERED_KINDS.has(kind)) {
        list.sort((a, b) => compareTagsOrThrow(b.tag, a.tag));
      }
    }
  }

  entries(kind: TagKind): CatalogEntry[] {
    return [...(this.byKind.get(kind) ?? [])];
  }

  /**
   * The `count` newest entries of a kind.
   */
  newest(kind: TagKind, count: number): CatalogEntry[] {
    return this.entries(kind).slice(0, Math.max(0, count));
  }

  /**
   * Find the entry an alias points at: the newest entry of the most
   * preferred kind sharing the alias digest.
   */
  resolveAlias(alias: CatalogEntry): CatalogEntry | undefined {
    if (alias.digest === null) {
      return undefined;
    }
    for (const kind of ALIAS_TARGET_KINDS) {
      const target = this.byKind.get(kind)?.find((entry) => entry.digest === alias.digest);
      if (target) {
        return target;
      }
    }
    return undefined;
  }

  aliasDisplayName(alias: CatalogEntry): string {
    const target = this.resolveAlias(alias);
    return target ? `${alias.tag.displayName} (${target.tag.displayName})` : alias.tag.displayName;
  }
}
