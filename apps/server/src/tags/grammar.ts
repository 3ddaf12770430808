/**
 * Tag grammar - classifies image tags into comparable records
 *
 * Tags follow the build naming convention:
 *   r<major>_<minor>_<patch>[_rc<pre>]   releases and release candidates
 *   w_<year>_<week>                     weeklies
 *   d_<year>_<month>_<day>              dailies
 *   exp_<anything>                      experimentals
 * Dated and versioned forms may carry a cycle suffix (_c<cycle> or
 * _csal<cycle>, cycle being <digits>.<digits>) and then a free-form
 * remainder (_<rest>). The legacy release form r<xy><z> takes no suffix.
 */

import { IncomparableTagError } from '../errors';
import { createLogger } from '../logger';
import { SemanticVersion, compareVersions } from './version';

const logger = createLogger('tag-grammar');

/** Tag the registry assumes when none is given */
export const DEFAULT_TAG = 'latest';

export type TagKind =
  | 'release_candidate'
  | 'release'
  | 'weekly'
  | 'daily'
  | 'experimental'
  | 'alias'
  | 'unknown';

export interface ClassifiedTag {
  readonly rawTag: string;
  readonly kind: TagKind;
  readonly displayName: string;
  readonly semanticVersion: SemanticVersion | null;
  readonly cycle: number | null;
}

export interface TagRule {
  readonly kind: TagKind;
  readonly pattern: RegExp;
}

const RELEASE = String.raw`r(?<major>\d+)_(?<minor>\d+)_(?<patch>\d+)`;
const RELEASE_CANDIDATE = String.raw`${RELEASE}_rc(?<pre>\d+)`;
const WEEKLY = String.raw`w_(?<year>\d+)_(?<week>\d+)`;
const DAILY = String.raw`d_(?<year>\d+)_(?<month>\d+)_(?<day>\d+)`;
const CYCLE = String.raw`_(?<ctag>c|csal)(?<cycle>\d+\.\d+)`;
const REST = String.raw`_(?<rest>.*)`;

/**
 * Cycle variants come before remainder variants: a cycle suffix is also a
 * valid remainder.
 */
function withSuffixes(kind: TagKind, base: string): TagRule[] {
  return [
    { kind, pattern: new RegExp(`^${base}${CYCLE}${REST}$`) },
    { kind, pattern: new RegExp(`^${base}${CYCLE}$`) },
    { kind, pattern: new RegExp(`^${base}${REST}$`) },
    { kind, pattern: new RegExp(`^${base}$`) },
  ];
}

/**
 * Ordered rules; the first match wins. Release candidates precede releases
 * because r22_0_0_rc1 also reads as release r22_0_0 with remainder "rc1".
 */
const rules: TagRule[] = [
  ...withSuffixes('release_candidate', RELEASE_CANDIDATE),
  ...withSuffixes('release', RELEASE),
  { kind: 'release', pattern: /^r(?<major>\d\d)(?<minor>\d)$/ },
  ...withSuffixes('weekly', WEEKLY),
  ...withSuffixes('daily', DAILY),
  { kind: 'experimental', pattern: /^exp_(?<rest>.*)$/ },
];

export const TAG_RULES: readonly TagRule[] = Object.freeze(rules);

/**
 * Title-case a tag: underscores become spaces, a letter following a
 * non-letter is upper-cased and every other letter lower-cased.
 */
export function titlecase(tag: string): string {
  let result = '';
  let previousCased = false;
  for (const char of tag.replace(/_/g, ' ')) {
    const cased = char.toLowerCase() !== char.toUpperCase();
    if (cased) {
      result += previousCased ? char.toLowerCase() : char.toUpperCase();
    } else {
      result += char;
    }
    previousCased = cased;
  }
  return result;
}

/**
 * Build metadata from the cycle and remainder: underscores become dots and
 * anything but letters, digits and dots is dropped.
 */
export function buildMetadata(ctag?: string, cycle?: string, rest?: string): string | null {
  const parts: string[] = [];
  if (cycle) parts.push(`${ctag ?? ''}${cycle}`);
  if (rest) parts.push(rest);

  const build = parts
    .join('_')
    .replace(/_/g, '.')
    .replace(/[^A-Za-z0-9.]/g, '')
    .split('.')
    .filter((segment) => segment.length > 0)
    .join('.');
  return build.length > 0 ? build : null;
}

function toInt(value: string | undefined, fallback = 0): number {
  return value === undefined ? fallback : Math.trunc(parseFloat(value));
}

function unknownTag(rawTag: string): ClassifiedTag {
  return Object.freeze({
    rawTag,
    kind: 'unknown',
    displayName: rawTag,
    semanticVersion: null,
    cycle: null,
  });
}

function versionedTag(rawTag: string, kind: TagKind, groups: Record<string, string | undefined>): ClassifiedTag {
  const { ctag, cycle, rest } = groups;
  let major: number;
  let minor: number;
  let patch: number;
  let prerelease: string | null = null;
  let versionText: string;

  if (kind === 'weekly') {
    major = toInt(groups.year);
    minor = toInt(groups.week);
    patch = 0;
    versionText = `${groups.year}_${groups.week}`;
  } else if (kind === 'daily') {
    major = toInt(groups.year);
    minor = toInt(groups.month);
    patch = toInt(groups.day);
    versionText = `${groups.year}_${groups.month}_${groups.day}`;
  } else {
    major = toInt(groups.major);
    minor = toInt(groups.minor);
    patch = toInt(groups.patch);
    versionText = `r${major}.${minor}.${patch}`;
    if (groups.pre !== undefined) {
      prerelease = `rc${groups.pre}`;
      versionText += `-${prerelease}`;
    }
  }

  let displayName = `${titlecase(kind)} ${versionText}`;
  if (cycle) displayName += `_${ctag}${cycle}`;
  if (rest) displayName += `_${rest}`;

  return Object.freeze({
    rawTag,
    kind,
    displayName,
    semanticVersion: Object.freeze({
      major,
      minor,
      patch,
      prerelease,
      build: buildMetadata(ctag, cycle, rest),
    }),
    cycle: cycle ? toInt(cycle) : null,
  });
}

/**
 * Classify a tag. Never throws: anything the grammar does not recognise,
 * and any tag that is not entirely lower case, is `unknown`.
 */
export function classifyTag(tag: string, aliasTags: Iterable<string> = []): ClassifiedTag {
  const rawTag = tag || DEFAULT_TAG;

  if (rawTag !== rawTag.toLowerCase()) {
    logger.debug('Tag %s is not lower case; classified as unknown', rawTag);
    return unknownTag(rawTag);
  }

  for (const alias of aliasTags) {
    if (alias === rawTag) {
      return Object.freeze({
        rawTag,
        kind: 'alias',
        displayName: titlecase(rawTag),
        semanticVersion: null,
        cycle: null,
      });
    }
  }

  for (const rule of TAG_RULES) {
    const match = rule.pattern.exec(rawTag);
    if (!match) continue;

    const groups = match.groups ?? {};
    if (rule.kind === 'experimental') {
      const inner = classifyTag(groups.rest ?? '');
      return Object.freeze({
        rawTag,
        kind: 'experimental',
        displayName: `Experimental ${inner.displayName}`,
        semanticVersion: null,
        cycle: null,
      });
    }
    return versionedTag(rawTag, rule.kind, groups);
  }

  logger.debug('Tag %s did not match any rule', rawTag);
  return unknownTag(rawTag);
}

export type TagComparison =
  | { ok: true; order: -1 | 0 | 1 }
  | { ok: false; error: IncomparableTagError };

/**
 * Order two tags of the same kind. Tags of different kinds, and distinct
 * alias or unknown tags, have no order.
 */
export function compareTags(a: ClassifiedTag, b: ClassifiedTag): TagComparison {
  if (a.kind !== b.kind) {
    return {
      ok: false,
      error: new IncomparableTagError(a.rawTag, b.rawTag, `kinds ${a.kind} and ${b.kind} differ`),
    };
  }

  if (a.semanticVersion && b.semanticVersion) {
    return { ok: true, order: compareVersions(a.semanticVersion, b.semanticVersion) };
  }

  if (a.kind === 'experimental') {
    const order = a.rawTag < b.rawTag ? -1 : a.rawTag > b.rawTag ? 1 : 0;
    return { ok: true, order };
  }

  if (a.rawTag === b.rawTag) {
    return { ok: true, order: 0 };
  }
  return {
    ok: false,
    error: new IncomparableTagError(a.rawTag, b.rawTag, `${a.kind} tags have no order`),
  };
}

export function compareTagsOrThrow(a: ClassifiedTag, b: ClassifiedTag): -1 | 0 | 1 {
  const result = compareTags(a, b);
  if (!result.ok) {
    throw result.error;
  }
  return result.order;
}

export function isNewerTag(a: ClassifiedTag, b: ClassifiedTag): boolean {
  return compareTagsOrThrow(a, b) > 0;
}
