/**
 * Semantic versions derived from image tags
 */

export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease: string | null;
  readonly build: string | null;
}

export function formatVersion(version: SemanticVersion): string {
  let text = `${version.major}.${version.minor}.${version.patch}`;
  if (version.prerelease) {
    text += `-${version.prerelease}`;
  }
  if (version.build) {
    text += `+${version.build}`;
  }
  return text;
}

function sign(n: number): -1 | 0 | 1 {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

/**
 * Compare dot-separated prerelease identifiers. Numeric identifiers sort
 * numerically and below alphanumeric ones; a shorter list of equal
 * prefix sorts first.
 */
function comparePrerelease(a: string, b: string): -1 | 0 | 1 {
  const aParts = a.split('.');
  const bParts = b.split('.');
  const length = Math.min(aParts.length, bParts.length);

  for (let i = 0; i < length; i++) {
    const x = aParts[i];
    const y = bParts[i];
    const xNumeric = /^\d+$/.test(x);
    const yNumeric = /^\d+$/.test(y);

    if (xNumeric && yNumeric) {
      const diff = sign(Number(x) - Number(y));
      if (diff !== 0) return diff;
    } else if (xNumeric !== yNumeric) {
      return xNumeric ? -1 : 1;
    } else if (x !== y) {
      return x < y ? -1 : 1;
    }
  }

  return sign(aParts.length - bParts.length);
}

/**
 * Semver precedence. Build metadata is ignored.
 */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): -1 | 0 | 1 {
  const core = sign(a.major - b.major) || sign(a.minor - b.minor) || sign(a.patch - b.patch);
  if (core !== 0) {
    return core;
  }

  if (a.prerelease === b.prerelease) return 0;
  // A release outranks any of its prereleases
  if (a.prerelease === null) return 1;
  if (b.prerelease === null) return -1;
  return comparePrerelease(a.prerelease, b.prerelease);
}
