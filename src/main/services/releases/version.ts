export interface VersionKey {
  major: number;
  minor: number;
  patch: number;
  revision: number;
  prerelease: string[];
}

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)(?:\.(\d+))?(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/;

/** Accepts `1.2.3`, `v1.2.3`, `1.2.3.4` (revision) and `1.2.3-rc.1`. */
export function parseVersionKey(value: string): VersionKey | null {
  const match = normalizeTagToVersion(value).match(VERSION_PATTERN);
  if (!match) {
    return null;
  }

  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
    revision: match[4] ? Number(match[4]) : 0,
    prerelease: match[5] ? match[5].split('.') : []
  };
}

export function normalizeTagToVersion(tagName: string): string {
  const normalized = tagName.trim();
  return /^v\d/i.test(normalized) ? normalized.slice(1) : normalized;
}

export function compareVersionKeys(left: VersionKey, right: VersionKey): number {
  if (left.major !== right.major) {
    return left.major - right.major;
  }
  if (left.minor !== right.minor) {
    return left.minor - right.minor;
  }
  if (left.patch !== right.patch) {
    return left.patch - right.patch;
  }
  if (left.revision !== right.revision) {
    return left.revision - right.revision;
  }

  if (left.prerelease.length === 0 && right.prerelease.length > 0) {
    return 1;
  }
  if (left.prerelease.length > 0 && right.prerelease.length === 0) {
    return -1;
  }

  const max = Math.max(left.prerelease.length, right.prerelease.length);
  for (let i = 0; i < max; i += 1) {
    const a = left.prerelease[i];
    const b = right.prerelease[i];
    if (a === undefined) {
      return -1;
    }
    if (b === undefined) {
      return 1;
    }
    if (a === b) {
      continue;
    }

    const aNum = /^\d+$/.test(a) ? Number(a) : null;
    const bNum = /^\d+$/.test(b) ? Number(b) : null;
    if (aNum !== null && bNum !== null) {
      return aNum - bNum;
    }
    if (aNum !== null) {
      return -1;
    }
    if (bNum !== null) {
      return 1;
    }
    return a.localeCompare(b);
  }

  return 0;
}

/** Returns null when either side cannot be parsed; callers must not guess an order. */
export function compareVersions(left: string, right: string): number | null {
  const a = parseVersionKey(left);
  const b = parseVersionKey(right);
  if (!a || !b) {
    return null;
  }

  return Math.sign(compareVersionKeys(a, b));
}
