import type { ReleaseAsset, ReleaseInfo, ReleaseSelectionPolicy } from '@shared/contracts';
import { compareVersionKeys, parseVersionKey, type VersionKey } from '@main/services/releases/version';

export const DEFAULT_SELECTION_POLICY: ReleaseSelectionPolicy = {
  strategy: 'highest-version',
  includePrereleases: false
};

export function isCandidateRelease(release: ReleaseInfo, policy: ReleaseSelectionPolicy): boolean {
  if (release.isDraft) {
    return false;
  }

  return policy.includePrereleases || !release.isPreRelease;
}

export function selectRelease(
  releases: ReleaseInfo[],
  policy: ReleaseSelectionPolicy = DEFAULT_SELECTION_POLICY
): ReleaseInfo | null {
  const candidates = releases.filter((release) => isCandidateRelease(release, policy));
  if (candidates.length === 0) {
    return null;
  }

  if (policy.strategy === 'latest-published') {
    let best: { release: ReleaseInfo; time: number } | null = null;
    for (const release of candidates) {
      const time = release.publishedAt ? Date.parse(release.publishedAt) : Number.NEGATIVE_INFINITY;
      if (!best || time > best.time) {
        best = { release, time };
      }
    }
    return best?.release ?? null;
  }

  let best: { release: ReleaseInfo; key: VersionKey } | null = null;
  for (const release of candidates) {
    const key = parseVersionKey(release.version);
    if (!key) {
      continue;
    }
    if (!best || compareVersionKeys(key, best.key) > 0) {
      best = { release, key };
    }
  }

  return best?.release ?? null;
}

export function findAsset(release: ReleaseInfo, exactName: string): ReleaseAsset | null {
  const wanted = exactName.toLowerCase();
  return release.assets.find((asset) => asset.name.toLowerCase() === wanted) ?? null;
}

export function findAssetByPattern(release: ReleaseInfo, pattern: string): ReleaseAsset | null {
  const regex = compileWildcard(pattern);
  return release.assets.find((asset) => regex.test(asset.name)) ?? null;
}

export function findAssetByPatterns(release: ReleaseInfo, patterns: string[]): ReleaseAsset | null {
  for (const pattern of patterns) {
    const match = findAssetByPattern(release, pattern);
    if (match) {
      return match;
    }
  }

  return null;
}

/** `*` = any run of characters, `?` = exactly one; everything else is literal. */
export function compileWildcard(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\*?]/g, '\\$&');
  const source = escaped.replace(/\\\*/g, '.*').replace(/\\\?/g, '.');
  return new RegExp(`^${source}$`, 'is');
}
