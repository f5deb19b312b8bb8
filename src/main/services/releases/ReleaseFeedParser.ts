import { z } from 'zod';
import type { ReleaseAsset, ReleaseInfo } from '@shared/contracts';

const assetSchema = z.object({
  id: z.number().int().nonnegative().optional(),
  name: z.string().trim().min(1),
  browser_download_url: z.string().trim().min(1),
  size: z.number().nonnegative().optional(),
  content_type: z.string().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish()
});

const releaseSchema = z.object({
  tag_name: z.string().trim().min(1),
  name: z.string().nullish(),
  body: z.string().nullish(),
  published_at: z.string().nullish(),
  prerelease: z.boolean().optional(),
  draft: z.boolean().optional(),
  html_url: z.string().nullish(),
  url: z.string().nullish(),
  assets: z.array(z.unknown()).optional()
});

export type ReleaseFeedParseResult =
  | { ok: true; releases: ReleaseInfo[]; skipped: number }
  | { ok: false; error: string };

export class ReleaseFeedParser {
  parseFeed(input: unknown): ReleaseFeedParseResult {
    if (!Array.isArray(input)) {
      return {
        ok: false,
        error: 'Feed de releases nao e uma lista.'
      };
    }

    const releases: ReleaseInfo[] = [];
    let skipped = 0;
    for (const item of input) {
      const release = this.parseRelease(item);
      if (release) {
        releases.push(release);
      } else {
        skipped += 1;
      }
    }

    return { ok: true, releases, skipped };
  }

  parseRelease(input: unknown): ReleaseInfo | null {
    const parsed = releaseSchema.safeParse(input);
    if (!parsed.success) {
      return null;
    }

    const value = parsed.data;
    const description = value.body ?? '';
    return {
      version: value.tag_name,
      name: value.name ?? '',
      description,
      publishedAt: normalizeIso(value.published_at),
      assets: (value.assets ?? []).map(parseAsset).filter((asset): asset is ReleaseAsset => asset !== null),
      isPreRelease: value.prerelease === true,
      isDraft: value.draft === true,
      htmlUrl: value.html_url ?? '',
      apiUrl: value.url ?? '',
      breakingChanges: extractBreakingChanges(description)
    };
  }
}

function parseAsset(input: unknown): ReleaseAsset | null {
  const parsed = assetSchema.safeParse(input);
  if (!parsed.success) {
    return null;
  }

  const value = parsed.data;
  return {
    id: value.id ?? 0,
    name: value.name,
    browserDownloadUrl: value.browser_download_url,
    size: Math.trunc(value.size ?? 0),
    contentType: value.content_type ?? '',
    createdAt: normalizeIso(value.created_at),
    updatedAt: normalizeIso(value.updated_at)
  };
}

/**
 * Collects the bullets under a "Breaking changes" heading of the release
 * notes, plus any standalone `BREAKING:` / `BREAKING CHANGE:` line.
 */
export function extractBreakingChanges(notes: string): string[] {
  const found: string[] = [];
  let inSection = false;

  for (const raw of notes.split(/\r?\n/)) {
    const line = raw.trim();
    const heading = line.match(/^#{1,6}\s*(.+?)\s*#*$/);
    if (heading) {
      inSection = /^breaking[\s_-]*changes?:?$/i.test(heading[1] ?? '');
      continue;
    }

    const inline = line.match(/^(?:[-*]\s*)?BREAKING(?:[\s_-]*CHANGES?)?:\s*(.+)$/);
    if (inline?.[1]) {
      pushUnique(found, inline[1]);
      continue;
    }

    if (!inSection) {
      continue;
    }

    const bullet = line.match(/^(?:[-*+]|\d+[.)])\s+(.+)$/);
    if (bullet?.[1]) {
      pushUnique(found, bullet[1]);
    }
  }

  return found;
}

function pushUnique(target: string[], value: string): void {
  const normalized = value.trim();
  if (normalized && !target.includes(normalized)) {
    target.push(normalized);
  }
}

function normalizeIso(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }

  const time = Date.parse(value);
  return Number.isFinite(time) ? new Date(time).toISOString() : null;
}
