import type { ReleaseAsset, ReleaseInfo, ReleaseSelectionPolicy } from '@shared/contracts';
import type { LoggerLike } from '@main/services/logging/Logger';
import { ReleaseFeedParser } from '@main/services/releases/ReleaseFeedParser';
import {
  DEFAULT_SELECTION_POLICY,
  findAsset,
  findAssetByPattern,
  findAssetByPatterns,
  selectRelease
} from '@main/services/releases/release-selection';
import { normalizeTagToVersion } from '@main/services/releases/version';

export type ReleaseFeedErrorCode = 'feed_unavailable' | 'feed_timeout' | 'feed_parse_failed' | 'cancelled';

export type ReleaseListResult =
  | { ok: true; releases: ReleaseInfo[] }
  | { ok: false; code: ReleaseFeedErrorCode; errorMessage: string };

export type ReleaseLookupResult =
  | { ok: true; release: ReleaseInfo | null }
  | { ok: false; code: ReleaseFeedErrorCode; errorMessage: string };

export interface RateLimitSnapshot {
  remaining: number | null;
  resetAt: string | null;
}

interface ReleaseCatalogClientOptions {
  feedUrl: string;
  logger: LoggerLike;
  timeoutMs?: number;
  userAgent?: string;
  authToken?: string;
  parser?: ReleaseFeedParser;
  fetchFn?: typeof fetch;
}

export class ReleaseCatalogClient {
  private readonly feedUrl: string;
  private readonly logger: LoggerLike;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly authToken: string | null;
  private readonly parser: ReleaseFeedParser;
  private readonly fetchFn: typeof fetch | null;
  private rateLimit: RateLimitSnapshot = { remaining: null, resetAt: null };

  constructor(options: ReleaseCatalogClientOptions) {
    this.feedUrl = options.feedUrl;
    this.logger = options.logger;
    this.timeoutMs = normalizeTimeout(options.timeoutMs, 15_000);
    this.userAgent = options.userAgent ?? 'StorefrontUpgrader/0.1';
    this.authToken = normalizeOptionalText(options.authToken);
    this.parser = options.parser ?? new ReleaseFeedParser();
    this.fetchFn = options.fetchFn ?? null;
  }

  getRateLimit(): RateLimitSnapshot {
    return { ...this.rateLimit };
  }

  async listReleases(options: { signal?: AbortSignal } = {}): Promise<ReleaseListResult> {
    if (options.signal?.aborted) {
      return { ok: false, code: 'cancelled', errorMessage: 'Consulta ao feed cancelada.' };
    }

    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal;

    this.logger.info('release_feed.fetch.start', { url: this.feedUrl });
    let payload: unknown;
    try {
      // fetch global resolvido a cada chamada para permitir stub nos testes
      const fetchFn = this.fetchFn ?? fetch;
      const response = await fetchFn(this.feedUrl, {
        headers: this.buildHeaders(),
        signal
      });
      this.captureRateLimit(response.headers);

      if (!response.ok) {
        const errorMessage = `Feed de releases respondeu HTTP ${response.status}.`;
        this.logger.warn('release_feed.fetch.http_error', { url: this.feedUrl, status: response.status });
        return { ok: false, code: 'feed_unavailable', errorMessage };
      }

      const text = await response.text();
      try {
        payload = JSON.parse(text);
      } catch (error) {
        this.logger.error('release_feed.parse.error', { url: this.feedUrl, reason: toErrorMessage(error) });
        return {
          ok: false,
          code: 'feed_parse_failed',
          errorMessage: `Feed de releases com JSON invalido: ${toErrorMessage(error)}`
        };
      }
    } catch (error) {
      if (options.signal?.aborted) {
        return { ok: false, code: 'cancelled', errorMessage: 'Consulta ao feed cancelada.' };
      }
      if (timeoutSignal.aborted) {
        this.logger.warn('release_feed.fetch.timeout', { url: this.feedUrl, timeoutMs: this.timeoutMs });
        return {
          ok: false,
          code: 'feed_timeout',
          errorMessage: `Feed de releases nao respondeu em ${this.timeoutMs} ms.`
        };
      }

      const reason = toErrorMessage(error);
      this.logger.warn('release_feed.fetch.error', { url: this.feedUrl, reason });
      return { ok: false, code: 'feed_unavailable', errorMessage: `Falha ao consultar feed de releases: ${reason}` };
    }

    const parsed = this.parser.parseFeed(payload);
    if (!parsed.ok) {
      this.logger.error('release_feed.parse.error', { url: this.feedUrl, reason: parsed.error });
      return { ok: false, code: 'feed_parse_failed', errorMessage: parsed.error };
    }

    this.logger.info('release_feed.fetch.finish', {
      url: this.feedUrl,
      releases: parsed.releases.length,
      skipped: parsed.skipped
    });
    return { ok: true, releases: parsed.releases };
  }

  async getLatestRelease(
    policy: ReleaseSelectionPolicy = DEFAULT_SELECTION_POLICY,
    options: { signal?: AbortSignal } = {}
  ): Promise<ReleaseLookupResult> {
    const listed = await this.listReleases(options);
    if (!listed.ok) {
      return listed;
    }

    return { ok: true, release: selectRelease(listed.releases, policy) };
  }

  async getReleaseByVersion(version: string, options: { signal?: AbortSignal } = {}): Promise<ReleaseLookupResult> {
    const listed = await this.listReleases(options);
    if (!listed.ok) {
      return listed;
    }

    const wanted = normalizeTagToVersion(version).toLowerCase();
    const release =
      listed.releases.find((candidate) => normalizeTagToVersion(candidate.version).toLowerCase() === wanted) ?? null;
    return { ok: true, release };
  }

  findAsset(release: ReleaseInfo, exactName: string): ReleaseAsset | null {
    return findAsset(release, exactName);
  }

  findAssetByPattern(release: ReleaseInfo, pattern: string): ReleaseAsset | null {
    return findAssetByPattern(release, pattern);
  }

  findAssetByPatterns(release: ReleaseInfo, patterns: string[]): ReleaseAsset | null {
    return findAssetByPatterns(release, patterns);
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': this.userAgent
    };
    if (this.authToken) {
      headers.Authorization = `Bearer ${this.authToken}`;
    }
    return headers;
  }

  private captureRateLimit(headers: Headers): void {
    const remaining = Number(headers.get('x-ratelimit-remaining'));
    const reset = Number(headers.get('x-ratelimit-reset'));
    this.rateLimit = {
      remaining: headers.has('x-ratelimit-remaining') && Number.isFinite(remaining) ? Math.trunc(remaining) : this.rateLimit.remaining,
      resetAt:
        headers.has('x-ratelimit-reset') && Number.isFinite(reset) && reset > 0
          ? new Date(reset * 1000).toISOString()
          : this.rateLimit.resetAt
    };
  }
}

function normalizeTimeout(value: number | undefined, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return Math.trunc(value);
}

function normalizeOptionalText(value: string | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
