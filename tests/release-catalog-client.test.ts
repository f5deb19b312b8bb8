import { afterEach, describe, expect, it, vi } from 'vitest';
import type { LoggerLike } from '@main/services/logging/Logger';
import { ReleaseCatalogClient } from '@main/services/releases/ReleaseCatalogClient';
import { ReleaseFeedParser, extractBreakingChanges } from '@main/services/releases/ReleaseFeedParser';

const FEED_URL = 'https://api.example.invalid/repos/acme/shop/releases?per_page=20';

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('ReleaseFeedParser', () => {
  it('converte release no formato do GitHub', () => {
    const parser = new ReleaseFeedParser();
    const release = parser.parseRelease(
      githubRelease('v2.0.0', {
        name: 'Storefront 2.0',
        body: '## Breaking changes\n- Remove API v1\n- Novo esquema de pedidos\n\n## Fixes\n- Corrige carrinho',
        published_at: '2024-02-10T12:00:00Z',
        assets: [
          {
            id: 55,
            name: 'App-2.0.0.zip',
            browser_download_url: 'https://example.invalid/App-2.0.0.zip',
            size: 1_000_000,
            content_type: 'application/zip',
            created_at: '2024-02-10T11:00:00Z',
            updated_at: null
          }
        ]
      })
    );

    expect(release).toEqual({
      version: 'v2.0.0',
      name: 'Storefront 2.0',
      description: '## Breaking changes\n- Remove API v1\n- Novo esquema de pedidos\n\n## Fixes\n- Corrige carrinho',
      publishedAt: '2024-02-10T12:00:00.000Z',
      assets: [
        {
          id: 55,
          name: 'App-2.0.0.zip',
          browserDownloadUrl: 'https://example.invalid/App-2.0.0.zip',
          size: 1_000_000,
          contentType: 'application/zip',
          createdAt: '2024-02-10T11:00:00.000Z',
          updatedAt: null
        }
      ],
      isPreRelease: false,
      isDraft: false,
      htmlUrl: 'https://example.invalid/releases/v2.0.0',
      apiUrl: 'https://api.example.invalid/repos/acme/shop/releases/1',
      breakingChanges: ['Remove API v1', 'Novo esquema de pedidos']
    });
  });

  it('descarta releases e assets invalidos sem abortar o feed', () => {
    const parser = new ReleaseFeedParser();
    const result = parser.parseFeed([
      githubRelease('v1.0.0', { assets: [{ name: '' }, { name: 'ok.zip', browser_download_url: 'https://x.invalid/ok.zip' }] }),
      { tag_name: '' },
      'texto solto'
    ]);

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.skipped).toBe(2);
    expect(result.releases).toHaveLength(1);
    expect(result.releases[0]?.assets.map((item) => item.name)).toEqual(['ok.zip']);
    expect(result.releases[0]?.assets[0]?.size).toBe(0);
  });

  it('rejeita payload que nao e lista', () => {
    expect(new ReleaseFeedParser().parseFeed({ message: 'Not Found' })).toEqual({
      ok: false,
      error: 'Feed de releases nao e uma lista.'
    });
  });

  it('extrai linhas BREAKING fora da secao dedicada', () => {
    expect(extractBreakingChanges('Notas\nBREAKING: remove tema antigo\n- BREAKING CHANGE: nova rota de login')).toEqual([
      'remove tema antigo',
      'nova rota de login'
    ]);
    expect(extractBreakingChanges('## Features\n- Busca nova')).toEqual([]);
  });
});

describe('ReleaseCatalogClient', () => {
  it('lista releases e envia cabecalhos do GitHub', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      Response.json([githubRelease('v1.0.0'), githubRelease('v1.1.0')], {
        headers: { 'x-ratelimit-remaining': '42', 'x-ratelimit-reset': '1700000000' }
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const client = new ReleaseCatalogClient({ feedUrl: FEED_URL, logger: mockLogger(), authToken: 'test-token' });
    const result = await client.listReleases();

    expect(result.ok && result.releases.map((item) => item.version)).toEqual(['v1.0.0', 'v1.1.0']);
    expect(fetchMock).toHaveBeenCalledWith(
      FEED_URL,
      expect.objectContaining({
        headers: {
          Accept: 'application/vnd.github+json',
          'User-Agent': 'StorefrontUpgrader/0.1',
          Authorization: 'Bearer test-token'
        }
      })
    );
    expect(client.getRateLimit()).toEqual({ remaining: 42, resetAt: '2023-11-14T22:13:20.000Z' });
  });

  it('seleciona a release mais recente pela politica e busca por versao', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        Response.json([
          githubRelease('v1.0.0'),
          githubRelease('v1.2.0-beta.1', { prerelease: true }),
          githubRelease('v1.1.0')
        ])
      )
    );

    const client = new ReleaseCatalogClient({ feedUrl: FEED_URL, logger: mockLogger() });

    const latest = await client.getLatestRelease();
    expect(latest.ok && latest.release?.version).toBe('v1.1.0');

    const byVersion = await client.getReleaseByVersion('1.0.0');
    expect(byVersion.ok && byVersion.release?.version).toBe('v1.0.0');

    const missing = await client.getReleaseByVersion('9.9.9');
    expect(missing).toEqual({ ok: true, release: null });
  });

  it('distingue feed indisponivel de JSON invalido', async () => {
    const logger = mockLogger();
    vi.stubGlobal('fetch', vi.fn(async () => new Response('erro', { status: 503 })));
    const client = new ReleaseCatalogClient({ feedUrl: FEED_URL, logger });

    expect(await client.listReleases()).toEqual({
      ok: false,
      code: 'feed_unavailable',
      errorMessage: 'Feed de releases respondeu HTTP 503.'
    });

    vi.stubGlobal('fetch', vi.fn(async () => new Response('{nao e json', { status: 200 })));
    const invalid = await client.listReleases();
    expect(invalid.ok).toBe(false);
    expect(!invalid.ok && invalid.code).toBe('feed_parse_failed');

    vi.stubGlobal('fetch', vi.fn(async () => Response.json({ message: 'Not Found' })));
    expect(await client.listReleases()).toEqual({
      ok: false,
      code: 'feed_parse_failed',
      errorMessage: 'Feed de releases nao e uma lista.'
    });
    expect(logger.warn).toHaveBeenCalledWith('release_feed.fetch.http_error', { url: FEED_URL, status: 503 });
  });

  it('reporta falha de rede como feed indisponivel', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );
    const client = new ReleaseCatalogClient({ feedUrl: FEED_URL, logger: mockLogger() });

    expect(await client.listReleases()).toEqual({
      ok: false,
      code: 'feed_unavailable',
      errorMessage: 'Falha ao consultar feed de releases: fetch failed'
    });
  });

  it('expira consulta lenta com feed_timeout', async () => {
    vi.stubGlobal('fetch', vi.fn(waitForAbort));
    const client = new ReleaseCatalogClient({ feedUrl: FEED_URL, logger: mockLogger(), timeoutMs: 20 });

    expect(await client.listReleases()).toEqual({
      ok: false,
      code: 'feed_timeout',
      errorMessage: 'Feed de releases nao respondeu em 20 ms.'
    });
  });

  it('respeita cancelamento do chamador', async () => {
    vi.stubGlobal('fetch', vi.fn(waitForAbort));
    const client = new ReleaseCatalogClient({ feedUrl: FEED_URL, logger: mockLogger(), timeoutMs: 5_000 });
    const controller = new AbortController();

    const pending = client.listReleases({ signal: controller.signal });
    controller.abort();

    expect(await pending).toEqual({ ok: false, code: 'cancelled', errorMessage: 'Consulta ao feed cancelada.' });

    const alreadyAborted = await client.listReleases({ signal: controller.signal });
    expect(!alreadyAborted.ok && alreadyAborted.code).toBe('cancelled');
  });
});

function waitForAbort(_url: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

function githubRelease(tag: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    tag_name: tag,
    name: tag,
    body: '',
    published_at: '2024-01-01T00:00:00Z',
    prerelease: false,
    draft: false,
    html_url: `https://example.invalid/releases/${tag}`,
    url: 'https://api.example.invalid/repos/acme/shop/releases/1',
    assets: [],
    ...overrides
  };
}

function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  } satisfies LoggerLike;
}
