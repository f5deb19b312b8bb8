import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { UpgraderConfig } from '@shared/contracts';
import type { LoggerLike } from '@main/services/logging/Logger';

const configSchema = z.object({
  feed: z.object({
    owner: z.string().min(1),
    repo: z.string().min(1),
    apiBaseUrl: z.string().url(),
    url: z.string().url().optional(),
    perPage: z.number().int().min(1).max(100)
  }),
  assetPatterns: z.array(z.string().min(1)).min(1),
  selection: z.object({
    strategy: z.enum(['latest-published', 'highest-version']),
    includePrereleases: z.boolean()
  }),
  timeouts: z.object({
    feedMs: z.number().int().positive(),
    requestMs: z.number().int().positive(),
    chunkMs: z.number().int().positive()
  }),
  progressIntervalMs: z.number().int().nonnegative(),
  minimumUpgradableVersion: z.string().min(1),
  stateNamespace: z.string().min(1),
  downloadDir: z.string().min(1),
  defaultInstallPath: z.string().min(1),
  maxReleasesToKeep: z.number().int().min(1)
});

export function createDefaultConfig(baseDir: string): UpgraderConfig {
  return {
    feed: {
      owner: 'storefront',
      repo: 'storefront',
      apiBaseUrl: 'https://api.github.com',
      perPage: 20
    },
    assetPatterns: ['Storefront-v*.zip', 'Storefront-*.zip', 'Storefront-Installer-*.zip'],
    selection: {
      strategy: 'highest-version',
      includePrereleases: false
    },
    timeouts: {
      feedMs: 15_000,
      requestMs: 30_000,
      chunkMs: 30_000
    },
    progressIntervalMs: 250,
    minimumUpgradableVersion: '0.9.0',
    stateNamespace: 'storefront',
    downloadDir: path.join(baseDir, 'downloads'),
    defaultInstallPath: path.join(baseDir, 'site'),
    maxReleasesToKeep: 3
  };
}

export class ConfigStore {
  private readonly filePath: string;
  private readonly defaults: UpgraderConfig;
  private readonly logger: LoggerLike | null;
  private cache: UpgraderConfig;

  constructor(baseDir: string, logger?: LoggerLike) {
    this.logger = logger ?? null;
    const configDir = path.join(baseDir, 'config');
    fs.mkdirSync(configDir, { recursive: true });
    this.filePath = path.join(configDir, 'storefront-upgrade.config.json');
    this.defaults = createDefaultConfig(baseDir);
    this.cache = this.load();
  }

  get(): UpgraderConfig {
    return cloneConfig(this.cache);
  }

  get configFilePath(): string {
    return this.filePath;
  }

  private load(): UpgraderConfig {
    if (!fs.existsSync(this.filePath)) {
      this.persist(this.defaults);
      return this.defaults;
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = configSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      this.logger?.warn('config.load.invalid', {
        filePath: this.filePath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
    } catch (error) {
      this.logger?.warn('config.load.error', {
        filePath: this.filePath,
        reason: error instanceof Error ? error.message : String(error)
      });
    }

    this.persist(this.defaults);
    return this.defaults;
  }

  private persist(config: UpgraderConfig): void {
    fs.writeFileSync(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}

export function resolveFeedUrl(config: UpgraderConfig): string {
  if (config.feed.url) {
    return config.feed.url;
  }

  const base = config.feed.apiBaseUrl.replace(/\/+$/, '');
  return `${base}/repos/${encodeURIComponent(config.feed.owner)}/${encodeURIComponent(config.feed.repo)}/releases?per_page=${config.feed.perPage}`;
}

function cloneConfig(config: UpgraderConfig): UpgraderConfig {
  return {
    ...config,
    feed: { ...config.feed },
    assetPatterns: config.assetPatterns.slice(),
    selection: { ...config.selection },
    timeouts: { ...config.timeouts }
  };
}
