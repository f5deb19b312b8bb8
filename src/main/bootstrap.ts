import os from 'node:os';
import path from 'node:path';
import type { UpgraderConfig } from '@shared/contracts';
import { ConfigStore, resolveFeedUrl } from '@main/services/config/ConfigStore';
import { DownloadManager } from '@main/services/download/DownloadManager';
import { UpgraderLauncher, type UpgraderCommand } from '@main/services/handoff/UpgraderLauncher';
import { StagedReleaseApplier, type InstallationApplier } from '@main/services/install/InstallationApplier';
import { InstallationDetector } from '@main/services/install/InstallationDetector';
import { Logger, type LogLevel } from '@main/services/logging/Logger';
import { UpgradeOrchestrator } from '@main/services/orchestrator/UpgradeOrchestrator';
import { ReleaseCatalogClient } from '@main/services/releases/ReleaseCatalogClient';
import { InstallationStateStore } from '@main/services/state/InstallationStateStore';
import { FileKeyValueStore, type KeyValueStore } from '@main/services/state/KeyValueStore';
import { UpgradeValidator } from '@main/services/upgrade/UpgradeValidator';

const USER_AGENT = 'StorefrontUpgrader/0.1';

export interface UpgradePipelineOptions {
  baseDir: string;
  env?: NodeJS.ProcessEnv;
  consoleLevel?: LogLevel | null;
  /** Installer process only. Without it upgrades are applied in the current process. */
  upgraderCommand?: UpgraderCommand | null;
  store?: KeyValueStore;
  applier?: InstallationApplier;
  fetchFn?: typeof fetch;
}

export interface UpgradePipeline {
  logger: Logger;
  config: UpgraderConfig;
  stateStore: InstallationStateStore;
  orchestrator: UpgradeOrchestrator;
}

export function createUpgradePipeline(options: UpgradePipelineOptions): UpgradePipeline {
  const env = options.env ?? process.env;
  const logger = new Logger(options.baseDir, {
    mirrorFilePath: env.STOREFRONT_DEBUG_LOG_PATH?.trim() || null,
    consoleLevel: options.consoleLevel ?? null
  });
  const config = new ConfigStore(options.baseDir, logger).get();
  const authToken = env.STOREFRONT_GITHUB_TOKEN?.trim() || undefined;

  const stateStore = new InstallationStateStore({
    store: options.store ?? new FileKeyValueStore(path.join(options.baseDir, 'state', 'installation-state.json')),
    logger,
    namespace: config.stateNamespace
  });
  const catalog = new ReleaseCatalogClient({
    feedUrl: resolveFeedUrl(config),
    logger,
    timeoutMs: config.timeouts.feedMs,
    userAgent: USER_AGENT,
    authToken,
    fetchFn: options.fetchFn
  });
  const downloader = new DownloadManager({
    logger,
    userAgent: USER_AGENT,
    authToken,
    requestTimeoutMs: config.timeouts.requestMs,
    chunkTimeoutMs: config.timeouts.chunkMs,
    progressIntervalMs: config.progressIntervalMs,
    fetchFn: options.fetchFn
  });
  const validator = new UpgradeValidator({
    logger,
    minimumUpgradableVersion: config.minimumUpgradableVersion
  });
  const launcher = options.upgraderCommand
    ? new UpgraderLauncher({ logger, command: options.upgraderCommand })
    : null;

  const orchestrator = new UpgradeOrchestrator({
    logger,
    stateStore,
    catalog,
    downloader,
    validator,
    applier: options.applier ?? new StagedReleaseApplier({ logger, maxReleasesToKeep: config.maxReleasesToKeep }),
    detector: new InstallationDetector({ logger }),
    launcher,
    assetPatterns: config.assetPatterns,
    selection: config.selection,
    downloadDir: config.downloadDir,
    defaultInstallPath: config.defaultInstallPath
  });

  logger.info('app.bootstrap', {
    baseDir: options.baseDir,
    feedUrl: resolveFeedUrl(config),
    handoff: launcher !== null,
    authenticated: authToken !== undefined
  });

  return { logger, config, stateStore, orchestrator };
}

export function resolveBaseDir(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.STOREFRONT_UPGRADE_HOME?.trim();
  if (explicit) {
    return path.resolve(explicit);
  }

  return path.join(os.homedir(), '.storefront-upgrade');
}

export function readBooleanFlag(env: NodeJS.ProcessEnv, envName: string): boolean {
  const raw = env[envName]?.trim().toLowerCase();
  return raw === '1' || raw === 'true' || raw === 'yes' || raw === 'on';
}
