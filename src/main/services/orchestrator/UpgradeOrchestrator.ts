import fs from 'node:fs';
import path from 'node:path';
import type {
  DownloadProgress,
  ExistingInstallation,
  InstallationDetails,
  InstallationInfo,
  OrchestrationErrorCode,
  OrchestrationMode,
  OrchestrationPhase,
  OrchestrationResult,
  OrchestrationTransition,
  ReleaseAsset,
  ReleaseInfo,
  ReleaseSelectionPolicy,
  TerminalPhase,
  UpgradeValidationResult
} from '@shared/contracts';
import type { LoggerLike } from '@main/services/logging/Logger';
import type { DownloadManager } from '@main/services/download/DownloadManager';
import type { UpgraderLauncher } from '@main/services/handoff/UpgraderLauncher';
import type { InstallationApplier } from '@main/services/install/InstallationApplier';
import { sanitizePathSegment } from '@main/services/install/InstallationApplier';
import { InstallationDetector, hasHandoffIdentity } from '@main/services/install/InstallationDetector';
import type { ReleaseCatalogClient, ReleaseLookupResult } from '@main/services/releases/ReleaseCatalogClient';
import { DEFAULT_SELECTION_POLICY } from '@main/services/releases/release-selection';
import { normalizeTagToVersion } from '@main/services/releases/version';
import type { InstallationStateStore } from '@main/services/state/InstallationStateStore';
import type { UpgradeValidator } from '@main/services/upgrade/UpgradeValidator';

export interface OrchestrationRequest {
  mode?: OrchestrationMode;
  /** Target directory for a fresh install. Defaults to the configured install path. */
  installPath?: string;
  details?: InstallationDetails;
  /** Installation handed over by the installer process (upgrade mode). */
  installation?: ExistingInstallation;
  stagedArtifactPath?: string | null;
  targetVersion?: string | null;
  signal?: AbortSignal;
  onTransition?: (transition: OrchestrationTransition) => void;
  onProgress?: (progress: DownloadProgress) => void;
  /** Asked before applying a release that declares breaking changes. Absent means accepted. */
  confirmBreakingChanges?: (validation: UpgradeValidationResult) => boolean | Promise<boolean>;
}

interface UpgradeOrchestratorOptions {
  logger: LoggerLike;
  stateStore: InstallationStateStore;
  catalog: ReleaseCatalogClient;
  downloader: DownloadManager;
  validator: UpgradeValidator;
  applier: InstallationApplier;
  assetPatterns: string[];
  downloadDir: string;
  defaultInstallPath: string;
  selection?: ReleaseSelectionPolicy;
  detector?: InstallationDetector;
  /** Set in the installer process only: upgrades are handed to a separate upgrader. */
  launcher?: UpgraderLauncher | null;
  now?: () => Date;
}

interface RunContext {
  mode: OrchestrationMode;
  request: OrchestrationRequest;
  phase: OrchestrationPhase | null;
  release: ReleaseInfo | null;
  installPath: string | null;
  validation: UpgradeValidationResult | null;
  artifactPath: string | null;
}

type StepResult<T> = { ok: true; value: T } | { ok: false; result: OrchestrationResult };

export class UpgradeOrchestrator {
  private readonly logger: LoggerLike;
  private readonly stateStore: InstallationStateStore;
  private readonly catalog: ReleaseCatalogClient;
  private readonly downloader: DownloadManager;
  private readonly validator: UpgradeValidator;
  private readonly applier: InstallationApplier;
  private readonly assetPatterns: string[];
  private readonly downloadDir: string;
  private readonly defaultInstallPath: string;
  private readonly selection: ReleaseSelectionPolicy;
  private readonly detector: InstallationDetector;
  private readonly launcher: UpgraderLauncher | null;
  private readonly now: () => Date;
  private running = false;

  constructor(options: UpgradeOrchestratorOptions) {
    this.logger = options.logger;
    this.stateStore = options.stateStore;
    this.catalog = options.catalog;
    this.downloader = options.downloader;
    this.validator = options.validator;
    this.applier = options.applier;
    this.assetPatterns = options.assetPatterns;
    this.downloadDir = options.downloadDir;
    this.defaultInstallPath = options.defaultInstallPath;
    this.selection = options.selection ?? DEFAULT_SELECTION_POLICY;
    this.detector = options.detector ?? new InstallationDetector({ logger: options.logger });
    this.launcher = options.launcher ?? null;
    this.now = options.now ?? (() => new Date());
  }

  async run(request: OrchestrationRequest = {}): Promise<OrchestrationResult> {
    const context: RunContext = {
      mode: request.mode ?? 'install',
      request,
      phase: null,
      release: null,
      installPath: null,
      validation: null,
      artifactPath: null
    };

    if (this.running) {
      return this.finish(context, 'failed', 'Ja existe uma orquestracao em andamento.', 'unexpected_error');
    }

    this.running = true;
    try {
      return await this.execute(context);
    } catch (error) {
      this.logger.error('orchestrator.unexpected_error', {
        phase: context.phase,
        reason: toErrorMessage(error)
      });
      const code: OrchestrationErrorCode = context.phase === 'applying' ? 'apply_failed' : 'unexpected_error';
      return this.finish(context, 'failed', `Erro inesperado: ${toErrorMessage(error)}`, code);
    } finally {
      this.running = false;
    }
  }

  private async execute(context: RunContext): Promise<OrchestrationResult> {
    this.transition(context, 'detecting');
    const detection = this.stateStore.detect();

    if (detection.status === 'unknown') {
      return this.finish(
        context,
        'failed',
        `Nao foi possivel determinar o estado da instalacao: ${detection.reason}`,
        'state_unknown'
      );
    }

    if (detection.status === 'not-installed') {
      if (context.mode !== 'install') {
        return this.finish(context, 'failed', 'Nenhuma instalacao registrada.', 'not_installed');
      }
      return this.freshInstall(context);
    }

    if (context.mode === 'reconfigure') {
      return this.reconfigure(context, detection.info);
    }

    return this.upgrade(context, detection.info);
  }

  private async freshInstall(context: RunContext): Promise<OrchestrationResult> {
    this.transition(context, 'fresh-install');
    const installPath = (context.request.installPath ?? this.defaultInstallPath).trim();
    context.installPath = installPath;

    const resolved = await this.resolve(context);
    if (!resolved.ok) {
      return resolved.result;
    }

    const { release, asset } = resolved.value;
    const downloaded = await this.download(context, release, asset);
    if (!downloaded.ok) {
      return downloaded.result;
    }

    const applied = await this.apply(context, release, downloaded.value, installPath, null);
    if (!applied.ok) {
      return applied.result;
    }

    return this.commit(context, release, installPath, context.request.details);
  }

  private async upgrade(context: RunContext, info: InstallationInfo): Promise<OrchestrationResult> {
    this.transition(context, 'upgrading');
    context.installPath = info.installPath;

    const handedOver = context.request.installation;
    if (handedOver && path.resolve(handedOver.installPath) !== path.resolve(info.installPath)) {
      return this.finish(
        context,
        'failed',
        `Caminho recebido (${handedOver.installPath}) difere do registrado (${info.installPath}).`,
        'validation_rejected'
      );
    }

    const resolved = await this.resolve(context);
    if (!resolved.ok) {
      return resolved.result;
    }

    const { release, asset } = resolved.value;
    this.transition(context, 'validating');
    const validation = this.validator.validate(info.version, release, { installPath: info.installPath });
    context.validation = validation;
    if (!validation.canProceed) {
      return this.finish(context, 'failed', validation.errorMessage ?? 'Upgrade rejeitado.', 'validation_rejected');
    }

    if (validation.hasWarnings && context.request.confirmBreakingChanges) {
      const confirmed = await context.request.confirmBreakingChanges(validation);
      if (!confirmed) {
        return this.finish(context, 'failed', 'Upgrade cancelado: mudancas incompativeis nao confirmadas.', 'validation_rejected');
      }
    }

    const downloaded = await this.download(context, release, asset);
    if (!downloaded.ok) {
      return downloaded.result;
    }

    const installation = handedOver ?? (await this.detector.describe(info));
    if (context.mode === 'install' && this.launcher) {
      return this.handOff(context, installation, downloaded.value);
    }

    const applied = await this.apply(context, release, downloaded.value, info.installPath, installation);
    if (!applied.ok) {
      return applied.result;
    }

    return this.commit(context, release, info.installPath, {
      siteName: installation.siteName,
      databaseServer: installation.databaseServer,
      databaseName: installation.databaseName
    });
  }

  private async reconfigure(context: RunContext, info: InstallationInfo): Promise<OrchestrationResult> {
    this.transition(context, 'reconfiguring');
    context.installPath = info.installPath;

    const details: InstallationDetails = {
      siteName: context.request.details?.siteName ?? info.siteName,
      databaseServer: context.request.details?.databaseServer ?? info.databaseServer,
      databaseName: context.request.details?.databaseName ?? info.databaseName
    };

    if (this.applier.reconfigure) {
      this.transition(context, 'applying');
      const applied = await this.applier.reconfigure({ installPath: info.installPath, version: info.version, details });
      if (!applied.ok) {
        return this.finish(context, 'failed', applied.errorMessage ?? 'Falha ao reconfigurar.', 'apply_failed');
      }
    }

    this.transition(context, 'committing');
    if (!this.stateStore.saveInstallationInfo(info.version, info.installPath, details)) {
      return this.finish(context, 'failed', 'Falha ao registrar a configuracao da instalacao.', 'commit_failed');
    }

    return this.finish(context, 'succeeded', `Instalacao reconfigurada na versao ${info.version}.`, null);
  }

  private async resolve(context: RunContext): Promise<StepResult<{ release: ReleaseInfo; asset: ReleaseAsset }>> {
    this.transition(context, 'resolving');
    const options = { signal: context.request.signal };
    const lookup: ReleaseLookupResult = context.request.targetVersion
      ? await this.catalog.getReleaseByVersion(context.request.targetVersion, options)
      : await this.catalog.getLatestRelease(this.selection, options);

    if (!lookup.ok) {
      return this.stop(context, lookup.errorMessage, lookup.code);
    }
    if (!lookup.release) {
      const message = context.request.targetVersion
        ? `Release ${context.request.targetVersion} nao encontrada no feed.`
        : 'Nenhuma release disponivel no feed.';
      return this.stop(context, message, 'release_not_found');
    }

    const release = lookup.release;
    context.release = release;
    const asset = this.catalog.findAssetByPatterns(release, this.assetPatterns);
    if (!asset) {
      return this.stop(
        context,
        `Release ${release.version} sem pacote compativel (${this.assetPatterns.join(', ')}).`,
        'asset_not_found'
      );
    }

    this.logger.info('orchestrator.release_resolved', {
      version: release.version,
      asset: asset.name,
      size: asset.size
    });
    return { ok: true, value: { release, asset } };
  }

  private async download(context: RunContext, release: ReleaseInfo, asset: ReleaseAsset): Promise<StepResult<string>> {
    this.transition(context, 'downloading');

    const staged = context.request.stagedArtifactPath?.trim();
    if (staged && fs.existsSync(staged)) {
      if (stagedMatchesAsset(staged, asset)) {
        this.logger.info('orchestrator.download.reuse_staged', { artifactPath: staged });
        context.artifactPath = staged;
        return { ok: true, value: staged };
      }
      this.logger.warn('orchestrator.download.staged_mismatch', {
        artifactPath: staged,
        asset: asset.name,
        size: asset.size,
        version: release.version
      });
    }

    const destination = path.join(
      this.downloadDir,
      sanitizePathSegment(normalizeTagToVersion(release.version)),
      sanitizePathSegment(asset.name)
    );
    if (asset.size > 0 && fileSize(destination) === asset.size) {
      this.logger.info('orchestrator.download.reuse_cached', { artifactPath: destination });
      context.artifactPath = destination;
      return { ok: true, value: destination };
    }

    const fallbackUrl = resolveAssetApiUrl(release, asset);
    const result = await this.downloader.download(
      {
        url: asset.browserDownloadUrl,
        destinationPath: destination,
        ...(fallbackUrl ? { fallbackUrl } : {})
      },
      {
        signal: context.request.signal,
        onProgress: context.request.onProgress
      }
    );

    if (!result.ok || !result.filePath) {
      const message = result.errorMessage ?? 'Falha no download.';
      return this.stop(context, message, result.cancelled ? 'download_cancelled' : 'download_failed');
    }

    context.artifactPath = result.filePath;
    return { ok: true, value: result.filePath };
  }

  private async handOff(
    context: RunContext,
    installation: ExistingInstallation,
    artifactPath: string
  ): Promise<OrchestrationResult> {
    this.transition(context, 'handing-off');
    if (!this.launcher) {
      return this.finish(context, 'failed', 'Upgrader nao configurado.', 'handoff_failed');
    }
    if (!hasHandoffIdentity(installation)) {
      return this.finish(
        context,
        'failed',
        'Dados da instalacao incompletos para o upgrader (site, caminho e banco sao obrigatorios).',
        'handoff_failed'
      );
    }

    const launched = await this.launcher.launch(installation, {
      packagePath: artifactPath,
      ...(context.release ? { targetVersion: context.release.version } : {})
    });
    if (!launched.ok) {
      return this.finish(context, 'failed', launched.errorMessage ?? 'Falha ao iniciar o upgrader.', 'handoff_failed');
    }

    return this.finish(context, 'handed-off', `Upgrade entregue ao upgrader (pid ${launched.pid ?? 'desconhecido'}).`, null);
  }

  private async apply(
    context: RunContext,
    release: ReleaseInfo,
    artifactPath: string,
    installPath: string,
    installation: ExistingInstallation | null
  ): Promise<StepResult<true>> {
    this.transition(context, 'applying');
    const applied = await this.applier.apply({
      artifactPath,
      installPath,
      version: normalizeTagToVersion(release.version),
      release,
      installation
    });

    if (!applied.ok) {
      return this.stop(context, applied.errorMessage ?? 'Falha ao aplicar a release.', 'apply_failed');
    }

    return { ok: true, value: true };
  }

  private commit(
    context: RunContext,
    release: ReleaseInfo,
    installPath: string,
    details: InstallationDetails | undefined
  ): OrchestrationResult {
    this.transition(context, 'committing');
    const version = normalizeTagToVersion(release.version);
    if (!this.stateStore.saveInstallationInfo(version, installPath, details)) {
      return this.finish(context, 'failed', 'Falha ao registrar a instalacao.', 'commit_failed');
    }

    const message =
      context.validation !== null ? `Upgrade concluido para a versao ${version}.` : `Versao ${version} instalada.`;
    return this.finish(context, 'succeeded', message, null);
  }

  private stop<T>(context: RunContext, message: string, code: OrchestrationErrorCode): StepResult<T> {
    return { ok: false, result: this.finish(context, 'failed', message, code) };
  }

  private finish(
    context: RunContext,
    phase: TerminalPhase,
    message: string,
    errorCode: OrchestrationErrorCode | null
  ): OrchestrationResult {
    this.transition(context, phase);
    const result: OrchestrationResult = {
      ok: phase !== 'failed',
      phase,
      mode: context.mode,
      message,
      errorCode,
      version: context.release ? normalizeTagToVersion(context.release.version) : null,
      installPath: context.installPath,
      validation: context.validation,
      artifactPath: context.artifactPath
    };

    const level = phase === 'failed' ? 'warn' : 'info';
    this.logger[level]('orchestrator.finish', {
      mode: context.mode,
      phase,
      errorCode,
      message,
      version: result.version
    });
    return result;
  }

  private transition(context: RunContext, to: OrchestrationPhase): void {
    const transition: OrchestrationTransition = {
      from: context.phase,
      to,
      at: this.now().toISOString()
    };
    context.phase = to;
    this.logger.info('orchestrator.phase', { mode: context.mode, from: transition.from, to });
    context.request.onTransition?.(transition);
  }
}

/** API endpoint of a GitHub release asset, derived from the release's API URL. */
export function resolveAssetApiUrl(release: ReleaseInfo, asset: ReleaseAsset): string | null {
  if (asset.id <= 0) {
    return null;
  }

  const match = /^(.*\/releases)\/\d+$/.exec(release.apiUrl.trim());
  return match ? `${match[1]}/assets/${asset.id}` : null;
}

function stagedMatchesAsset(filePath: string, asset: ReleaseAsset): boolean {
  if (path.basename(filePath) !== asset.name) {
    return false;
  }
  return asset.size <= 0 || fileSize(filePath) === asset.size;
}

function fileSize(filePath: string): number | null {
  try {
    return fs.statSync(filePath).size;
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
