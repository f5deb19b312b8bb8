import fs from 'node:fs';
import type { ReleaseInfo, UpgradeValidationResult } from '@shared/contracts';
import type { LoggerLike } from '@main/services/logging/Logger';
import { compareVersions, normalizeTagToVersion, parseVersionKey } from '@main/services/releases/version';

interface UpgradeValidatorOptions {
  logger?: LoggerLike;
  minimumUpgradableVersion?: string;
  existsSync?: (filePath: string) => boolean;
}

export interface UpgradeValidationContext {
  installPath?: string;
}

/**
 * Runs only on the upgrade branch: the caller has already established that an
 * installation exists, so an unparseable current version is a rejection, never
 * an implicit fresh install.
 */
export class UpgradeValidator {
  private readonly logger: LoggerLike | null;
  private readonly minimumUpgradableVersion: string | null;
  private readonly existsSync: (filePath: string) => boolean;

  constructor(options: UpgradeValidatorOptions = {}) {
    this.logger = options.logger ?? null;
    this.minimumUpgradableVersion = options.minimumUpgradableVersion?.trim() || null;
    this.existsSync = options.existsSync ?? fs.existsSync;
  }

  validate(currentVersion: string, targetRelease: ReleaseInfo, context: UpgradeValidationContext = {}): UpgradeValidationResult {
    const current = normalizeTagToVersion(currentVersion);
    const target = normalizeTagToVersion(targetRelease.version);
    const result = this.evaluate(current, target, targetRelease, context);

    this.logger?.info('upgrade.validation.finish', {
      currentVersion: current,
      targetVersion: target,
      canProceed: result.canProceed,
      hasWarnings: result.hasWarnings,
      reason: result.errorMessage ?? null
    });
    return result;
  }

  private evaluate(
    current: string,
    target: string,
    targetRelease: ReleaseInfo,
    context: UpgradeValidationContext
  ): UpgradeValidationResult {
    if (!parseVersionKey(current)) {
      return reject(`Versao instalada invalida ou desconhecida: ${current || '(vazia)'}.`);
    }
    if (!parseVersionKey(target)) {
      return reject(`Versao alvo invalida: ${target || '(vazia)'}.`);
    }

    const comparison = compareVersions(target, current);
    if (comparison === 0) {
      return reject(`Instalacao ja esta atualizada na versao ${current}.`);
    }
    if (comparison === null || comparison < 0) {
      return reject(`Downgrade nao permitido: instalado ${current}, alvo ${target}.`);
    }

    if (this.minimumUpgradableVersion) {
      const againstMinimum = compareVersions(current, this.minimumUpgradableVersion);
      if (againstMinimum !== null && againstMinimum < 0) {
        return reject(
          `Nao e possivel atualizar a partir de versoes anteriores a ${this.minimumUpgradableVersion}. Faca a migracao manual.`
        );
      }
    }

    if (context.installPath !== undefined && !this.existsSync(context.installPath)) {
      return reject(`Caminho de instalacao nao encontrado: ${context.installPath}`);
    }

    const message = `Upgrade de ${current} para ${target} pronto.`;
    const breakingChanges = targetRelease.breakingChanges.filter((item) => item.trim().length > 0);
    if (breakingChanges.length > 0) {
      return {
        canProceed: true,
        message,
        hasWarnings: true,
        warningMessage: `A versao ${target} contem mudancas incompativeis. Confirmacao necessaria.`,
        breakingChanges
      };
    }

    return {
      canProceed: true,
      message,
      hasWarnings: false
    };
  }
}

function reject(errorMessage: string): UpgradeValidationResult {
  return {
    canProceed: false,
    errorMessage,
    hasWarnings: false
  };
}
