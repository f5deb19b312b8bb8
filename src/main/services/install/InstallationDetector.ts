import fs from 'node:fs';
import path from 'node:path';
import type { ExistingInstallation, InstallationInfo } from '@shared/contracts';
import type { LoggerLike } from '@main/services/logging/Logger';
import { readReleaseMarker } from '@main/services/install/InstallationApplier';

export interface InstallationStats {
  productCount: number;
  orderCount: number;
  userCount: number;
}

export interface InstallationStatsProvider {
  collect(installation: { installPath: string; databaseServer: string; databaseName: string }): Promise<InstallationStats>;
}

interface InstallationDetectorOptions {
  logger: LoggerLike;
  statsProvider?: InstallationStatsProvider | null;
  existsSync?: (filePath: string) => boolean;
}

/**
 * Turns the registered installation into the full description the upgrader
 * receives. Health problems are reported as issues; they never block.
 */
export class InstallationDetector {
  private readonly logger: LoggerLike;
  private readonly statsProvider: InstallationStatsProvider | null;
  private readonly existsSync: (filePath: string) => boolean;

  constructor(options: InstallationDetectorOptions) {
    this.logger = options.logger;
    this.statsProvider = options.statsProvider ?? null;
    this.existsSync = options.existsSync ?? fs.existsSync;
  }

  async describe(info: InstallationInfo): Promise<ExistingInstallation> {
    const issues: string[] = [];
    const siteName = info.siteName ?? path.basename(info.installPath);
    const databaseServer = info.databaseServer ?? '';
    const databaseName = info.databaseName ?? '';

    if (!info.databaseServer) {
      issues.push('Servidor de banco de dados nao registrado.');
    }
    if (!info.databaseName) {
      issues.push('Banco de dados nao registrado.');
    }

    const pathExists = this.existsSync(info.installPath);
    if (!pathExists) {
      issues.push(`Caminho de instalacao nao encontrado: ${info.installPath}`);
    } else {
      this.checkReleaseMarker(info, issues);
    }

    let stats: InstallationStats = { productCount: 0, orderCount: 0, userCount: 0 };
    if (this.statsProvider && databaseServer && databaseName) {
      try {
        stats = await this.statsProvider.collect({ installPath: info.installPath, databaseServer, databaseName });
      } catch (error) {
        const reason = toErrorMessage(error);
        this.logger.warn('installation.stats.error', { installPath: info.installPath, reason });
        issues.push(`Falha ao consultar estatisticas: ${reason}`);
      }
    }

    const installation: ExistingInstallation = {
      siteName,
      installPath: info.installPath,
      version: info.version,
      databaseServer,
      databaseName,
      isHealthy: issues.length === 0,
      productCount: stats.productCount,
      orderCount: stats.orderCount,
      userCount: stats.userCount
    };
    if (issues.length > 0) {
      installation.issues = issues;
    }

    this.logger.info('installation.describe', {
      siteName,
      version: info.version,
      isHealthy: installation.isHealthy,
      issues: issues.length
    });
    return installation;
  }

  private checkReleaseMarker(info: InstallationInfo, issues: string[]): void {
    try {
      const marker = readReleaseMarker(info.installPath);
      if (marker && marker.version !== info.version) {
        issues.push(`Release ativa (${marker.version}) difere da versao registrada (${info.version}).`);
      }
    } catch (error) {
      issues.push(`Marcador de release ilegivel: ${toErrorMessage(error)}`);
    }
  }
}

export function hasHandoffIdentity(installation: ExistingInstallation): boolean {
  return [installation.siteName, installation.installPath, installation.databaseServer, installation.databaseName].every(
    (value) => value.trim().length > 0
  );
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
