import fs from 'node:fs';
import path from 'node:path';
import type { ExistingInstallation, InstallationDetails, ReleaseInfo } from '@shared/contracts';
import type { LoggerLike } from '@main/services/logging/Logger';

export interface ApplyInput {
  artifactPath: string;
  installPath: string;
  version: string;
  release: ReleaseInfo;
  /** Present on the upgrade branch; null for a fresh install. */
  installation: ExistingInstallation | null;
}

export interface ReconfigureInput {
  installPath: string;
  version: string;
  details: InstallationDetails;
}

export interface ApplyResult {
  ok: boolean;
  errorMessage: string | null;
}

export interface InstallationApplier {
  apply(input: ApplyInput): Promise<ApplyResult>;
  reconfigure?(input: ReconfigureInput): Promise<ApplyResult>;
}

export interface ReleaseMarker {
  version: string;
  artifact: string;
  releaseName: string;
  appliedAt: string;
}

interface StagedReleaseApplierOptions {
  logger: LoggerLike;
  maxReleasesToKeep?: number;
  now?: () => Date;
}

/**
 * Places the artifact under `<installPath>/releases/<version>/` and points
 * `current.json` at it. Older release directories past the retention limit
 * are removed after the switch.
 */
export class StagedReleaseApplier implements InstallationApplier {
  private readonly logger: LoggerLike;
  private readonly maxReleasesToKeep: number;
  private readonly now: () => Date;

  constructor(options: StagedReleaseApplierOptions) {
    this.logger = options.logger;
    this.maxReleasesToKeep = normalizeMaxReleasesToKeep(options.maxReleasesToKeep);
    this.now = options.now ?? (() => new Date());
  }

  async apply(input: ApplyInput): Promise<ApplyResult> {
    const releasesDir = path.join(input.installPath, 'releases');
    const releaseDir = path.join(releasesDir, sanitizePathSegment(input.version));
    const artifactName = sanitizePathSegment(path.basename(input.artifactPath));

    this.logger.info('install.apply.start', {
      version: input.version,
      installPath: input.installPath,
      artifactPath: input.artifactPath
    });

    try {
      if (!fs.existsSync(input.artifactPath)) {
        return this.fail(input, `Artefato nao encontrado: ${input.artifactPath}`);
      }

      await fs.promises.mkdir(releaseDir, { recursive: true });
      await fs.promises.copyFile(input.artifactPath, path.join(releaseDir, artifactName));

      const marker: ReleaseMarker = {
        version: input.version,
        artifact: path.join('releases', sanitizePathSegment(input.version), artifactName),
        releaseName: input.release.name,
        appliedAt: this.now().toISOString()
      };
      await fs.promises.writeFile(path.join(releaseDir, 'release.json'), `${JSON.stringify(marker, null, 2)}\n`, 'utf-8');
      await writeFileAtomic(path.join(input.installPath, 'current.json'), `${JSON.stringify(marker, null, 2)}\n`);

      this.pruneOldReleases(releasesDir, sanitizePathSegment(input.version));
      this.logger.info('install.apply.finish', { version: input.version, installPath: input.installPath });
      return { ok: true, errorMessage: null };
    } catch (error) {
      return this.fail(input, `Falha ao aplicar release: ${toErrorMessage(error)}`);
    }
  }

  private fail(input: ApplyInput, errorMessage: string): ApplyResult {
    this.logger.error('install.apply.error', {
      version: input.version,
      installPath: input.installPath,
      reason: errorMessage
    });
    return { ok: false, errorMessage };
  }

  private pruneOldReleases(releasesDir: string, keepVersion: string): void {
    try {
      const entries = fs
        .readdirSync(releasesDir, { withFileTypes: true })
        .filter((entry) => entry.isDirectory())
        .map((entry) => {
          const fullPath = path.join(releasesDir, entry.name);
          return {
            name: entry.name,
            fullPath,
            mtimeMs: fs.statSync(fullPath).mtimeMs
          };
        })
        .sort((a, b) => b.mtimeMs - a.mtimeMs);

      const keep = new Set<string>([keepVersion]);
      for (const entry of entries) {
        if (keep.size >= this.maxReleasesToKeep) {
          break;
        }
        keep.add(entry.name);
      }

      for (const entry of entries) {
        if (keep.has(entry.name)) {
          continue;
        }
        fs.rmSync(entry.fullPath, { recursive: true, force: true });
        this.logger.info('install.prune.removed', { release: entry.name });
      }
    } catch (error) {
      // A limpeza de releases antigas nunca derruba uma instalacao ja aplicada.
      this.logger.warn('install.prune.error', { releasesDir, reason: toErrorMessage(error) });
    }
  }
}

export function readReleaseMarker(installPath: string): ReleaseMarker | null {
  const filePath = path.join(installPath, 'current.json');
  if (!fs.existsSync(filePath)) {
    return null;
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!isReleaseMarker(parsed)) {
    return null;
  }

  return parsed;
}

export function sanitizePathSegment(value: string): string {
  const trimmed = value.trim();
  const safe = trimmed.replace(/[^a-zA-Z0-9._-]+/g, '_');
  return safe || 'file';
}

function isReleaseMarker(value: unknown): value is ReleaseMarker {
  if (!value || typeof value !== 'object') {
    return false;
  }

  return (
    'version' in value &&
    typeof value.version === 'string' &&
    'artifact' in value &&
    typeof value.artifact === 'string' &&
    'releaseName' in value &&
    typeof value.releaseName === 'string' &&
    'appliedAt' in value &&
    typeof value.appliedAt === 'string'
  );
}

async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.promises.writeFile(tempPath, content, 'utf-8');
  await fs.promises.rename(tempPath, filePath);
}

function normalizeMaxReleasesToKeep(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return 3;
  }

  return Math.max(1, Math.min(10, Math.trunc(value)));
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
