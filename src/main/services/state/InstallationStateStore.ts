import type { InstallationDetails, InstallationDetection, InstallationInfo } from '@shared/contracts';
import type { LoggerLike } from '@main/services/logging/Logger';
import type { KeyValueStore } from '@main/services/state/KeyValueStore';

const INSTALLED_VERSION_KEY = 'InstalledVersion';
const INSTALL_PATH_KEY = 'InstallPath';
const INSTALL_DATE_KEY = 'InstallDate';
const SITE_NAME_KEY = 'SiteName';
const DATABASE_SERVER_KEY = 'DatabaseServer';
const DATABASE_NAME_KEY = 'DatabaseName';
const UNKNOWN = 'Unknown';

interface InstallationStateStoreOptions {
  store: KeyValueStore;
  logger: LoggerLike;
  namespace?: string;
  now?: () => Date;
}

/**
 * Source of truth for "is the storefront installed, and at which version".
 * Every operation is idempotent and never throws; store failures degrade
 * to `false` / `null` and a logged diagnostic.
 */
export class InstallationStateStore {
  private readonly store: KeyValueStore;
  private readonly logger: LoggerLike;
  private readonly namespace: string;
  private readonly now: () => Date;

  constructor(options: InstallationStateStoreOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.namespace = normalizeNamespace(options.namespace);
    this.now = options.now ?? (() => new Date());
  }

  isInstalled(): boolean {
    return this.detect().status === 'installed';
  }

  getInstallationInfo(): InstallationInfo | null {
    const detection = this.detect();
    return detection.status === 'installed' ? detection.info : null;
  }

  detect(): InstallationDetection {
    try {
      const version = normalizeValue(this.store.get(this.key(INSTALLED_VERSION_KEY)));
      if (!version) {
        return { status: 'not-installed' };
      }

      const info: InstallationInfo = {
        version,
        installPath: normalizeValue(this.store.get(this.key(INSTALL_PATH_KEY))) ?? UNKNOWN,
        installDate: normalizeValue(this.store.get(this.key(INSTALL_DATE_KEY))) ?? UNKNOWN
      };

      const siteName = normalizeValue(this.store.get(this.key(SITE_NAME_KEY)));
      const databaseServer = normalizeValue(this.store.get(this.key(DATABASE_SERVER_KEY)));
      const databaseName = normalizeValue(this.store.get(this.key(DATABASE_NAME_KEY)));
      if (siteName) {
        info.siteName = siteName;
      }
      if (databaseServer) {
        info.databaseServer = databaseServer;
      }
      if (databaseName) {
        info.databaseName = databaseName;
      }

      return { status: 'installed', info };
    } catch (error) {
      const reason = toErrorMessage(error);
      this.logger.warn('installation_state.read_error', {
        namespace: this.namespace,
        reason
      });
      return { status: 'unknown', reason };
    }
  }

  saveInstallationInfo(version: string, installPath: string, details?: InstallationDetails): boolean {
    const normalizedVersion = version.trim();
    const normalizedPath = installPath.trim();
    if (!normalizedVersion || !normalizedPath) {
      this.logger.warn('installation_state.save_rejected', {
        namespace: this.namespace,
        version,
        installPath
      });
      return false;
    }

    try {
      this.store.set(this.key(INSTALL_PATH_KEY), normalizedPath);
      this.store.set(this.key(INSTALL_DATE_KEY), formatSortableDate(this.now()));
      if (details?.siteName) {
        this.store.set(this.key(SITE_NAME_KEY), details.siteName);
      }
      if (details?.databaseServer) {
        this.store.set(this.key(DATABASE_SERVER_KEY), details.databaseServer);
      }
      if (details?.databaseName) {
        this.store.set(this.key(DATABASE_NAME_KEY), details.databaseName);
      }
      // A versao e gravada por ultimo: e ela que marca a instalacao como presente.
      this.store.set(this.key(INSTALLED_VERSION_KEY), normalizedVersion);

      this.logger.info('installation_state.saved', {
        namespace: this.namespace,
        version: normalizedVersion,
        installPath: normalizedPath
      });
      return true;
    } catch (error) {
      this.logger.error('installation_state.save_error', {
        namespace: this.namespace,
        version: normalizedVersion,
        reason: toErrorMessage(error)
      });
      return false;
    }
  }

  removeInstallationInfo(): boolean {
    try {
      this.store.deleteTree(this.namespace);
      this.logger.info('installation_state.removed', { namespace: this.namespace });
      return true;
    } catch (error) {
      this.logger.error('installation_state.remove_error', {
        namespace: this.namespace,
        reason: toErrorMessage(error)
      });
      return false;
    }
  }

  private key(name: string): string {
    return `${this.namespace}/${name}`;
  }
}

export function formatSortableDate(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function normalizeNamespace(value: string | undefined): string {
  const normalized = (value ?? 'storefront').trim().replace(/\/+$/, '');
  return normalized || 'storefront';
}

function normalizeValue(value: string | null): string | null {
  if (typeof value !== 'string') {
    return null;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
