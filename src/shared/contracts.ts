export interface ReleaseAsset {
  id: number;
  name: string;
  browserDownloadUrl: string;
  size: number;
  contentType: string;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface ReleaseInfo {
  version: string;
  name: string;
  description: string;
  publishedAt: string | null;
  assets: ReleaseAsset[];
  isPreRelease: boolean;
  isDraft: boolean;
  htmlUrl: string;
  apiUrl: string;
  breakingChanges: string[];
}

export type ReleaseSelectionStrategy = 'latest-published' | 'highest-version';

export interface ReleaseSelectionPolicy {
  strategy: ReleaseSelectionStrategy;
  includePrereleases: boolean;
}

export interface DownloadProgress {
  bytesReceived: number;
  totalBytes: number;
  percentComplete: number;
  bytesPerSecond: number;
  etaSeconds: number;
  elapsedMs: number;
}

export interface InstallationInfo {
  version: string;
  installPath: string;
  installDate: string;
  siteName?: string;
  databaseServer?: string;
  databaseName?: string;
}

export interface InstallationDetails {
  siteName?: string;
  databaseServer?: string;
  databaseName?: string;
}

export type InstallationDetection =
  | { status: 'installed'; info: InstallationInfo }
  | { status: 'not-installed' }
  | { status: 'unknown'; reason: string };

export interface ExistingInstallation {
  siteName: string;
  installPath: string;
  version: string;
  databaseServer: string;
  databaseName: string;
  isHealthy: boolean;
  productCount: number;
  orderCount: number;
  userCount: number;
  issues?: string[];
}

export interface UpgradeValidationResult {
  canProceed: boolean;
  errorMessage?: string;
  message?: string;
  hasWarnings: boolean;
  warningMessage?: string;
  breakingChanges?: string[];
}

export type OrchestrationMode = 'install' | 'upgrade' | 'reconfigure';

export type OrchestrationPhase =
  | 'detecting'
  | 'fresh-install'
  | 'upgrading'
  | 'reconfiguring'
  | 'resolving'
  | 'validating'
  | 'downloading'
  | 'handing-off'
  | 'applying'
  | 'committing'
  | 'succeeded'
  | 'failed'
  | 'handed-off';

export type TerminalPhase = Extract<OrchestrationPhase, 'succeeded' | 'failed' | 'handed-off'>;

export type OrchestrationErrorCode =
  | 'state_unknown'
  | 'not_installed'
  | 'feed_unavailable'
  | 'feed_timeout'
  | 'feed_parse_failed'
  | 'release_not_found'
  | 'asset_not_found'
  | 'validation_rejected'
  | 'download_failed'
  | 'download_cancelled'
  | 'cancelled'
  | 'handoff_failed'
  | 'apply_failed'
  | 'commit_failed'
  | 'unexpected_error';

export interface OrchestrationTransition {
  from: OrchestrationPhase | null;
  to: OrchestrationPhase;
  at: string;
}

export interface OrchestrationResult {
  ok: boolean;
  phase: TerminalPhase;
  mode: OrchestrationMode;
  message: string;
  errorCode: OrchestrationErrorCode | null;
  version: string | null;
  installPath: string | null;
  validation: UpgradeValidationResult | null;
  artifactPath: string | null;
}

export interface UpgraderConfig {
  feed: {
    owner: string;
    repo: string;
    apiBaseUrl: string;
    url?: string;
    perPage: number;
  };
  assetPatterns: string[];
  selection: ReleaseSelectionPolicy;
  timeouts: {
    feedMs: number;
    requestMs: number;
    chunkMs: number;
  };
  progressIntervalMs: number;
  minimumUpgradableVersion: string;
  stateNamespace: string;
  downloadDir: string;
  defaultInstallPath: string;
  maxReleasesToKeep: number;
}
