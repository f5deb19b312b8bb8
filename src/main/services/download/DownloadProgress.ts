import type { DownloadProgress } from '@shared/contracts';

export function computePercentComplete(bytesReceived: number, totalBytes: number): number {
  if (totalBytes <= 0) {
    return 0;
  }

  const percent = Math.floor((bytesReceived * 100) / totalBytes);
  return Math.min(100, Math.max(0, percent));
}

/**
 * Speed is the average since transfer start, not a sliding window, so the
 * ETA is optimistic early in long transfers.
 */
export function createProgressSnapshot(bytesReceived: number, totalBytes: number, elapsedMs: number): DownloadProgress {
  const received = Math.max(0, bytesReceived);
  const total = Math.max(0, totalBytes);
  const elapsed = Math.max(0, elapsedMs);
  const elapsedSeconds = elapsed / 1000;
  const bytesPerSecond = elapsedSeconds > 0 ? received / elapsedSeconds : 0;
  const remaining = Math.max(0, total - received);
  const etaSeconds = total > 0 && bytesPerSecond > 0 ? remaining / bytesPerSecond : 0;

  return {
    bytesReceived: received,
    totalBytes: total,
    percentComplete: computePercentComplete(received, total),
    bytesPerSecond,
    etaSeconds,
    elapsedMs: elapsed
  };
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = Math.max(0, bytes);
  let order = 0;
  while (value >= 1024 && order < units.length - 1) {
    value /= 1024;
    order += 1;
  }

  const rounded = Math.round(value * 100) / 100;
  return `${rounded} ${units[order]}`;
}

export function describeProgress(progress: DownloadProgress): string {
  if (progress.totalBytes === 0) {
    return progress.bytesReceived > 0
      ? `${formatBytes(progress.bytesReceived)} recebidos (${formatBytes(progress.bytesPerSecond)}/s)`
      : 'Iniciando download...';
  }

  return (
    `${progress.percentComplete}% - ${formatBytes(progress.bytesReceived)} / ${formatBytes(progress.totalBytes)} ` +
    `(${formatBytes(progress.bytesPerSecond)}/s, ETA: ${Math.round(progress.etaSeconds)}s)`
  );
}
