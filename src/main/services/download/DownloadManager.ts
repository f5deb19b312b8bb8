import crypto from 'node:crypto';
import fs, { type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import type { DownloadProgress } from '@shared/contracts';
import type { LoggerLike } from '@main/services/logging/Logger';
import { createProgressSnapshot } from '@main/services/download/DownloadProgress';

export interface DownloadRequest {
  url: string;
  destinationPath: string;
  /** Tried with `Accept: application/octet-stream` when the primary URL answers non-2xx. */
  fallbackUrl?: string;
  checksumSha256?: string;
}

export interface DownloadOptions {
  onProgress?: (progress: DownloadProgress) => void;
  signal?: AbortSignal;
}

export interface DownloadResult {
  ok: boolean;
  filePath: string | null;
  bytesReceived: number;
  totalBytes: number;
  cancelled: boolean;
  errorMessage: string | null;
}

interface DownloadManagerOptions {
  logger: LoggerLike;
  userAgent?: string;
  authToken?: string;
  requestTimeoutMs?: number;
  chunkTimeoutMs?: number;
  progressIntervalMs?: number;
  now?: () => number;
  fetchFn?: typeof fetch;
}

interface TransferState {
  bytesReceived: number;
  totalBytes: number;
  timeoutReason: string | null;
  cancelReader: (() => Promise<void>) | null;
  handle: FileHandle | null;
}

export class DownloadManager {
  private readonly logger: LoggerLike;
  private readonly userAgent: string;
  private readonly authToken: string | null;
  private readonly requestTimeoutMs: number;
  private readonly chunkTimeoutMs: number;
  private readonly progressIntervalMs: number;
  private readonly now: () => number;
  private readonly fetchFn: typeof fetch | null;

  constructor(options: DownloadManagerOptions) {
    this.logger = options.logger;
    this.userAgent = options.userAgent ?? 'StorefrontUpgrader/0.1';
    this.authToken = options.authToken?.trim() ? options.authToken.trim() : null;
    this.requestTimeoutMs = normalizeDuration(options.requestTimeoutMs, 30_000);
    this.chunkTimeoutMs = normalizeDuration(options.chunkTimeoutMs, 30_000);
    this.progressIntervalMs = Number.isFinite(options.progressIntervalMs)
      ? Math.max(0, Math.trunc(options.progressIntervalMs ?? 250))
      : 250;
    this.now = options.now ?? Date.now;
    this.fetchFn = options.fetchFn ?? null;
  }

  async download(request: DownloadRequest, options: DownloadOptions = {}): Promise<DownloadResult> {
    const destination = path.resolve(request.destinationPath);
    const partialPath = `${destination}.part`;
    const external = options.signal;
    if (external?.aborted) {
      return failure(0, 0, true, 'Download cancelado antes de iniciar.');
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    external?.addEventListener('abort', forwardAbort, { once: true });

    const state: TransferState = {
      bytesReceived: 0,
      totalBytes: 0,
      timeoutReason: null,
      cancelReader: null,
      handle: null
    };

    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      // Nada no destino pode ser confundido com um artefato completo.
      await fs.rm(destination, { force: true });
      await fs.rm(partialPath, { force: true });

      const response = await this.openResponse(request, controller, state);
      state.totalBytes = parseContentLength(response.headers.get('content-length'));
      if (!response.body) {
        throw new Error('Resposta de download sem corpo.');
      }

      const reader = response.body.getReader();
      state.cancelReader = () => reader.cancel();
      const handle = await fs.open(partialPath, 'w');
      state.handle = handle;
      const hash = request.checksumSha256 ? crypto.createHash('sha256') : null;
      const startedAt = this.now();
      let lastEmitAt = Number.NEGATIVE_INFINITY;
      let lastEmittedBytes = -1;

      this.logger.info('download.start', {
        url: request.url,
        destination,
        totalBytes: state.totalBytes
      });

      for (;;) {
        throwIfAborted(controller.signal);
        const { done, value } = await this.readChunk(() => reader.read(), controller, state);
        if (done) {
          break;
        }
        if (!(value instanceof Uint8Array)) {
          throw new Error('Chunk de download em formato inesperado.');
        }
        if (value.byteLength === 0) {
          continue;
        }

        await handle.write(value);
        hash?.update(value);
        state.bytesReceived += value.byteLength;

        const now = this.now();
        const finished = state.totalBytes > 0 && state.bytesReceived >= state.totalBytes;
        if (options.onProgress && (finished || now - lastEmitAt >= this.progressIntervalMs)) {
          lastEmitAt = now;
          lastEmittedBytes = state.bytesReceived;
          options.onProgress(createProgressSnapshot(state.bytesReceived, state.totalBytes, now - startedAt));
        }
      }

      throwIfAborted(controller.signal);
      state.cancelReader = null;
      state.handle = null;
      await handle.close();

      if (state.totalBytes > 0 && state.bytesReceived !== state.totalBytes) {
        throw new Error(`Download incompleto: ${state.bytesReceived} de ${state.totalBytes} bytes.`);
      }
      if (hash && request.checksumSha256) {
        const digest = hash.digest('hex');
        if (digest.toLowerCase() !== request.checksumSha256.trim().toLowerCase()) {
          throw new Error('Checksum SHA256 do download nao confere.');
        }
      }

      await fs.rename(partialPath, destination);
      if (options.onProgress && lastEmittedBytes !== state.bytesReceived) {
        options.onProgress(createProgressSnapshot(state.bytesReceived, state.totalBytes, this.now() - startedAt));
      }

      this.logger.info('download.finish', {
        url: request.url,
        destination,
        bytesReceived: state.bytesReceived
      });
      return {
        ok: true,
        filePath: destination,
        bytesReceived: state.bytesReceived,
        totalBytes: state.totalBytes,
        cancelled: false,
        errorMessage: null
      };
    } catch (error) {
      const cancelled = external?.aborted === true && state.timeoutReason === null;
      if (!controller.signal.aborted) {
        controller.abort();
      }
      await this.cleanup(state, partialPath, destination);

      if (cancelled) {
        this.logger.info('download.cancelled', {
          url: request.url,
          bytesReceived: state.bytesReceived,
          totalBytes: state.totalBytes
        });
        return failure(state.bytesReceived, state.totalBytes, true, 'Download cancelado.');
      }

      const reason = state.timeoutReason ?? toErrorMessage(error);
      this.logger.error('download.error', {
        url: request.url,
        bytesReceived: state.bytesReceived,
        totalBytes: state.totalBytes,
        reason
      });
      return failure(state.bytesReceived, state.totalBytes, false, `Falha no download: ${reason}`);
    } finally {
      external?.removeEventListener('abort', forwardAbort);
    }
  }

  private async openResponse(
    request: DownloadRequest,
    controller: AbortController,
    state: TransferState
  ): Promise<Response> {
    const primary = await this.fetchWithTimeout(request.url, '*/*', controller, state);
    if (primary.ok) {
      return primary;
    }

    this.logger.warn('download.http_error', { url: request.url, status: primary.status });
    await this.discardBody(primary);
    if (!request.fallbackUrl) {
      throw new Error(`servidor respondeu HTTP ${primary.status}.`);
    }

    throwIfAborted(controller.signal);
    const fallback = await this.fetchWithTimeout(request.fallbackUrl, 'application/octet-stream', controller, state);
    if (fallback.ok) {
      this.logger.info('download.fallback_used', { url: request.fallbackUrl });
      return fallback;
    }

    await this.discardBody(fallback);
    throw new Error(`servidor respondeu HTTP ${primary.status} e endereco alternativo HTTP ${fallback.status}.`);
  }

  private async fetchWithTimeout(
    url: string,
    accept: string,
    controller: AbortController,
    state: TransferState
  ): Promise<Response> {
    throwIfAborted(controller.signal);
    const headers: Record<string, string> = {
      Accept: accept,
      'User-Agent': this.userAgent
    };
    if (this.authToken) {
      headers.Authorization = `Bearer ${this.authToken}`;
    }

    const timer = setTimeout(() => {
      state.timeoutReason = `servidor nao respondeu em ${this.requestTimeoutMs} ms.`;
      controller.abort();
    }, this.requestTimeoutMs);

    try {
      const fetchFn = this.fetchFn ?? fetch;
      return await fetchFn(url, { headers, signal: controller.signal, redirect: 'follow' });
    } finally {
      clearTimeout(timer);
    }
  }

  private async readChunk<T>(read: () => Promise<T>, controller: AbortController, state: TransferState): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        state.timeoutReason = `nenhum dado recebido em ${this.chunkTimeoutMs} ms.`;
        controller.abort();
        reject(new Error(state.timeoutReason));
      }, this.chunkTimeoutMs);
    });

    try {
      return await Promise.race([read(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async discardBody(response: Response): Promise<void> {
    if (!response.body || response.bodyUsed) {
      return;
    }

    try {
      await response.body.cancel();
    } catch (error) {
      this.logger.debug('download.discard_body_error', { reason: toErrorMessage(error) });
    }
  }

  private async cleanup(state: TransferState, partialPath: string, destination: string): Promise<void> {
    if (state.cancelReader) {
      try {
        await state.cancelReader();
      } catch (error) {
        this.logger.debug('download.cleanup.reader_cancel_error', { reason: toErrorMessage(error) });
      }
      state.cancelReader = null;
    }

    if (state.handle) {
      try {
        await state.handle.close();
      } catch (error) {
        this.logger.debug('download.cleanup.close_error', { reason: toErrorMessage(error) });
      }
      state.handle = null;
    }

    for (const filePath of [partialPath, destination]) {
      try {
        await fs.rm(filePath, { force: true });
      } catch (error) {
        this.logger.warn('download.cleanup.remove_error', { filePath, reason: toErrorMessage(error) });
      }
    }
  }
}

export function parseContentLength(value: string | null): number {
  if (!value || !/^\d+$/.test(value.trim())) {
    return 0;
  }

  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : 0;
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new Error('Download abortado.');
  }
}

function failure(bytesReceived: number, totalBytes: number, cancelled: boolean, errorMessage: string): DownloadResult {
  return {
    ok: false,
    filePath: null,
    bytesReceived,
    totalBytes,
    cancelled,
    errorMessage
  };
}

function normalizeDuration(value: number | undefined, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return Math.trunc(value);
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
