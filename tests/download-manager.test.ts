import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { DownloadProgress } from '@shared/contracts';
import type { LoggerLike } from '@main/services/logging/Logger';
import { DownloadManager, parseContentLength } from '@main/services/download/DownloadManager';

const tempDirs: string[] = [];

afterEach(() => {
  vi.restoreAllMocks();

  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('DownloadManager', () => {
  it('baixa em chunks, reporta progresso e move o arquivo parcial para o destino', async () => {
    const dir = createTempDir();
    const destination = path.join(dir, '2.0.0', 'App-2.0.0.zip');
    const fetchFn = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      streamResponse(1_000_000, 100_000)
    );
    const progress: DownloadProgress[] = [];

    const manager = new DownloadManager({ logger: mockLogger(), progressIntervalMs: 0, fetchFn });
    const result = await manager.download(
      { url: 'https://example.invalid/App-2.0.0.zip', destinationPath: destination },
      { onProgress: (snapshot) => progress.push(snapshot) }
    );

    expect(result).toEqual({
      ok: true,
      filePath: destination,
      bytesReceived: 1_000_000,
      totalBytes: 1_000_000,
      cancelled: false,
      errorMessage: null
    });
    expect(fs.statSync(destination).size).toBe(1_000_000);
    expect(fs.existsSync(`${destination}.part`)).toBe(false);
    expect(progress.map((snapshot) => snapshot.percentComplete)).toEqual([10, 20, 30, 40, 50, 60, 70, 80, 90, 100]);
    expect(fetchFn).toHaveBeenCalledWith(
      'https://example.invalid/App-2.0.0.zip',
      expect.objectContaining({ headers: { Accept: '*/*', 'User-Agent': 'StorefrontUpgrader/0.1' } })
    );
  });

  it('limita eventos de progresso pelo intervalo e sempre emite o final', async () => {
    const dir = createTempDir();
    const destination = path.join(dir, 'pkg.zip');
    let clock = 0;
    const progress: number[] = [];

    const manager = new DownloadManager({
      logger: mockLogger(),
      progressIntervalMs: 1_000,
      now: () => {
        clock += 100;
        return clock;
      },
      fetchFn: async () => streamResponse(500, 100)
    });
    const result = await manager.download(
      { url: 'https://example.invalid/pkg.zip', destinationPath: destination },
      { onProgress: (snapshot) => progress.push(snapshot.percentComplete) }
    );

    expect(result.ok).toBe(true);
    expect(progress).toEqual([20, 100]);
  });

  it('cancelado em 40% remove arquivo parcial e destino', async () => {
    const dir = createTempDir();
    const destination = path.join(dir, 'App-2.0.0.zip');
    const controller = new AbortController();
    const percents: number[] = [];

    const manager = new DownloadManager({
      logger: mockLogger(),
      progressIntervalMs: 0,
      fetchFn: async () => streamResponse(1_000_000, 100_000)
    });
    const result = await manager.download(
      { url: 'https://example.invalid/App-2.0.0.zip', destinationPath: destination },
      {
        signal: controller.signal,
        onProgress: (snapshot) => {
          percents.push(snapshot.percentComplete);
          if (snapshot.percentComplete >= 40) {
            controller.abort();
          }
        }
      }
    );

    expect(result).toEqual({
      ok: false,
      filePath: null,
      bytesReceived: 400_000,
      totalBytes: 1_000_000,
      cancelled: true,
      errorMessage: 'Download cancelado.'
    });
    expect(percents).toEqual([10, 20, 30, 40]);
    expect(fs.existsSync(destination)).toBe(false);
    expect(fs.existsSync(`${destination}.part`)).toBe(false);
  });

  it('nao inicia quando o sinal ja esta abortado', async () => {
    const dir = createTempDir();
    const fetchFn = vi.fn(async () => streamResponse(10, 10));
    const controller = new AbortController();
    controller.abort();

    const manager = new DownloadManager({ logger: mockLogger(), fetchFn });
    const result = await manager.download(
      { url: 'https://example.invalid/pkg.zip', destinationPath: path.join(dir, 'pkg.zip') },
      { signal: controller.signal }
    );

    expect(result.cancelled).toBe(true);
    expect(result.errorMessage).toBe('Download cancelado antes de iniciar.');
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('usa endereco alternativo quando o principal responde erro', async () => {
    const dir = createTempDir();
    const destination = path.join(dir, 'pkg.zip');
    const fetchFn = vi.fn(async (url: string | URL | Request, _init?: RequestInit) =>
      String(url).endsWith('/assets/55') ? streamResponse(300, 100) : new Response('missing', { status: 404 })
    );
    const logger = mockLogger();

    const manager = new DownloadManager({ logger, fetchFn });
    const result = await manager.download({
      url: 'https://example.invalid/pkg.zip',
      destinationPath: destination,
      fallbackUrl: 'https://api.example.invalid/repos/acme/shop/releases/assets/55'
    });

    expect(result.ok).toBe(true);
    expect(fs.statSync(destination).size).toBe(300);
    expect(fetchFn).toHaveBeenLastCalledWith(
      'https://api.example.invalid/repos/acme/shop/releases/assets/55',
      expect.objectContaining({
        headers: { Accept: 'application/octet-stream', 'User-Agent': 'StorefrontUpgrader/0.1' }
      })
    );
    expect(logger.info).toHaveBeenCalledWith('download.fallback_used', {
      url: 'https://api.example.invalid/repos/acme/shop/releases/assets/55'
    });
  });

  it('falha com status HTTP quando nao ha alternativa', async () => {
    const dir = createTempDir();
    const destination = path.join(dir, 'pkg.zip');
    const manager = new DownloadManager({
      logger: mockLogger(),
      fetchFn: async () => new Response('missing', { status: 404 })
    });

    const result = await manager.download({ url: 'https://example.invalid/pkg.zip', destinationPath: destination });

    expect(result).toEqual({
      ok: false,
      filePath: null,
      bytesReceived: 0,
      totalBytes: 0,
      cancelled: false,
      errorMessage: 'Falha no download: servidor respondeu HTTP 404.'
    });
    expect(fs.existsSync(destination)).toBe(false);
  });

  it('verifica checksum SHA256 quando informado', async () => {
    const dir = createTempDir();
    const payload = new Uint8Array(256).fill(7);
    const checksum = crypto.createHash('sha256').update(payload).digest('hex');
    const manager = new DownloadManager({ logger: mockLogger(), fetchFn: async () => streamResponse(256, 64) });

    const valid = await manager.download({
      url: 'https://example.invalid/pkg.zip',
      destinationPath: path.join(dir, 'valid.zip'),
      checksumSha256: checksum.toUpperCase()
    });
    expect(valid.ok).toBe(true);

    const invalid = await manager.download({
      url: 'https://example.invalid/pkg.zip',
      destinationPath: path.join(dir, 'invalid.zip'),
      checksumSha256: '0'.repeat(64)
    });
    expect(invalid.errorMessage).toBe('Falha no download: Checksum SHA256 do download nao confere.');
    expect(fs.existsSync(path.join(dir, 'invalid.zip'))).toBe(false);
    expect(fs.existsSync(path.join(dir, 'invalid.zip.part'))).toBe(false);
  });

  it('rejeita corpo menor que o Content-Length anunciado', async () => {
    const dir = createTempDir();
    const manager = new DownloadManager({
      logger: mockLogger(),
      fetchFn: async () => streamResponse(500, 100, { 'content-length': '1000' })
    });

    const result = await manager.download({
      url: 'https://example.invalid/pkg.zip',
      destinationPath: path.join(dir, 'pkg.zip')
    });

    expect(result.errorMessage).toBe('Falha no download: Download incompleto: 500 de 1000 bytes.');
    expect(result.cancelled).toBe(false);
  });

  it('expira quando nenhum chunk chega dentro do limite', async () => {
    const dir = createTempDir();
    const destination = path.join(dir, 'pkg.zip');
    const manager = new DownloadManager({
      logger: mockLogger(),
      chunkTimeoutMs: 30,
      fetchFn: async () => stalledResponse(100, 1_000)
    });

    const result = await manager.download({ url: 'https://example.invalid/pkg.zip', destinationPath: destination });

    expect(result).toEqual({
      ok: false,
      filePath: null,
      bytesReceived: 100,
      totalBytes: 1_000,
      cancelled: false,
      errorMessage: 'Falha no download: nenhum dado recebido em 30 ms.'
    });
    expect(fs.existsSync(`${destination}.part`)).toBe(false);
  });

  it('sobrescreve arquivo existente no destino', async () => {
    const dir = createTempDir();
    const destination = path.join(dir, 'pkg.zip');
    fs.writeFileSync(destination, 'versao antiga e maior do que o novo pacote');

    const manager = new DownloadManager({ logger: mockLogger(), fetchFn: async () => streamResponse(10, 10) });
    const result = await manager.download({ url: 'https://example.invalid/pkg.zip', destinationPath: destination });

    expect(result.ok).toBe(true);
    expect(fs.statSync(destination).size).toBe(10);
  });
});

describe('parseContentLength', () => {
  it('aceita apenas inteiros nao negativos', () => {
    expect(parseContentLength('1000000')).toBe(1_000_000);
    expect(parseContentLength(' 42 ')).toBe(42);
    expect(parseContentLength(null)).toBe(0);
    expect(parseContentLength('-1')).toBe(0);
    expect(parseContentLength('12abc')).toBe(0);
  });
});

function streamResponse(totalBytes: number, chunkSize: number, headers?: Record<string, string>): Response {
  let sent = 0;
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (sent >= totalBytes) {
        controller.close();
        return;
      }
      const size = Math.min(chunkSize, totalBytes - sent);
      sent += size;
      controller.enqueue(new Uint8Array(size).fill(7));
    }
  });

  return new Response(body, {
    status: 200,
    headers: headers ?? { 'content-length': String(totalBytes) }
  });
}

function stalledResponse(firstChunkBytes: number, announcedBytes: number): Response {
  let sent = false;
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (sent) {
        return new Promise<void>(() => undefined);
      }
      sent = true;
      controller.enqueue(new Uint8Array(firstChunkBytes).fill(1));
      return undefined;
    }
  });

  return new Response(body, { status: 200, headers: { 'content-length': String(announcedBytes) } });
}

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'storefront-download-'));
  tempDirs.push(dir);
  return dir;
}

function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  } satisfies LoggerLike;
}
