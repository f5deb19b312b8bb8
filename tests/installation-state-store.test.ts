import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger, type LoggerLike } from '@main/services/logging/Logger';
import { InstallationStateStore, formatSortableDate } from '@main/services/state/InstallationStateStore';
import { FileKeyValueStore, MemoryKeyValueStore, type KeyValueStore } from '@main/services/state/KeyValueStore';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('InstallationStateStore', () => {
  it('store vazio significa nao instalado', () => {
    const state = new InstallationStateStore({ store: new MemoryKeyValueStore(), logger: mockLogger() });

    expect(state.isInstalled()).toBe(false);
    expect(state.getInstallationInfo()).toBeNull();
    expect(state.detect()).toEqual({ status: 'not-installed' });
  });

  it('grava e le a instalacao com data ordenavel', () => {
    const store = new MemoryKeyValueStore();
    const state = new InstallationStateStore({
      store,
      logger: mockLogger(),
      now: () => new Date(2024, 0, 5, 9, 3, 7)
    });

    expect(
      state.saveInstallationInfo(' 2.0.0 ', '/srv/loja', {
        siteName: 'loja',
        databaseServer: 'db.local',
        databaseName: 'loja_db'
      })
    ).toBe(true);

    expect(state.isInstalled()).toBe(true);
    expect(state.getInstallationInfo()).toEqual({
      version: '2.0.0',
      installPath: '/srv/loja',
      installDate: '2024-01-05 09:03:07',
      siteName: 'loja',
      databaseServer: 'db.local',
      databaseName: 'loja_db'
    });
    expect(store.get('storefront/InstalledVersion')).toBe('2.0.0');
  });

  it('grava a versao por ultimo', () => {
    const writes: string[] = [];
    const store: KeyValueStore = {
      get: () => null,
      set: (key) => {
        writes.push(key);
      },
      deleteTree: vi.fn()
    };
    const state = new InstallationStateStore({ store, logger: mockLogger(), namespace: 'shop' });

    state.saveInstallationInfo('1.0.0', '/srv/shop');

    expect(writes).toEqual(['shop/InstallPath', 'shop/InstallDate', 'shop/InstalledVersion']);
  });

  it('rejeita versao ou caminho vazios sem tocar o store', () => {
    const store = new MemoryKeyValueStore();
    const state = new InstallationStateStore({ store, logger: mockLogger() });

    expect(state.saveInstallationInfo('  ', '/srv/loja')).toBe(false);
    expect(state.saveInstallationInfo('1.0.0', '')).toBe(false);
    expect(state.isInstalled()).toBe(false);
  });

  it('usa Unknown para campos ausentes de uma instalacao registrada', () => {
    const store = new MemoryKeyValueStore();
    store.set('storefront/InstalledVersion', '1.2.0');
    const state = new InstallationStateStore({ store, logger: mockLogger() });

    expect(state.getInstallationInfo()).toEqual({
      version: '1.2.0',
      installPath: 'Unknown',
      installDate: 'Unknown'
    });
  });

  it('remove a instalacao sem afetar outros namespaces', () => {
    const store = new MemoryKeyValueStore();
    store.set('outro/InstalledVersion', '9.0.0');
    const state = new InstallationStateStore({ store, logger: mockLogger() });
    state.saveInstallationInfo('1.0.0', '/srv/loja');

    expect(state.removeInstallationInfo()).toBe(true);
    expect(state.isInstalled()).toBe(false);
    expect(store.get('outro/InstalledVersion')).toBe('9.0.0');
  });

  it('arquivo corrompido resulta em estado desconhecido, nunca em nao instalado', () => {
    const filePath = path.join(createTempDir(), 'state.json');
    fs.writeFileSync(filePath, '{ corrompido', 'utf-8');
    const logger = mockLogger();
    const state = new InstallationStateStore({ store: new FileKeyValueStore(filePath), logger });

    const detection = state.detect();

    expect(detection.status).toBe('unknown');
    expect(state.isInstalled()).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      'installation_state.read_error',
      expect.objectContaining({ namespace: 'storefront' })
    );
  });

  it('falha de escrita retorna false e registra erro', () => {
    const store: KeyValueStore = {
      get: () => null,
      set: () => {
        throw new Error('EACCES');
      },
      deleteTree: vi.fn()
    };
    const logger = mockLogger();
    const state = new InstallationStateStore({ store, logger });

    expect(state.saveInstallationInfo('1.0.0', '/srv/loja')).toBe(false);
    expect(logger.error).toHaveBeenCalledWith('installation_state.save_error', {
      namespace: 'storefront',
      version: '1.0.0',
      reason: 'EACCES'
    });
  });

  it('nao propaga erro mesmo quando o log tambem falha ao gravar', () => {
    const dir = createTempDir();
    const logger = new Logger(dir, { consoleWrite: vi.fn() });
    fs.mkdirSync(logger.logFilePath);
    const store: KeyValueStore = {
      get: () => {
        throw new Error('EIO');
      },
      set: () => {
        throw new Error('ENOSPC');
      },
      deleteTree: () => {
        throw new Error('ENOSPC');
      }
    };
    const state = new InstallationStateStore({ store, logger });

    expect(state.detect()).toEqual({ status: 'unknown', reason: 'EIO' });
    expect(state.isInstalled()).toBe(false);
    expect(state.saveInstallationInfo('1.0.0', '/srv/loja')).toBe(false);
    expect(state.removeInstallationInfo()).toBe(false);
  });
});

describe('FileKeyValueStore', () => {
  it('persiste entre instancias e le sempre do disco', () => {
    const filePath = path.join(createTempDir(), 'nested', 'state.json');
    const writer = new FileKeyValueStore(filePath);
    const reader = new FileKeyValueStore(filePath);

    expect(reader.get('storefront/InstalledVersion')).toBeNull();
    writer.set('storefront/InstalledVersion', '1.0.0');
    writer.set('storefront/InstallPath', '/srv/loja');
    writer.set('storefrontx/Key', 'fica');

    expect(reader.get('storefront/InstalledVersion')).toBe('1.0.0');

    reader.deleteTree('storefront');
    expect(writer.get('storefront/InstallPath')).toBeNull();
    expect(writer.get('storefrontx/Key')).toBe('fica');
    expect(fs.existsSync(`${filePath}.tmp`)).toBe(false);
  });

  it('lanca erro para conteudo com formato invalido', () => {
    const filePath = path.join(createTempDir(), 'state.json');
    fs.writeFileSync(filePath, JSON.stringify({ entries: { chave: 42 } }), 'utf-8');

    expect(() => new FileKeyValueStore(filePath).get('chave')).toThrow(`Store de estado corrompido em ${filePath}.`);
  });
});

describe('formatSortableDate', () => {
  it('usa zero a esquerda em todos os campos', () => {
    expect(formatSortableDate(new Date(2023, 10, 9, 4, 5, 6))).toBe('2023-11-09 04:05:06');
  });
});

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'storefront-state-'));
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
