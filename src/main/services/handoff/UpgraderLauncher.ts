import path from 'node:path';
import { spawn } from 'node:child_process';
import type { ExistingInstallation } from '@shared/contracts';
import type { LoggerLike } from '@main/services/logging/Logger';
import { encodeHandoff, formatCommandLine, type HandoffExtras } from '@main/services/handoff/HandoffProtocol';

export interface UpgraderCommand {
  executable: string;
  /** Arguments placed before the handoff tokens, e.g. the script path when the executable is node. */
  args: string[];
}

export interface UpgraderLaunchResult {
  ok: boolean;
  pid: number | null;
  errorMessage: string | null;
}

interface UpgraderLauncherOptions {
  logger: LoggerLike;
  command: UpgraderCommand;
  spawnFn?: typeof spawn;
}

export class UpgraderLauncher {
  private readonly logger: LoggerLike;
  private readonly command: UpgraderCommand;
  private readonly spawnFn: typeof spawn;

  constructor(options: UpgraderLauncherOptions) {
    this.logger = options.logger;
    this.command = options.command;
    this.spawnFn = options.spawnFn ?? spawn;
  }

  launch(installation: ExistingInstallation, extras: HandoffExtras = {}): Promise<UpgraderLaunchResult> {
    const tokens = [...this.command.args, ...encodeHandoff(installation, extras)];
    this.logger.info('handoff.launch.start', {
      executable: this.command.executable,
      commandLine: formatCommandLine(tokens)
    });

    return new Promise<UpgraderLaunchResult>((resolve) => {
      try {
        const child = this.spawnFn(this.command.executable, tokens, {
          cwd: path.dirname(this.command.executable),
          detached: true,
          stdio: 'ignore',
          env: {
            ...process.env
          }
        });
        child.unref();
        observeChildSpawn(
          child,
          () => {
            this.logger.info('handoff.launch.spawned', {
              executable: this.command.executable,
              pid: child.pid ?? null
            });
            resolve({ ok: true, pid: child.pid ?? null, errorMessage: null });
          },
          (error) => {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.error('handoff.launch.error', { executable: this.command.executable, reason });
            resolve({ ok: false, pid: null, errorMessage: `Falha ao iniciar o upgrader: ${reason}` });
          }
        );
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.error('handoff.launch.error', { executable: this.command.executable, reason });
        resolve({ ok: false, pid: null, errorMessage: `Falha ao iniciar o upgrader: ${reason}` });
      }
    });
  }
}

function observeChildSpawn(
  child: {
    once?: (event: 'spawn' | 'error', listener: (...args: unknown[]) => void) => unknown;
  },
  onSpawn: () => void,
  onError: (error: unknown) => void
): void {
  if (typeof child.once !== 'function') {
    onSpawn();
    return;
  }

  let settled = false;
  child.once('error', (error) => {
    if (settled) {
      return;
    }
    settled = true;
    onError(error);
  });
  child.once('spawn', () => {
    if (settled) {
      return;
    }
    settled = true;
    onSpawn();
  });
}
