import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

export type LoggerLike = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

interface LoggerOptions {
  mirrorFilePath?: string | null;
  fileName?: string;
  consoleLevel?: LogLevel | null;
  consoleWrite?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  private readonly filePath: string;
  private mirrorFilePath: string | null;
  private readonly consoleLevel: LogLevel | null;
  private readonly consoleWrite: (line: string) => void;
  private readonly maxBytes = 2 * 1024 * 1024;
  private fileWriteFailed = false;

  constructor(baseDir: string, options?: LoggerOptions) {
    const logDir = path.join(baseDir, 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    this.filePath = path.join(logDir, options?.fileName ?? 'storefront-upgrade.log');
    this.mirrorFilePath = normalizeMirrorPath(options?.mirrorFilePath);
    this.consoleLevel = options?.consoleLevel ?? null;
    this.consoleWrite = options?.consoleWrite ?? ((line) => void process.stderr.write(`${line}\n`));
    if (this.mirrorFilePath) {
      fs.mkdirSync(path.dirname(this.mirrorFilePath), { recursive: true });
    }
  }

  get logFilePath(): string {
    return this.filePath;
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    const entry: LogEntry = { ts: new Date().toISOString(), level, message, meta };
    const line = JSON.stringify(entry);

    this.appendToFile(line);
    if (this.mirrorFilePath) {
      try {
        fs.appendFileSync(this.mirrorFilePath, `${line}\n`);
      } catch (error) {
        // espelho de debug e opcional: desliga e registra no arquivo principal
        const mirrorFilePath = this.mirrorFilePath;
        this.mirrorFilePath = null;
        this.appendToFile(
          JSON.stringify({
            ts: new Date().toISOString(),
            level: 'warn',
            message: 'logger.mirror_disabled',
            meta: { mirrorFilePath, reason: toErrorMessage(error) }
          })
        );
      }
    }

    if (this.consoleLevel && LEVEL_ORDER[level] >= LEVEL_ORDER[this.consoleLevel]) {
      this.consoleWrite(formatConsoleLine(level, message, meta));
    }
  }

  // Falha de escrita nunca propaga para quem registrou; avisa no console uma vez por falha.
  private appendToFile(line: string): void {
    try {
      this.rotateIfNeeded();
      fs.appendFileSync(this.filePath, `${line}\n`);
      this.fileWriteFailed = false;
    } catch (error) {
      if (this.fileWriteFailed) {
        return;
      }
      this.fileWriteFailed = true;
      this.consoleWrite(
        formatConsoleLine('warn', 'logger.file_write_failed', { filePath: this.filePath, reason: toErrorMessage(error) })
      );
    }
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    const stats = fs.statSync(this.filePath);
    if (stats.size < this.maxBytes) {
      return;
    }

    const rotated = `${this.filePath}.1`;
    if (fs.existsSync(rotated)) {
      fs.rmSync(rotated, { force: true });
    }
    fs.renameSync(this.filePath, rotated);
  }
}

function formatConsoleLine(level: LogLevel, message: string, meta: unknown): string {
  const prefix = `[${level}] ${message}`;
  return meta === undefined ? prefix : `${prefix} ${JSON.stringify(meta)}`;
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function normalizeMirrorPath(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return normalized ? normalized : null;
}
