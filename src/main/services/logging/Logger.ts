import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

interface LoggerOptions {
  mirrorFilePath?: string | null;
  minLevel?: LogLevel;
  maxBytes?: number;
}

export const DEFAULT_LOG_MAX_BYTES = 2 * 1024 * 1024;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

/**
 * JSON-lines logger for `log.txt`. When the file reaches `maxBytes` it is moved to `log.txt.1` (replacing the
 * previous one) before the next line is written.
 */
export class Logger {
  private readonly mirrorFilePath: string | null;
  private readonly minLevel: LogLevel;
  private readonly maxBytes: number;

  constructor(
    private readonly filePath: string,
    options: LoggerOptions = {}
  ) {
    this.mirrorFilePath = normalizeMirrorPath(options.mirrorFilePath);
    this.minLevel = options.minLevel ?? 'debug';
    this.maxBytes = options.maxBytes ?? DEFAULT_LOG_MAX_BYTES;

    for (const file of [this.filePath, this.mirrorFilePath]) {
      if (file) {
        fs.mkdirSync(path.dirname(file), { recursive: true });
      }
    }
  }

  get path(): string {
    return this.filePath;
  }

  get rotatedPath(): string {
    return `${this.filePath}.1`;
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }

  log(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const entry: LogEntry = { ts: new Date().toISOString(), level, message, meta };
    const line = `${JSON.stringify(entry)}\n`;

    this.rotateIfNeeded();
    fs.appendFileSync(this.filePath, line);

    if (!this.mirrorFilePath) {
      return;
    }
    try {
      fs.appendFileSync(this.mirrorFilePath, line);
    } catch {
      // espelho e opcional
    }
  }

  private rotateIfNeeded(): void {
    const size = fs.existsSync(this.filePath) ? fs.statSync(this.filePath).size : 0;
    if (size < this.maxBytes) {
      return;
    }

    fs.rmSync(this.rotatedPath, { force: true });
    fs.renameSync(this.filePath, this.rotatedPath);
  }
}

function normalizeMirrorPath(value: string | null | undefined): string | null {
  const normalized = typeof value === 'string' ? value.trim() : '';
  return normalized || null;
}
