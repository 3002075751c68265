import type { LatestVersionInfo, UpdateCheckOutcome, VersionNumber } from '@shared/contracts';
import { LatestVersionInfoValidator } from '@main/services/update/LatestVersionInfoValidator';
import type { UpdateCheckWorker } from '@main/services/update/UpdateCheckWorker';

interface HttpUpdateCheckWorkerOptions {
  url: string;
  currentVersion: VersionNumber;
  timeoutMs?: number;
  userAgent?: string;
  validator?: LatestVersionInfoValidator;
}

export class HttpUpdateCheckWorker implements UpdateCheckWorker {
  private readonly url: string;
  private readonly currentVersion: VersionNumber;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly validator: LatestVersionInfoValidator;

  constructor(options: HttpUpdateCheckWorkerOptions) {
    this.url = options.url;
    this.currentVersion = { ...options.currentVersion };
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.userAgent =
      options.userAgent ?? `QuickfillUpdateCheck/${options.currentVersion.major}.${options.currentVersion.minor}`;
    this.validator = options.validator ?? new LatestVersionInfoValidator();
  }

  async run(): Promise<UpdateCheckOutcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.url, {
        signal: controller.signal,
        headers: {
          Accept: 'application/json',
          'User-Agent': this.userAgent
        }
      });

      if (!response.ok) {
        return {
          kind: 'error',
          code: 'http_error',
          message: `Servidor de updates respondeu HTTP ${response.status}.`
        };
      }

      const body = parseJsonSafe(await response.text());
      if (body === null) {
        return {
          kind: 'error',
          code: 'invalid_response',
          message: 'Resposta do servidor de updates nao e um JSON valido.'
        };
      }

      const validated = this.validator.validate(body);
      if (!validated.ok) {
        return {
          kind: 'error',
          code: 'invalid_response',
          message: `Informacoes de versao invalidas: ${validated.error}`
        };
      }

      if (!isNewerThan(validated.versionInfo, this.currentVersion)) {
        return { kind: 'none' };
      }

      return {
        kind: 'available',
        versionInfo: validated.versionInfo
      };
    } catch (error) {
      if (controller.signal.aborted) {
        return {
          kind: 'error',
          code: 'timeout',
          message: `Tempo esgotado ao verificar updates (${this.timeoutMs} ms).`
        };
      }

      const reason = error instanceof Error ? error.message : String(error);
      return {
        kind: 'error',
        code: 'check_failed',
        message: `Falha ao verificar updates: ${reason}`
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function isNewerThan(info: Pick<LatestVersionInfo, 'versionMajor' | 'versionMinor'>, current: VersionNumber): boolean {
  if (info.versionMajor !== current.major) {
    return info.versionMajor > current.major;
  }

  return info.versionMinor > current.minor;
}

function parseJsonSafe(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
