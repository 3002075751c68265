import { EventEmitter } from 'node:events';
import type {
  LatestVersionInfo,
  UpdateCheckCompletion,
  UpdateCheckOutcome,
  UpdateManagerState
} from '@shared/contracts';
import type { Logger } from '@main/services/logging/Logger';
import type { UpdateCheckWorkerFactory } from '@main/services/update/UpdateCheckWorker';

export const LAUNCH_CHECK_DELAY_MS = 1000;
export const UPDATE_CHECK_INTERVAL_MS = 24 * 60 * 60 * 1000;

export interface UpdatePreferences {
  autoCheckForUpdates(): boolean;
  onAutoCheckForUpdatesChanged(listener: (enabled: boolean) => void): () => void;
  lastUpdateCheckAt(): Date | null;
  setLastUpdateCheckAt(date: Date): void;
}

export interface UpdateManagerEvents {
  checkStarted: [];
  checkFinished: [];
  updateAvailable: [versionInfo: LatestVersionInfo];
  noUpdateAvailable: [];
  checkFailed: [message: string];
}

export type UpdateCheckTrigger = 'timer' | 'manual';

type UpdateLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

interface UpdateManagerOptions {
  launchCheckDelayMs?: number;
  checkIntervalMs?: number;
}

/**
 * Schedules update checks and runs them one at a time.
 *
 * The timer is single-shot: it is armed from the auto-check preference (short delay on first use, otherwise
 * whatever remains of the interval since the last check) and re-armed for the full interval after every check,
 * whatever its outcome. Each check runs a fresh worker; its result comes back as an {@link UpdateCheckCompletion}
 * tagged with the id of the check that produced it.
 */
export class UpdateManager {
  private readonly emitter = new EventEmitter();
  private readonly launchCheckDelayMs: number;
  private readonly checkIntervalMs: number;
  private readonly detachPreferenceListener: () => void;
  private timer: NodeJS.Timeout | null = null;
  private nextCheckAt: number | null = null;
  private activeCheckId: number | null = null;
  private lastCheckId = 0;
  private disposed = false;

  constructor(
    private readonly preferences: UpdatePreferences,
    private readonly createWorker: UpdateCheckWorkerFactory,
    private readonly logger: UpdateLogger,
    options?: UpdateManagerOptions
  ) {
    this.launchCheckDelayMs = options?.launchCheckDelayMs ?? LAUNCH_CHECK_DELAY_MS;
    this.checkIntervalMs = options?.checkIntervalMs ?? UPDATE_CHECK_INTERVAL_MS;
    this.detachPreferenceListener = preferences.onAutoCheckForUpdatesChanged((enabled) => {
      this.onAutoCheckPreferenceChanged(enabled);
    });
    this.onAutoCheckPreferenceChanged(preferences.autoCheckForUpdates());
  }

  on<K extends keyof UpdateManagerEvents>(event: K, listener: (...args: UpdateManagerEvents[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  getState(): UpdateManagerState {
    const lastCheckAt = this.preferences.lastUpdateCheckAt();
    return {
      phase: this.activeCheckId !== null ? 'checking' : this.timer ? 'scheduled' : 'disabled',
      nextCheckAt: this.nextCheckAt !== null ? new Date(this.nextCheckAt).toISOString() : null,
      lastCheckAt: lastCheckAt ? lastCheckAt.toISOString() : null,
      activeCheckId: this.activeCheckId
    };
  }

  /**
   * Starts a check right away, dropping any pending timer. Returns false when a check is already running or the
   * manager has been disposed.
   */
  triggerImmediateCheck(): boolean {
    return this.checkForUpdate('manual');
  }

  onAutoCheckPreferenceChanged(enabled: boolean): void {
    if (this.disposed) {
      return;
    }

    this.stopTimer();
    if (!enabled) {
      this.logger.info('update.schedule.disarmed', { checking: this.activeCheckId !== null });
      return;
    }

    if (this.activeCheckId !== null) {
      // o check em andamento rearma o timer quando terminar
      return;
    }

    this.startTimer(computeNextCheckDelay(this.preferences.lastUpdateCheckAt(), Date.now(), {
      launchCheckDelayMs: this.launchCheckDelayMs,
      checkIntervalMs: this.checkIntervalMs
    }));
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    this.stopTimer();
    this.detachPreferenceListener();
    this.emitter.removeAllListeners();
  }

  private checkForUpdate(trigger: UpdateCheckTrigger): boolean {
    if (this.disposed) {
      return false;
    }

    if (this.activeCheckId !== null) {
      this.logger.info('update.check.skipped_in_progress', {
        trigger,
        activeCheckId: this.activeCheckId
      });
      return false;
    }

    this.stopTimer();
    const checkId = ++this.lastCheckId;
    this.activeCheckId = checkId;
    this.logger.info('update.check.start', { checkId, trigger });
    this.emit('checkStarted');

    this.runWorker(checkId)
      .then((completion) => {
        this.onWorkerFinished(completion);
      })
      .catch((error: unknown) => {
        this.logger.error('update.check.internal_error', {
          checkId,
          reason: describeError(error)
        });
      });

    return true;
  }

  private async runWorker(checkId: number): Promise<UpdateCheckCompletion> {
    let outcome: UpdateCheckOutcome;
    try {
      const worker = this.createWorker();
      outcome = await worker.run();
    } catch (error) {
      outcome = {
        kind: 'error',
        code: 'internal',
        message: `Falha interna ao verificar updates: ${describeError(error)}`
      };
    }

    return {
      checkId,
      outcome,
      finishedAt: new Date().toISOString()
    };
  }

  private onWorkerFinished(completion: UpdateCheckCompletion): void {
    if (completion.checkId !== this.activeCheckId) {
      this.logger.error('update.check.internal_error', {
        reason: 'completion_mismatch',
        checkId: completion.checkId,
        activeCheckId: this.activeCheckId
      });
      if (this.activeCheckId === null && !this.timer && !this.disposed && this.preferences.autoCheckForUpdates()) {
        this.startTimer(this.checkIntervalMs);
      }
      return;
    }

    this.activeCheckId = null;
    const outcome = this.validateOutcome(completion);

    switch (outcome.kind) {
      case 'available':
        this.logger.info('update.check.available', {
          checkId: completion.checkId,
          version: `${outcome.versionInfo.versionMajor}.${outcome.versionInfo.versionMinor}`,
          downloadUrl: outcome.versionInfo.downloadUrl
        });
        this.emit('updateAvailable', outcome.versionInfo);
        break;
      case 'none':
        this.emit('noUpdateAvailable');
        break;
      case 'error':
        this.logger.warn('update.check.error', {
          checkId: completion.checkId,
          code: outcome.code,
          reason: outcome.message
        });
        this.emit('checkFailed', outcome.message);
        break;
    }

    this.emit('checkFinished');
    this.logger.info('update.check.finish', {
      checkId: completion.checkId,
      outcome: outcome.kind
    });

    try {
      this.preferences.setLastUpdateCheckAt(new Date(completion.finishedAt));
    } catch (error) {
      this.logger.error('update.check.persist_failed', {
        checkId: completion.checkId,
        reason: describeError(error)
      });
    }

    if (!this.disposed && this.preferences.autoCheckForUpdates()) {
      this.startTimer(this.checkIntervalMs);
    }
  }

  private validateOutcome(completion: UpdateCheckCompletion): UpdateCheckOutcome {
    const { outcome } = completion;
    if (outcome.kind === 'available' && !outcome.versionInfo) {
      this.logger.error('update.check.internal_error', {
        reason: 'missing_version_info',
        checkId: completion.checkId
      });
      return {
        kind: 'error',
        code: 'internal',
        message: 'Falha interna ao verificar updates: informacoes da nova versao ausentes.'
      };
    }

    return outcome;
  }

  private startTimer(delayMs: number): void {
    this.stopTimer();
    this.nextCheckAt = Date.now() + delayMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.nextCheckAt = null;
      this.checkForUpdate('timer');
    }, delayMs);
    this.logger.debug('update.schedule.armed', {
      delayMs,
      nextCheckAt: new Date(this.nextCheckAt).toISOString()
    });
  }

  private stopTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextCheckAt = null;
  }

  private emit<K extends keyof UpdateManagerEvents>(event: K, ...args: UpdateManagerEvents[K]): void {
    try {
      this.emitter.emit(event, ...args);
    } catch (error) {
      this.logger.error('update.listener.error', {
        event,
        reason: describeError(error)
      });
    }
  }
}

export function computeNextCheckDelay(
  lastCheckAt: Date | null,
  now: number,
  options: { launchCheckDelayMs: number; checkIntervalMs: number } = {
    launchCheckDelayMs: LAUNCH_CHECK_DELAY_MS,
    checkIntervalMs: UPDATE_CHECK_INTERVAL_MS
  }
): number {
  if (!lastCheckAt || !Number.isFinite(lastCheckAt.getTime())) {
    return options.launchCheckDelayMs;
  }

  // data futura (relogio ajustado) nao adia alem de um intervalo completo
  const remaining = Math.min(options.checkIntervalMs, lastCheckAt.getTime() + options.checkIntervalMs - now);
  return Math.max(options.launchCheckDelayMs, remaining);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
