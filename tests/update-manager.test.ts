import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { LatestVersionInfo, UpdateCheckOutcome } from '@shared/contracts';
import { PreferencesStore } from '@main/services/config/PreferencesStore';
import {
  computeNextCheckDelay,
  LAUNCH_CHECK_DELAY_MS,
  UPDATE_CHECK_INTERVAL_MS,
  UpdateManager,
  type UpdateManagerEvents
} from '@main/services/update/UpdateManager';

const NOW = new Date('2026-03-10T12:00:00.000Z');
const HOUR_MS = 60 * 60 * 1000;

const tempDirs: string[] = [];
const managers: UpdateManager[] = [];

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(NOW);
});

afterEach(() => {
  for (const manager of managers.splice(0)) {
    manager.dispose();
  }
  vi.useRealTimers();

  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('computeNextCheckDelay', () => {
  it('usa o atraso curto quando nunca houve verificacao', () => {
    expect(computeNextCheckDelay(null, NOW.getTime())).toBe(LAUNCH_CHECK_DELAY_MS);
  });

  it('espera o restante do intervalo desde a ultima verificacao', () => {
    const lastCheck = new Date(NOW.getTime() - HOUR_MS);
    expect(computeNextCheckDelay(lastCheck, NOW.getTime())).toBe(23 * HOUR_MS);
  });

  it('nunca espera menos que o atraso curto', () => {
    const almostDue = new Date(NOW.getTime() - UPDATE_CHECK_INTERVAL_MS + 500);
    expect(computeNextCheckDelay(almostDue, NOW.getTime())).toBe(LAUNCH_CHECK_DELAY_MS);

    const overdue = new Date(NOW.getTime() - 25 * HOUR_MS);
    expect(computeNextCheckDelay(overdue, NOW.getTime())).toBe(LAUNCH_CHECK_DELAY_MS);
  });

  it('limita a espera a um intervalo completo quando a ultima verificacao esta no futuro', () => {
    const future = new Date(NOW.getTime() + 30 * 24 * HOUR_MS);
    expect(computeNextCheckDelay(future, NOW.getTime())).toBe(UPDATE_CHECK_INTERVAL_MS);
  });
});

describe('UpdateManager', () => {
  it('arma o timer com atraso curto no primeiro uso', () => {
    const { manager } = createManager({});

    expect(manager.getState()).toEqual({
      phase: 'scheduled',
      nextCheckAt: '2026-03-10T12:00:01.000Z',
      lastCheckAt: null,
      activeCheckId: null
    });
  });

  it('agenda a proxima verificacao 24h apos a ultima', () => {
    const { manager } = createManager({
      lastCheckAt: new Date('2026-03-10T10:00:00.000Z')
    });

    expect(manager.getState().phase).toBe('scheduled');
    expect(manager.getState().nextCheckAt).toBe('2026-03-11T10:00:00.000Z');
  });

  it('verifica quase imediatamente quando a ultima verificacao tem mais de 24h', async () => {
    const { manager, createWorker } = createManager({
      lastCheckAt: new Date(NOW.getTime() - 25 * HOUR_MS)
    });

    expect(manager.getState().nextCheckAt).toBe('2026-03-10T12:00:01.000Z');

    await vi.advanceTimersByTimeAsync(999);
    expect(createWorker).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await flushMicrotasks();
    expect(createWorker).toHaveBeenCalledTimes(1);
  });

  it('agenda no maximo 24h quando a data gravada esta no futuro', async () => {
    const { manager, createWorker } = createManager({
      lastCheckAt: new Date(NOW.getTime() + 30 * 24 * HOUR_MS)
    });

    expect(manager.getState().nextCheckAt).toBe('2026-03-11T12:00:00.000Z');

    await vi.advanceTimersByTimeAsync(HOUR_MS);
    expect(createWorker).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(23 * HOUR_MS);
    await flushMicrotasks();
    expect(createWorker).toHaveBeenCalledTimes(1);
  });

  it('habilita, verifica sem update e rearma para o intervalo completo', async () => {
    const { manager, preferences, createWorker, events } = createManager({ enabled: false });
    expect(manager.getState().phase).toBe('disabled');
    expect(manager.getState().nextCheckAt).toBeNull();

    preferences.setAutoCheckForUpdates(true);
    expect(manager.getState().phase).toBe('scheduled');
    expect(manager.getState().nextCheckAt).toBe('2026-03-10T12:00:01.000Z');

    await vi.advanceTimersByTimeAsync(LAUNCH_CHECK_DELAY_MS);
    await flushMicrotasks();

    expect(createWorker).toHaveBeenCalledTimes(1);
    expect(events).toEqual(['checkStarted', 'noUpdateAvailable', 'checkFinished']);
    expect(preferences.get().lastUpdateCheckAt).toBe('2026-03-10T12:00:01.000Z');
    expect(manager.getState()).toEqual({
      phase: 'scheduled',
      nextCheckAt: '2026-03-11T12:00:01.000Z',
      lastCheckAt: '2026-03-10T12:00:01.000Z',
      activeCheckId: null
    });
  });

  it('mantem o timer armado somente quando o ultimo toggle habilitou', () => {
    const { manager, preferences } = createManager({});

    const toggles = [false, true, true, false, false, true, false];
    for (const enabled of toggles) {
      preferences.setAutoCheckForUpdates(enabled);
      expect(manager.getState().phase).toBe(enabled ? 'scheduled' : 'disabled');
    }
  });

  it('registra o desarme do timer apenas quando a verificacao automatica e desligada', () => {
    const { manager, preferences, logger } = createManager({});

    preferences.setAutoCheckForUpdates(false);
    expect(logger.info).toHaveBeenCalledWith('update.schedule.disarmed', { checking: false });

    manager.dispose();
    preferences.setAutoCheckForUpdates(true);
    preferences.setAutoCheckForUpdates(false);

    const disarmed = logger.info.mock.calls.filter(([message]) => message === 'update.schedule.disarmed');
    expect(disarmed).toHaveLength(1);
  });

  it('repassa a versao disponivel e rearma por 24h', async () => {
    const info = buildVersionInfo(2, 3);
    const { manager, events, availableInfos } = createManager({
      outcomes: [{ kind: 'available', versionInfo: info }]
    });

    await vi.advanceTimersByTimeAsync(LAUNCH_CHECK_DELAY_MS);
    await flushMicrotasks();

    expect(events).toEqual(['checkStarted', 'updateAvailable', 'checkFinished']);
    expect(availableInfos).toEqual([info]);
    expect(manager.getState().nextCheckAt).toBe('2026-03-11T12:00:01.000Z');
  });

  it('trata erro do worker como falha de verificacao sem retry antecipado', async () => {
    const { manager, events, failures, logger, preferences } = createManager({
      outcomes: [{ kind: 'error', code: 'http_error', message: 'Servidor de updates respondeu HTTP 503.' }]
    });

    await vi.advanceTimersByTimeAsync(LAUNCH_CHECK_DELAY_MS);
    await flushMicrotasks();

    expect(events).toEqual(['checkStarted', 'checkFailed', 'checkFinished']);
    expect(failures).toEqual(['Servidor de updates respondeu HTTP 503.']);
    expect(preferences.get().lastUpdateCheckAt).toBe('2026-03-10T12:00:01.000Z');
    expect(manager.getState().nextCheckAt).toBe('2026-03-11T12:00:01.000Z');
    expect(logger.warn).toHaveBeenCalledWith(
      'update.check.error',
      expect.objectContaining({
        code: 'http_error',
        reason: 'Servidor de updates respondeu HTTP 503.'
      })
    );
  });

  it('verificacao manual desarma o timer e inicia na hora', async () => {
    const { manager, createWorker, events } = createManager({
      lastCheckAt: new Date('2026-03-10T10:00:00.000Z')
    });
    expect(manager.getState().phase).toBe('scheduled');

    expect(manager.triggerImmediateCheck()).toBe(true);
    expect(createWorker).toHaveBeenCalledTimes(1);
    expect(manager.getState().phase).toBe('checking');
    expect(manager.getState().nextCheckAt).toBeNull();
    expect(events).toEqual(['checkStarted']);

    await flushMicrotasks();
    expect(events).toEqual(['checkStarted', 'noUpdateAvailable', 'checkFinished']);
    expect(manager.getState().nextCheckAt).toBe('2026-03-11T12:00:00.000Z');
  });

  it('ignora verificacao manual enquanto outra esta em andamento', async () => {
    const pending = deferred<UpdateCheckOutcome>();
    const { manager, createWorker, logger, events } = createManager({
      workerRun: () => pending.promise
    });

    expect(manager.triggerImmediateCheck()).toBe(true);
    expect(manager.triggerImmediateCheck()).toBe(false);
    expect(createWorker).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith(
      'update.check.skipped_in_progress',
      expect.objectContaining({ trigger: 'manual', activeCheckId: 1 })
    );

    pending.resolve({ kind: 'none' });
    await flushMicrotasks();

    expect(events).toEqual(['checkStarted', 'noUpdateAvailable', 'checkFinished']);
    expect(manager.getState().phase).toBe('scheduled');
  });

  it('nao rearma quando a verificacao automatica e desligada durante o check', async () => {
    const pending = deferred<UpdateCheckOutcome>();
    const { manager, preferences } = createManager({
      workerRun: () => pending.promise
    });

    manager.triggerImmediateCheck();
    preferences.setAutoCheckForUpdates(false);
    expect(manager.getState().phase).toBe('checking');

    pending.resolve({ kind: 'none' });
    await flushMicrotasks();

    expect(preferences.get().lastUpdateCheckAt).toBe('2026-03-10T12:00:00.000Z');
    expect(manager.getState().phase).toBe('disabled');
    expect(manager.getState().nextCheckAt).toBeNull();
  });

  it('religar durante o check deixa o rearme para o fim da verificacao', async () => {
    const pending = deferred<UpdateCheckOutcome>();
    const { manager, preferences } = createManager({
      enabled: false,
      workerRun: () => pending.promise
    });

    manager.triggerImmediateCheck();
    preferences.setAutoCheckForUpdates(true);
    expect(manager.getState().phase).toBe('checking');
    expect(manager.getState().nextCheckAt).toBeNull();

    vi.setSystemTime(new Date('2026-03-10T12:00:05.000Z'));
    pending.resolve({ kind: 'none' });
    await flushMicrotasks();

    expect(manager.getState().nextCheckAt).toBe('2026-03-11T12:00:05.000Z');
  });

  it('converte rejeicao do worker em falha interna', async () => {
    const { manager, failures, events } = createManager({
      workerRun: async () => {
        throw new Error('boom');
      }
    });

    manager.triggerImmediateCheck();
    await flushMicrotasks();

    expect(events).toEqual(['checkStarted', 'checkFailed', 'checkFinished']);
    expect(failures).toEqual(['Falha interna ao verificar updates: boom']);
    expect(manager.getState().phase).toBe('scheduled');
  });

  it('rejeita resultado disponivel sem informacoes de versao', async () => {
    const { manager, failures, logger } = createManager({
      outcomes: [{ kind: 'available' } as never]
    });

    manager.triggerImmediateCheck();
    await flushMicrotasks();

    expect(failures).toEqual(['Falha interna ao verificar updates: informacoes da nova versao ausentes.']);
    expect(logger.error).toHaveBeenCalledWith(
      'update.check.internal_error',
      expect.objectContaining({ reason: 'missing_version_info', checkId: 1 })
    );
  });

  it('continua agendando quando um listener lanca erro', async () => {
    const { manager, logger } = createManager({});
    manager.on('noUpdateAvailable', () => {
      throw new Error('listener quebrado');
    });

    manager.triggerImmediateCheck();
    await flushMicrotasks();

    expect(logger.error).toHaveBeenCalledWith(
      'update.listener.error',
      expect.objectContaining({ event: 'noUpdateAvailable', reason: 'listener quebrado' })
    );
    expect(manager.getState().nextCheckAt).toBe('2026-03-11T12:00:00.000Z');
  });

  it('para de agendar e ignora gatilhos apos dispose', async () => {
    const { manager, preferences, createWorker } = createManager({});

    manager.dispose();
    expect(manager.getState().phase).toBe('disabled');
    expect(manager.triggerImmediateCheck()).toBe(false);

    preferences.setAutoCheckForUpdates(false);
    preferences.setAutoCheckForUpdates(true);
    await vi.advanceTimersByTimeAsync(UPDATE_CHECK_INTERVAL_MS);

    expect(createWorker).not.toHaveBeenCalled();
    expect(manager.getState().phase).toBe('disabled');
  });

  it('permite cancelar a inscricao em notificacoes', async () => {
    const { manager } = createManager({});
    const listener = vi.fn();
    const unsubscribe = manager.on('checkFinished', listener);
    unsubscribe();

    manager.triggerImmediateCheck();
    await flushMicrotasks();

    expect(listener).not.toHaveBeenCalled();
  });
});

function createManager(options: {
  enabled?: boolean;
  lastCheckAt?: Date;
  outcomes?: UpdateCheckOutcome[];
  workerRun?: () => Promise<UpdateCheckOutcome>;
}) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'quickfill-update-manager-'));
  tempDirs.push(dir);

  const preferences = new PreferencesStore(path.join(dir, 'Settings.json'));
  if (options.enabled === false) {
    preferences.setAutoCheckForUpdates(false);
  }
  if (options.lastCheckAt) {
    preferences.setLastUpdateCheckAt(options.lastCheckAt);
  }

  const queue = (options.outcomes ?? []).slice();
  const createWorker = vi.fn(() => ({
    run: options.workerRun ?? (async (): Promise<UpdateCheckOutcome> => queue.shift() ?? { kind: 'none' })
  }));

  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };

  const manager = new UpdateManager(preferences, createWorker, logger);
  managers.push(manager);

  const events: Array<keyof UpdateManagerEvents> = [];
  const availableInfos: LatestVersionInfo[] = [];
  const failures: string[] = [];
  manager.on('checkStarted', () => events.push('checkStarted'));
  manager.on('checkFinished', () => events.push('checkFinished'));
  manager.on('noUpdateAvailable', () => events.push('noUpdateAvailable'));
  manager.on('updateAvailable', (info) => {
    events.push('updateAvailable');
    availableInfos.push(info);
  });
  manager.on('checkFailed', (message) => {
    events.push('checkFailed');
    failures.push(message);
  });

  return { manager, preferences, createWorker, logger, events, availableInfos, failures };
}

function buildVersionInfo(major: number, minor: number): LatestVersionInfo {
  return {
    versionMajor: major,
    versionMinor: minor,
    downloadUrl: `https://example.invalid/quickfill-${major}.${minor}.zip`,
    releaseUrl: `https://example.invalid/releases/${major}.${minor}`,
    sha256: 'a'.repeat(64),
    releaseNotes: 'Correcoes diversas.',
    publishedAt: '2026-03-01T00:00:00.000Z'
  };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 20; i += 1) {
    await Promise.resolve();
  }
}
