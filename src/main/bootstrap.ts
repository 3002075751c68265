import { PreferencesStore } from '@main/services/config/PreferencesStore';
import { readRuntimeConfig, type RuntimeConfig } from '@main/services/config/runtime-config';
import {
  type AppPathsContext,
  appDataDir,
  backupFolderPath,
  detectAppPathsContext,
  ensureAppDataFolders,
  isInPortableMode,
  logFilePath,
  preferencesFilePath,
  translationRootFolderPath,
  userTranslationRootFolderPath,
  usePortableAppsFolderLayout
} from '@main/services/environment/app-paths';
import { Logger } from '@main/services/logging/Logger';
import { HttpUpdateCheckWorker } from '@main/services/update/HttpUpdateCheckWorker';
import { NoopUpdateCheckWorker } from '@main/services/update/NoopUpdateCheckWorker';
import type { UpdateCheckWorkerFactory } from '@main/services/update/UpdateCheckWorker';
import { UpdateManager } from '@main/services/update/UpdateManager';
import { APP_ID, APP_VERSION, formatVersion } from '@shared/app-info';

export interface BootstrapOptions {
  defaultApplicationDir: string;
  env?: NodeJS.ProcessEnv;
  localDataDir?: string;
}

export interface AppServices {
  config: RuntimeConfig;
  paths: AppPathsContext;
  logger: Logger;
  preferences: PreferencesStore;
  updateManager: UpdateManager;
  shutdown(): void;
}

export function bootstrap(options: BootstrapOptions): AppServices {
  const { config, warnings } = readRuntimeConfig(options.env ?? process.env);
  const paths = detectAppPathsContext({
    applicationDir: config.applicationDir ?? options.defaultApplicationDir,
    appName: APP_ID,
    localDataDir: options.localDataDir
  });

  const logger = new Logger(logFilePath(paths), {
    mirrorFilePath: config.debugLogMirrorPath,
    minLevel: config.logLevel
  });
  for (const warning of warnings) {
    logger.warn('app.config.invalid', { warning });
  }

  const preferences = new PreferencesStore(preferencesFilePath(paths));
  ensureAppDataFolders(paths, preferences.get());

  const updateManager = new UpdateManager(preferences, createUpdateWorkerFactory(config, logger), logger);

  logger.info('app.bootstrap', {
    version: formatVersion(APP_VERSION),
    applicationDir: paths.applicationDir,
    portable: isInPortableMode(paths),
    portableAppsLayout: usePortableAppsFolderLayout(paths),
    appDataDir: appDataDir(paths),
    logFile: logger.path,
    backupFolder: backupFolderPath(paths, preferences.get()),
    translations: translationRootFolderPath(paths),
    userTranslations: userTranslationRootFolderPath(paths),
    updateProvider: config.updateProvider
  });

  let shutDown = false;
  return {
    config,
    paths,
    logger,
    preferences,
    updateManager,
    shutdown: () => {
      if (shutDown) {
        return;
      }
      shutDown = true;
      updateManager.dispose();
      logger.info('app.shutdown', {});
    }
  };
}

export function createUpdateWorkerFactory(config: RuntimeConfig, logger: Logger): UpdateCheckWorkerFactory {
  if (config.updateProvider === 'none') {
    logger.info('update.provider.none', {});
    return () => new NoopUpdateCheckWorker();
  }

  logger.info('update.provider.http.enabled', {
    url: config.updateUrl,
    timeoutMs: config.updateTimeoutMs
  });
  return () =>
    new HttpUpdateCheckWorker({
      url: config.updateUrl,
      currentVersion: APP_VERSION,
      timeoutMs: config.updateTimeoutMs
    });
}
