import fs from 'node:fs';
import path from 'node:path';
import envPaths from 'env-paths';

export const PORTABLE_MODE_MARKER_FILE = 'Portable.bin';
export const PREFERENCES_FILE_NAME = 'Settings.json';

export interface AppPathsContext {
  applicationDir: string;
  localDataDir: string;
  portable: boolean;
  portableAppsLayout: boolean;
}

export interface BackupLocationPreferences {
  useCustomBackupLocation: boolean;
  customBackupLocation: string;
}

interface DetectAppPathsContextInput {
  applicationDir: string;
  appName: string;
  localDataDir?: string;
}

/**
 * Inspects the folder holding the application to decide between the installed and the portable layouts.
 * Portable mode is enabled by a `Portable.bin` file next to the application; the PortableApps.com layout is
 * recognised by an `AppInfo/appinfo.ini` file in the parent of the application folder.
 */
export function detectAppPathsContext(input: DetectAppPathsContextInput): AppPathsContext {
  const applicationDir = path.resolve(input.applicationDir);
  return {
    applicationDir,
    localDataDir: path.resolve(input.localDataDir ?? envPaths(input.appName, { suffix: '' }).data),
    portable: fs.existsSync(path.join(applicationDir, PORTABLE_MODE_MARKER_FILE)),
    portableAppsLayout: fs.existsSync(path.resolve(applicationDir, '..', 'AppInfo', 'appinfo.ini'))
  };
}

export function isInPortableMode(context: AppPathsContext): boolean {
  return context.portable;
}

export function usePortableAppsFolderLayout(context: AppPathsContext): boolean {
  return context.portableAppsLayout;
}

export function portableModeDataFolderPath(context: AppPathsContext): string {
  return usePortableAppsFolderLayout(context)
    ? path.resolve(context.applicationDir, '..', '..', 'Data', 'settings')
    : path.resolve(context.applicationDir, 'Data');
}

export function portableModeSettingsFilePath(context: AppPathsContext): string {
  return path.join(portableModeDataFolderPath(context), PREFERENCES_FILE_NAME);
}

export function appDataDir(context: AppPathsContext): string {
  return isInPortableMode(context) ? portableModeDataFolderPath(context) : context.localDataDir;
}

export function preferencesFilePath(context: AppPathsContext): string {
  return isInPortableMode(context)
    ? portableModeSettingsFilePath(context)
    : path.join(appDataDir(context), PREFERENCES_FILE_NAME);
}

/** Translations shipped with the application. */
export function translationRootFolderPath(context: AppPathsContext): string {
  return path.join(context.applicationDir, 'Translations');
}

/** Translations dropped in by the user. */
export function userTranslationRootFolderPath(context: AppPathsContext): string {
  return path.join(appDataDir(context), 'Translations');
}

export function logFilePath(context: AppPathsContext): string {
  return path.join(appDataDir(context), 'log.txt');
}

export function defaultBackupFolderPath(context: AppPathsContext): string {
  return path.join(appDataDir(context), 'Backup');
}

export function backupFolderPath(context: AppPathsContext, preferences: BackupLocationPreferences): string {
  const defaultPath = defaultBackupFolderPath(context);
  if (!preferences.useCustomBackupLocation) {
    return defaultPath;
  }

  const customPath = preferences.customBackupLocation.trim();
  return customPath || defaultPath;
}

export function sensitiveApplicationsFilePath(context: AppPathsContext): string {
  return path.join(appDataDir(context), 'sensitiveApps.json');
}

export function emojiExcludedAppsFilePath(context: AppPathsContext): string {
  return path.join(appDataDir(context), 'emojiExcludedApps.json');
}

export function ensureAppDataFolders(context: AppPathsContext, preferences: BackupLocationPreferences): string[] {
  const folders = [appDataDir(context), userTranslationRootFolderPath(context), backupFolderPath(context, preferences)];
  for (const folder of folders) {
    fs.mkdirSync(folder, { recursive: true });
  }

  return folders;
}
