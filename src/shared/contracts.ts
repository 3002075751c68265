export interface VersionNumber {
  major: number;
  minor: number;
}

export interface LatestVersionInfo {
  versionMajor: number;
  versionMinor: number;
  downloadUrl: string;
  releaseUrl: string;
  sha256: string;
  releaseNotes: string;
  publishedAt: string | null;
}

export type UpdateCheckErrorCode = 'check_failed' | 'http_error' | 'timeout' | 'invalid_response' | 'internal';

export type UpdateCheckOutcome =
  | { kind: 'available'; versionInfo: LatestVersionInfo }
  | { kind: 'none' }
  | { kind: 'error'; code: UpdateCheckErrorCode; message: string };

export interface UpdateCheckCompletion {
  checkId: number;
  outcome: UpdateCheckOutcome;
  finishedAt: string;
}

export type UpdateManagerPhase = 'scheduled' | 'disabled' | 'checking';

export interface UpdateManagerState {
  phase: UpdateManagerPhase;
  nextCheckAt: string | null;
  lastCheckAt: string | null;
  activeCheckId: number | null;
}

export interface AppPreferences {
  autoCheckForUpdates: boolean;
  lastUpdateCheckAt: string | null;
  useCustomBackupLocation: boolean;
  customBackupLocation: string;
  updatedAt: string;
}

export type AppPreferencesPatch = Partial<Omit<AppPreferences, 'updatedAt'>>;

export type UpdateProviderKind = 'none' | 'http';
