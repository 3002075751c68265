import type { VersionNumber } from '@shared/contracts';

export const APP_NAME = 'Quickfill';
export const APP_ID = 'quickfill';

export const APP_VERSION: VersionNumber = {
  major: 0,
  minor: 1
};

export function formatVersion(version: VersionNumber): string {
  return `${version.major}.${version.minor}`;
}
