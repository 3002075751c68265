import { EventEmitter } from 'node:events';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { AppPreferences, AppPreferencesPatch } from '@shared/contracts';

const DEFAULT_PREFERENCES_BASE = {
  autoCheckForUpdates: true,
  lastUpdateCheckAt: null,
  useCustomBackupLocation: false,
  customBackupLocation: ''
} as const;

const isoDateTime = z.string().datetime({ offset: true });

const preferencesSchema = z.object({
  autoCheckForUpdates: z.boolean().catch(DEFAULT_PREFERENCES_BASE.autoCheckForUpdates),
  lastUpdateCheckAt: isoDateTime.nullable().catch(DEFAULT_PREFERENCES_BASE.lastUpdateCheckAt),
  useCustomBackupLocation: z.boolean().catch(DEFAULT_PREFERENCES_BASE.useCustomBackupLocation),
  customBackupLocation: z.string().catch(DEFAULT_PREFERENCES_BASE.customBackupLocation),
  updatedAt: isoDateTime.optional().catch(undefined)
});

const AUTO_CHECK_CHANGED = 'autoCheckForUpdatesChanged';

export class PreferencesStore {
  private readonly filePath: string;
  private readonly emitter = new EventEmitter();
  private cache: AppPreferences;

  constructor(filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.filePath = filePath;
    this.cache = this.load();
  }

  get(): AppPreferences {
    return { ...this.cache };
  }

  set(patch: AppPreferencesPatch): AppPreferences {
    const previous = this.cache;
    const next: AppPreferences = {
      autoCheckForUpdates:
        typeof patch.autoCheckForUpdates === 'boolean' ? patch.autoCheckForUpdates : previous.autoCheckForUpdates,
      lastUpdateCheckAt: patch.lastUpdateCheckAt !== undefined ? patch.lastUpdateCheckAt : previous.lastUpdateCheckAt,
      useCustomBackupLocation:
        typeof patch.useCustomBackupLocation === 'boolean'
          ? patch.useCustomBackupLocation
          : previous.useCustomBackupLocation,
      customBackupLocation:
        typeof patch.customBackupLocation === 'string' ? patch.customBackupLocation.trim() : previous.customBackupLocation,
      updatedAt: new Date().toISOString()
    };

    this.cache = next;
    this.persist(next);

    if (next.autoCheckForUpdates !== previous.autoCheckForUpdates) {
      this.emitter.emit(AUTO_CHECK_CHANGED, next.autoCheckForUpdates);
    }

    return this.get();
  }

  autoCheckForUpdates(): boolean {
    return this.cache.autoCheckForUpdates;
  }

  setAutoCheckForUpdates(enabled: boolean): void {
    this.set({ autoCheckForUpdates: enabled });
  }

  onAutoCheckForUpdatesChanged(listener: (enabled: boolean) => void): () => void {
    this.emitter.on(AUTO_CHECK_CHANGED, listener);
    return () => {
      this.emitter.off(AUTO_CHECK_CHANGED, listener);
    };
  }

  lastUpdateCheckAt(): Date | null {
    return this.cache.lastUpdateCheckAt ? new Date(this.cache.lastUpdateCheckAt) : null;
  }

  setLastUpdateCheckAt(date: Date): void {
    this.set({ lastUpdateCheckAt: date.toISOString() });
  }

  private load(): AppPreferences {
    if (!fs.existsSync(this.filePath)) {
      const initial = createDefaultPreferences();
      this.persist(initial);
      return initial;
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = preferencesSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        const normalized: AppPreferences = {
          ...parsed.data,
          customBackupLocation: parsed.data.customBackupLocation.trim(),
          updatedAt: parsed.data.updatedAt ?? new Date().toISOString()
        };
        this.persist(normalized);
        return normalized;
      }
    } catch {
      // arquivo corrompido: cai no default abaixo
    }

    const fallback = createDefaultPreferences();
    this.persist(fallback);
    return fallback;
  }

  private persist(preferences: AppPreferences): void {
    fs.writeFileSync(this.filePath, JSON.stringify(preferences, null, 2), 'utf-8');
  }
}

function createDefaultPreferences(): AppPreferences {
  return {
    ...DEFAULT_PREFERENCES_BASE,
    updatedAt: new Date().toISOString()
  };
}
