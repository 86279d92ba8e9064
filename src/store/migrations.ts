/**
 * Save-key migrations for the session store.
 *
 * Each migration reads the previous version's key, upgrades the game inside
 * it, writes it under the next key and deletes the old one. They are
 * idempotent: if the target key already exists the migration is a no-op.
 *
 * Run once before the store is created, so `persist` only ever sees the
 * current key.
 */
import { migrateSaveData } from '../engine/serialization';

export interface SyncStorage {
  getItem(name: string): string | null;
  setItem(name: string, value: string): void;
  removeItem(name: string): void;
}

export const SAVE_KEY_PREFIX = 'quarterly-survival-save-v';

export function saveKey(version: number): string {
  return `${SAVE_KEY_PREFIX}${version}`;
}

// --- v1 → v2: adds lingering crises + quarter history ---

export function migrateV1ToV2(storage: SyncStorage): void {
  try {
    const v2Key = saveKey(2);
    const v1Key = saveKey(1);
    if (storage.getItem(v2Key)) return;
    const v1Raw = storage.getItem(v1Key);
    if (!v1Raw) return;
    const v1Data: unknown = JSON.parse(v1Raw);
    if (typeof v1Data !== 'object' || v1Data === null || !('state' in v1Data)) return;
    const persisted = v1Data.state;
    if (typeof persisted !== 'object' || persisted === null || !('game' in persisted)) return;

    const upgraded = { ...persisted, game: migrateSaveData(persisted.game) };
    storage.setItem(v2Key, JSON.stringify({ state: upgraded, version: 2 }));
    storage.removeItem(v1Key);
  } catch (e) {
    console.error('v1→v2 migration failed:', e);
  }
}

export function runAllMigrations(storage: SyncStorage): void {
  migrateV1ToV2(storage);
}
