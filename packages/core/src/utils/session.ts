import type { SessionKey, SessionSettings, TransactionOptions } from '../types';

export const SESSION_KEYS: readonly SessionKey[] = [
  'isolationLevel',
  'readOnly',
  'deferrable',
  'statementTimeout',
];

/**
 * Keys a settings object actually changes
 */
export function changedSessionKeys(settings: SessionSettings): SessionKey[] {
  return SESSION_KEYS.filter((key) => settings[key] !== undefined);
}

/**
 * Current values of `keys`, with unset ones recorded as `null` (server default)
 * so that applying the snapshot puts them back.
 */
export function snapshotSession(
  current: Readonly<SessionSettings>,
  keys: readonly SessionKey[],
): SessionSettings {
  const snapshot: SessionSettings = {};
  if (keys.includes('isolationLevel')) {
    snapshot.isolationLevel = current.isolationLevel ?? null;
  }
  if (keys.includes('readOnly')) {
    snapshot.readOnly = current.readOnly ?? null;
  }
  if (keys.includes('deferrable')) {
    snapshot.deferrable = current.deferrable ?? null;
  }
  if (keys.includes('statementTimeout')) {
    snapshot.statementTimeout = current.statementTimeout ?? null;
  }
  return snapshot;
}

/**
 * One single-key settings object per key `settings` changes, in apply order
 */
export function splitSession(settings: SessionSettings): SessionSettings[] {
  return changedSessionKeys(settings).map((key) => snapshotSession(settings, [key]));
}

export function mergeSession(
  current: Readonly<SessionSettings>,
  changes: SessionSettings,
): SessionSettings {
  const merged: SessionSettings = { ...current };
  if (changes.isolationLevel !== undefined) {
    merged.isolationLevel = changes.isolationLevel;
  }
  if (changes.readOnly !== undefined) {
    merged.readOnly = changes.readOnly;
  }
  if (changes.deferrable !== undefined) {
    merged.deferrable = changes.deferrable;
  }
  if (changes.statementTimeout !== undefined) {
    merged.statementTimeout = changes.statementTimeout;
  }
  return merged;
}

export function transactionSettings(options: TransactionOptions): SessionSettings {
  const settings: SessionSettings = {};
  if (options.isolationLevel !== undefined) {
    settings.isolationLevel = options.isolationLevel;
  }
  if (options.readOnly !== undefined) {
    settings.readOnly = options.readOnly;
  }
  if (options.deferrable !== undefined) {
    settings.deferrable = options.deferrable;
  }
  return settings;
}

/**
 * Whether `requested` asks for characteristics the open transaction was not opened with
 */
export function characteristicsDiffer(
  open: TransactionOptions,
  requested: TransactionOptions,
): boolean {
  return (
    (requested.isolationLevel !== undefined && requested.isolationLevel !== open.isolationLevel) ||
    (requested.readOnly !== undefined && requested.readOnly !== open.readOnly) ||
    (requested.deferrable !== undefined && requested.deferrable !== open.deferrable)
  );
}
