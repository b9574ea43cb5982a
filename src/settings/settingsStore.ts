import type { UserSettings } from '../pipeline/types.js';

export type SettingsPatch = Partial<UserSettings>;
export type SettingsUpdater = SettingsPatch | ((current: UserSettings) => SettingsPatch);

export type SettingsStore = {
  /** Returns the user's settings, creating them from defaults on first access. */
  get: (userId: string) => UserSettings;
  /** Applies `patch` under the user's lock and resolves with the stored result. */
  update: (userId: string, patch: SettingsUpdater) => Promise<UserSettings>;
  snapshot: () => Record<string, UserSettings>;
};

export function createSettingsStore(defaults: UserSettings): SettingsStore {
  const settings = new Map<string, UserSettings>();
  // Tail of the pending-update chain per user id.
  const locks = new Map<string, Promise<unknown>>();

  const get = (userId: string): UserSettings => {
    const existing = settings.get(userId);
    if (existing) return { ...existing };
    const created = { ...defaults };
    settings.set(userId, created);
    return { ...created };
  };

  const withLock = <T>(userId: string, task: () => T | Promise<T>): Promise<T> => {
    const previous = locks.get(userId) ?? Promise.resolve();
    const next = previous.then(task, task);
    const tail = next.catch(() => undefined);
    locks.set(userId, tail);
    void tail.then(() => {
      if (locks.get(userId) === tail) locks.delete(userId);
    });
    return next;
  };

  return {
    get,
    update: (userId, patch) =>
      withLock(userId, () => {
        const current = get(userId);
        const changes = typeof patch === 'function' ? patch(current) : patch;
        const merged: UserSettings = { ...current, ...changes };
        settings.set(userId, merged);
        return { ...merged };
      }),
    snapshot: () => Object.fromEntries(Array.from(settings.entries(), ([id, value]) => [id, { ...value }])),
  };
}
