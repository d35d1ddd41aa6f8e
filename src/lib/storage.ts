import type { StateStorage } from "zustand/middleware";

export const STORAGE_KEY = "character_roster_v1";

export function createMemoryStorage(): StateStorage {
  const storage = new Map<string, string>();
  return {
    getItem: (name) => storage.get(name) ?? null,
    setItem: (name, value) => {
      storage.set(name, value);
    },
    removeItem: (name) => {
      storage.delete(name);
    },
  };
}

const sharedMemoryStorage = createMemoryStorage();

/** Browser localStorage when there is one, an in-process map otherwise. */
export function defaultStorage(): StateStorage {
  return typeof window !== "undefined" ? window.localStorage : sharedMemoryStorage;
}

export function reportPersistenceError(error: unknown): void {
  console.warn("Failed to restore persisted roster", error);
}
