import { createJSONStorage, persist } from "zustand/middleware";
import type { StateStorage } from "zustand/middleware";
import { createStore } from "zustand/vanilla";

import {
  generateCharacter,
  generateParty as generatePartyCharacters,
  isGenerationError,
  type Character,
  type GenerationConfig,
  type GenerationErrorCode,
  type Rng,
} from "@/engine";
import { toCharacterRecord, type CharacterRecord } from "@/lib/export";
import { defaultStorage, reportPersistenceError, STORAGE_KEY } from "@/lib/storage";
import { getDefaultRuleTables, type RuleTableStore } from "@/rules";

export const MAX_ROSTER_SIZE = 50;
export const MAX_LOG_ENTRIES = 120;

export interface RosterEntry {
  id: string;
  createdAt: string;
  character: CharacterRecord;
}

export type LogKind = "generate" | "remove" | "clear" | "error";

export interface LogEntry {
  id: string;
  timestamp: string;
  kind: LogKind;
  text: string;
}

export interface GenerationFailure {
  code: GenerationErrorCode | "Unexpected";
  message: string;
}

export interface RosterState {
  characters: RosterEntry[];
  log: LogEntry[];
  lastError: GenerationFailure | null;
}

export interface RosterActions {
  generate: (config?: GenerationConfig) => RosterEntry | null;
  generateParty: (count: number, config?: GenerationConfig) => RosterEntry[];
  removeCharacter: (id: string) => boolean;
  clearRoster: () => void;
  resetState: () => void;
}

export type RosterStore = RosterState & RosterActions;

export interface RosterStoreOptions {
  rules?: RuleTableStore;
  storage?: () => StateStorage;
  /** Shared source for every generation; a fresh one per call when absent. */
  random?: Rng;
  now?: () => Date;
}

const createDefaultState = (): RosterState => ({
  characters: [],
  log: [],
  lastError: null,
});

function summarize(character: Character): string {
  return `${character.name}, level ${character.level} ${character.className}`;
}

function toFailure(error: unknown): GenerationFailure {
  if (isGenerationError(error)) {
    return { code: error.code, message: error.message };
  }
  return { code: "Unexpected", message: error instanceof Error ? error.message : String(error) };
}

export function createRosterStore(options: RosterStoreOptions = {}) {
  const rules = options.rules ?? getDefaultRuleTables();
  const now = options.now ?? (() => new Date());
  let sequence = 0;

  const nextId = (timestamp: Date) => {
    sequence += 1;
    return `${timestamp.getTime()}-${sequence}`;
  };

  const logEntry = (timestamp: Date, kind: LogKind, text: string): LogEntry => ({
    id: nextId(timestamp),
    timestamp: timestamp.toISOString(),
    kind,
    text,
  });

  return createStore<RosterStore>()(
    persist(
      (set, get) => {
        const commit = (characters: Character[]): RosterEntry[] => {
          const timestamp = now();
          const entries = characters.map((character) => ({
            id: nextId(timestamp),
            createdAt: timestamp.toISOString(),
            character: toCharacterRecord(character),
          }));
          const logEntries = characters
            .map((character) => logEntry(timestamp, "generate", `Generated ${summarize(character)}`))
            .reverse();
          set((state) => ({
            characters: [...entries, ...state.characters].slice(0, MAX_ROSTER_SIZE),
            log: [...logEntries, ...state.log].slice(0, MAX_LOG_ENTRIES),
            lastError: null,
          }));
          return entries;
        };

        const fail = (error: unknown) => {
          const failure = toFailure(error);
          set((state) => ({
            lastError: failure,
            log: [
              logEntry(now(), "error", `${failure.code}: ${failure.message}`),
              ...state.log,
            ].slice(0, MAX_LOG_ENTRIES),
          }));
        };

        return {
          ...createDefaultState(),
          generate: (config) => {
            try {
              const [entry] = commit([generateCharacter(rules, config, options.random)]);
              return entry;
            } catch (error) {
              fail(error);
              return null;
            }
          },
          generateParty: (count, config) => {
            try {
              return commit(generatePartyCharacters(rules, count, config, options.random));
            } catch (error) {
              fail(error);
              return [];
            }
          },
          removeCharacter: (id) => {
            const entry = get().characters.find((candidate) => candidate.id === id);
            if (!entry) {
              return false;
            }
            set((state) => ({
              characters: state.characters.filter((candidate) => candidate.id !== id),
              log: [
                logEntry(now(), "remove", `Removed ${entry.character.name}`),
                ...state.log,
              ].slice(0, MAX_LOG_ENTRIES),
            }));
            return true;
          },
          clearRoster: () =>
            set((state) => ({
              characters: [],
              log: [
                logEntry(now(), "clear", `Cleared ${state.characters.length} characters`),
                ...state.log,
              ].slice(0, MAX_LOG_ENTRIES),
            })),
          resetState: () =>
            set({
              ...createDefaultState(),
            }),
        };
      },
      {
        name: STORAGE_KEY,
        storage: createJSONStorage(options.storage ?? defaultStorage),
        partialize: (state) => ({
          characters: state.characters,
          log: state.log,
        }),
        onRehydrateStorage: () => (_state, error) => {
          if (error) {
            reportPersistenceError(error);
          }
        },
      },
    ),
  );
}
