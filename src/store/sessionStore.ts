/**
 * Game session store: owns the RNG stream and drives `advance`.
 *
 * The persisted slice is `{ game, rngState, lastLog }`. Content is not
 * persisted; it is supplied when the store is created.
 */
import { createJSONStorage, persist } from 'zustand/middleware';
import { createStore } from 'zustand/vanilla';
import { DEFAULT_DIFFICULTY, SAVE_VERSION } from '../data/gameConfig';
import { loadDefaultContent } from '../engine/content';
import { getDifficultySettings } from '../engine/difficulty';
import { getAvailableInputs, getCurrentEvent, isGameOver, newGame } from '../engine/gameState';
import { advance } from '../engine/quarterEngine';
import { generateRandomSeed, SeededRng } from '../engine/rng';
import { getScoreBreakdown, type FinalScoreBreakdown } from '../engine/scoring';
import { parseGameState, parseQuarterLog } from '../engine/serialization';
import type {
  AdvanceResult,
  DifficultyId,
  EventCard,
  GameContent,
  GameState,
  InputKind,
  QuarterInput,
  QuarterLog,
} from '../engine/types';
import { runAllMigrations, saveKey, type SyncStorage } from './migrations';

interface PersistedSession {
  game: GameState | null;
  rngState: number;
  lastLog: QuarterLog | null;
}

export interface SessionStore extends PersistedSession {
  /** Every log produced since the game started (not persisted). */
  logs: QuarterLog[];

  startGame: (difficulty?: DifficultyId, seed?: number) => GameState;
  dispatch: (input: QuarterInput) => AdvanceResult;
  resetGame: () => void;

  availableInputs: () => InputKind[];
  currentEvent: () => EventCard | null;
  scoreBreakdown: () => FinalScoreBreakdown | null;
}

export interface SessionOptions {
  storage: SyncStorage;
  content?: GameContent;
  name?: string;
}

const initialSession: PersistedSession = {
  game: null,
  rngState: 0,
  lastLog: null,
};

function restoreSession(persisted: unknown): PersistedSession | null {
  if (typeof persisted !== 'object' || persisted === null) return null;
  try {
    const game = 'game' in persisted && persisted.game !== null ? parseGameState(persisted.game) : null;
    const rngState = 'rngState' in persisted && typeof persisted.rngState === 'number' ? persisted.rngState : 0;
    const lastLog = 'lastLog' in persisted && persisted.lastLog !== null ? parseQuarterLog(persisted.lastLog) : null;
    return { game, rngState, lastLog };
  } catch (e) {
    console.error('Session restore failed:', e);
    return null;
  }
}

export function createSessionStore({ storage, content = loadDefaultContent(), name = saveKey(SAVE_VERSION) }: SessionOptions) {
  runAllMigrations(storage);

  return createStore<SessionStore>()(
    persist(
      (set, get) => {
        const requireGame = (): GameState => {
          const { game } = get();
          if (game === null) throw new Error('No game in progress');
          return game;
        };

        return {
          ...initialSession,
          logs: [],

          startGame: (difficulty = DEFAULT_DIFFICULTY, seed = generateRandomSeed()) => {
            const rng = new SeededRng(seed);
            const game = newGame(seed, getDifficultySettings(difficulty), content, rng);
            set({ game, rngState: rng.getState(), lastLog: null, logs: [] });
            return game;
          },

          dispatch: (input) => {
            const game = requireGame();
            const rng = SeededRng.fromState(get().rngState);
            const result = advance(game, input, rng, { settings: getDifficultySettings(game.difficulty), content });
            set((s) => ({
              game: result.state,
              rngState: rng.getState(),
              lastLog: result.log,
              logs: [...s.logs, result.log],
            }));
            return result;
          },

          resetGame: () => set({ ...initialSession, logs: [] }),

          availableInputs: () => {
            const { game } = get();
            return game === null ? [] : getAvailableInputs(game, getDifficultySettings(game.difficulty));
          },

          currentEvent: () => {
            const { game } = get();
            return game === null ? null : getCurrentEvent(game, content);
          },

          scoreBreakdown: () => {
            const { game } = get();
            return game !== null && isGameOver(game) ? getScoreBreakdown(game.ceo, game.resources) : null;
          },
        };
      },
      {
        name,
        version: SAVE_VERSION,
        storage: createJSONStorage(() => storage),
        partialize: (state): PersistedSession => ({
          game: state.game,
          rngState: state.rngState,
          lastLog: state.lastLog,
        }),
        merge: (persisted, current) => {
          const restored = restoreSession(persisted);
          return restored === null ? current : { ...current, ...restored };
        },
        onRehydrateStorage: () => (_state, error) => {
          if (error) console.error('Session rehydration failed:', error);
        },
      },
    ),
  );
}

export type SessionStoreApi = ReturnType<typeof createSessionStore>;
