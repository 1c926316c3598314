import { DEFAULT_GAME_CONFIG } from "../config";
import { type Dictionary, createWordSetDictionary } from "../dictionary";
import { DictionaryUnavailableError } from "../errors";
import { GameEventBus } from "../events";
import { GameState } from "../gameState";
import { createSilentLogger } from "../logger";
import type { GameConfig, GameEvent, GameEventType, Player } from "../types";

export const silentLogger = createSilentLogger();

export function createPlayer(id: number, name: string, active = true): Player {
  return { id, name, active };
}

export function createConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  return { ...DEFAULT_GAME_CONFIG, ...overrides };
}

export function createActiveState(
  players: Player[],
  options: { letter?: string; config?: Partial<GameConfig>; now?: number } = {},
): GameState {
  const state = new GameState({
    roomId: "room-1",
    config: createConfig(options.config),
    letter: options.letter ?? "C",
    players,
    now: options.now ?? 0,
  });
  state.activate(options.now ?? 0);
  return state;
}

export const WORDS = [
  "cat",
  "tiger",
  "rabbit",
  "tree",
  "egg",
  "goat",
  "table",
  "eagle",
  "echo",
  "owl",
  "lamp",
  "pear",
  "rope",
  "ant",
  "tent",
  "apple",
  "ear",
];

export function createTestDictionary(words: string[] = WORDS): Dictionary {
  return createWordSetDictionary(words);
}

/** Dictionary whose availability can be switched off mid-test. */
export function createFlakyDictionary(words: string[] = WORDS): Dictionary & { available: boolean } {
  const inner = createWordSetDictionary(words);
  const dictionary = {
    available: true,
    enabled: true,
    size: inner.size,
    isValid: async (word: string): Promise<boolean> => {
      if (!dictionary.available) {
        throw new DictionaryUnavailableError("word service offline");
      }
      return inner.isValid(word);
    },
  };
  return dictionary;
}

export function collectEvents(bus: GameEventBus): GameEvent[] {
  const events: GameEvent[] = [];
  bus.subscribe((event) => {
    events.push(event);
  });
  return events;
}

export function eventsOfType<T extends GameEventType>(
  events: GameEvent[],
  type: T,
): Extract<GameEvent, { type: T }>[] {
  return events.filter((event): event is Extract<GameEvent, { type: T }> => event.type === type);
}
