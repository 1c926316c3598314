import type { Logger } from "pino";
import { GameError } from "./errors";
import { GameState } from "./gameState";
import { MetricsTracker } from "./metrics";
import { TimerEngine } from "./timerEngine";
import type { GameConfig, Player } from "./types";
import { pickStartingLetter } from "./utils";

export const MIN_PLAYERS_TO_START = 2;

export function turnTimerKey(roomId: string): string {
  return roomId;
}

export function waitingTimerKey(roomId: string): string {
  return `${roomId}#waiting`;
}

export interface RoomRegistryOptions {
  timers: TimerEngine;
  metrics: MetricsTracker;
  logger?: Logger;
  now?: () => number;
  pickLetter?: () => string;
}

/** Owns every room's GameState; at most one per room id. */
export class RoomRegistry {
  private readonly games = new Map<string, GameState>();
  private readonly timers: TimerEngine;
  private readonly metrics: MetricsTracker;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly pickLetter: () => string;

  constructor(options: RoomRegistryOptions) {
    this.timers = options.timers;
    this.metrics = options.metrics;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.pickLetter = options.pickLetter ?? (() => pickStartingLetter());
  }

  createWaiting(roomId: string, firstPlayer: Player, config: GameConfig): GameState {
    if (this.games.has(roomId)) {
      throw new GameError("ROOM_EXISTS", "A game already exists in this room.");
    }

    const now = this.now();
    const state = new GameState({
      roomId,
      config: Object.freeze({ ...config, warningOffsets: [...config.warningOffsets] }),
      letter: this.pickLetter(),
      players: [firstPlayer],
      now,
    });

    this.games.set(roomId, state);
    this.metrics.track(roomId, state.players.length, now);
    this.logger?.info({ roomId, playerId: firstPlayer.id }, "waiting room created");

    return state;
  }

  promoteToActive(roomId: string): GameState {
    const state = this.games.get(roomId);
    if (!state) {
      throw new GameError("ROOM_NOT_FOUND", "No game in this room.");
    }

    if (state.status !== "waiting") {
      throw new GameError("NOT_WAITING", "The game is not waiting for players.");
    }

    if (state.activePlayers().length < MIN_PLAYERS_TO_START) {
      throw new GameError(
        "NOT_ENOUGH_PLAYERS",
        `Need at least ${MIN_PLAYERS_TO_START} present players to start.`,
      );
    }

    this.timers.cancel(waitingTimerKey(roomId));

    const now = this.now();
    state.activate(now);
    this.metrics.track(roomId, state.players.length, now);
    this.logger?.info(
      { roomId, players: state.players.length, letter: state.currentLetter },
      "game started",
    );

    return state;
  }

  /** Removes the room and its timers. False when there was nothing to stop. */
  stop(roomId: string): boolean {
    const state = this.games.get(roomId);
    if (!state) {
      return false;
    }

    this.games.delete(roomId);
    if (state.status !== "terminated") {
      state.terminate(state.winnerId);
    }

    this.timers.cancel(turnTimerKey(roomId));
    this.timers.cancel(waitingTimerKey(roomId));
    this.metrics.remove(roomId, this.now());
    this.logger?.info({ roomId }, "room stopped");

    return true;
  }

  stopAll(): number {
    let stopped = 0;
    for (const roomId of [...this.games.keys()]) {
      if (this.stop(roomId)) {
        stopped += 1;
      }
    }
    return stopped;
  }

  get(roomId: string): GameState | undefined {
    return this.games.get(roomId);
  }

  has(roomId: string): boolean {
    return this.games.has(roomId);
  }

  rooms(): GameState[] {
    return [...this.games.values()];
  }

  get size(): number {
    return this.games.size;
  }

  activeCount(): number {
    return this.rooms().filter((state) => state.isActive).length;
  }

  totalPlayers(): number {
    return this.rooms().reduce((sum, state) => sum + state.players.length, 0);
  }
}
