import type { Logger } from "pino";
import { GameEventBus } from "./events";
import { GameState } from "./gameState";
import { MetricsTracker } from "./metrics";
import { RoomIsolationManager } from "./roomLocks";
import { RoomRegistry, turnTimerKey } from "./roomRegistry";
import { TimerEngine } from "./timerEngine";
import type { GameEndReason, Player } from "./types";
import { toPublicPlayer } from "./utils";

export interface TurnSchedulerOptions {
  timers: TimerEngine;
  registry: RoomRegistry;
  locks: RoomIsolationManager;
  events: GameEventBus;
  metrics: MetricsTracker;
  logger?: Logger;
  now?: () => number;
}

/**
 * Runs each active room's turn clock. A timeout only lands if it enters
 * the room lock while the room still carries the token of the timer that
 * fired; anything else (a word arrived, the room stopped) makes it a no-op.
 */
export class TurnScheduler {
  private readonly timers: TimerEngine;
  private readonly registry: RoomRegistry;
  private readonly locks: RoomIsolationManager;
  private readonly events: GameEventBus;
  private readonly metrics: MetricsTracker;
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(options: TurnSchedulerOptions) {
    this.timers = options.timers;
    this.registry = options.registry;
    this.locks = options.locks;
    this.events = options.events;
    this.metrics = options.metrics;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  beginTurn(roomId: string): boolean {
    const state = this.registry.get(roomId);
    if (!state || !state.isActive) {
      return false;
    }

    const player = state.currentPlayer();
    if (!player) {
      return false;
    }

    const { turnSeconds, warningOffsets } = state.config;
    const handle = this.timers.start(turnTimerKey(roomId), {
      durationMs: turnSeconds * 1000,
      warningOffsetsMs: warningOffsets.map((seconds) => seconds * 1000),
      onWarning: (_key, remainingMs) => this.handleWarning(roomId, handle.id, remainingMs),
      onTimeout: () => this.handleTimeout(roomId, handle.id),
    });

    state.timerToken = handle.id;
    state.turnStartedAt = handle.startedAt;

    this.events.publish({
      type: "turn_started",
      roomId,
      player: toPublicPlayer(player),
      letter: state.currentLetter,
      requiredLength: state.requiredLength,
      timeoutSeconds: turnSeconds,
    });

    return true;
  }

  cancelTurn(roomId: string): boolean {
    const state = this.registry.get(roomId);
    if (state) {
      state.timerToken = null;
    }

    return this.timers.cancel(turnTimerKey(roomId));
  }

  /** Marks the room finished, announces the result and removes the room. */
  endGame(roomId: string, reason?: GameEndReason): Player | null {
    const state = this.registry.get(roomId);
    if (!state) {
      return null;
    }

    const survivors = state.activePlayers();
    const winner = survivors.length === 1 ? survivors[0] : null;
    state.terminate(winner?.id ?? null);

    this.events.publish({
      type: "game_ended",
      roomId,
      winner: winner ? toPublicPlayer(winner) : null,
      reason: reason ?? (winner ? "winner" : "no_players"),
    });
    this.logger?.info({ roomId, winnerId: winner?.id ?? null }, "game ended");

    this.registry.stop(roomId);
    return winner;
  }

  private isCurrentTurn(state: GameState | undefined, token: number): state is GameState {
    return !!state && state.isActive && state.timerToken === token;
  }

  private handleWarning(roomId: string, token: number, remainingMs: number): void {
    const state = this.registry.get(roomId);
    if (!this.isCurrentTurn(state, token)) {
      return;
    }

    const player = state.currentPlayer();
    this.events.publish({
      type: "turn_warning",
      roomId,
      player: player ? toPublicPlayer(player) : null,
      remainingSeconds: Math.ceil(remainingMs / 1000),
    });
  }

  private handleTimeout(roomId: string, token: number): Promise<void> {
    return this.locks.withRoomLock(roomId, () => this.expireTurn(roomId, token));
  }

  private expireTurn(roomId: string, token: number): void {
    const state = this.registry.get(roomId);
    if (!this.isCurrentTurn(state, token)) {
      this.logger?.debug({ roomId, token }, "stale turn timeout ignored");
      return;
    }

    state.timerToken = null;
    const player = state.currentPlayer();
    if (!player) {
      this.endGame(roomId);
      return;
    }

    const now = this.now();
    this.metrics.recordTimeout(roomId, now);

    if (state.config.timeoutPolicy === "skip") {
      this.events.publish({ type: "player_skipped", roomId, player: toPublicPlayer(player) });
      state.advanceTurn(now);
      state.skipInactive(now);
      this.logger?.info({ roomId, playerId: player.id }, "turn skipped after timeout");
    } else {
      state.removePlayer(player.id);
      state.skipInactive(now);
      this.metrics.recordPlayers(roomId, state.players.length, now);
      this.events.publish({
        type: "player_eliminated",
        roomId,
        player: toPublicPlayer(player),
        remainingPlayers: state.players.length,
      });
      this.logger?.info({ roomId, playerId: player.id }, "player eliminated after timeout");
    }

    if (state.shouldTerminate()) {
      this.endGame(roomId);
      return;
    }

    this.beginTurn(roomId);
  }
}
