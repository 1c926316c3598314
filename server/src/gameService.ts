import type { Logger } from "pino";
import { AdmissionController } from "./admission";
import { DEFAULT_GAME_CONFIG } from "./config";
import type { Dictionary } from "./dictionary";
import { GameError, describeError, isGameError } from "./errors";
import { GameEventBus } from "./events";
import { GameState } from "./gameState";
import { MetricsTracker } from "./metrics";
import { RoomIsolationManager } from "./roomLocks";
import { MIN_PLAYERS_TO_START, RoomRegistry, waitingTimerKey } from "./roomRegistry";
import { TimerEngine } from "./timerEngine";
import { TurnScheduler } from "./turnScheduler";
import type {
  GameConfig,
  OperationResult,
  Player,
  PublicGameState,
  SubmitResult,
  SystemStatus,
} from "./types";
import { sanitizePlayerName, toPublicPlayer } from "./utils";
import { type WordHint, WordProcessor } from "./wordProcessor";

const WAITING_COUNTDOWN_SECONDS = [30, 20, 10];
const DEFAULT_MAX_ROOMS = 100;
const DEFAULT_IDLE_ROOM_MS = 60 * 60 * 1000;
const DEFAULT_SWEEP_INTERVAL_MS = 5 * 60 * 1000;
const DEFAULT_LOCK_RECLAIM_MS = 24 * 60 * 60 * 1000;
const WARNING_WINDOW_MS = 24 * 60 * 60 * 1000;

export interface GameServiceOptions {
  dictionary: Dictionary;
  game?: Partial<GameConfig>;
  maxRooms?: number;
  idleRoomMs?: number;
  sweepIntervalMs?: number;
  lockReclaimMs?: number;
  tickMs?: number;
  logger?: Logger;
  now?: () => number;
  pickLetter?: () => string;
}

export interface JoinRequest {
  id: number;
  name: string;
}

export class GameService {
  readonly events: GameEventBus;
  readonly timers: TimerEngine;
  readonly locks: RoomIsolationManager;
  readonly registry: RoomRegistry;
  readonly admission: AdmissionController;
  readonly metrics: MetricsTracker;
  readonly scheduler: TurnScheduler;
  readonly processor: WordProcessor;
  readonly gameConfig: GameConfig;

  private readonly idleRoomMs: number;
  private readonly sweepIntervalMs: number;
  private readonly lockReclaimMs: number;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: GameServiceOptions) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
    this.gameConfig = { ...DEFAULT_GAME_CONFIG, ...options.game };
    this.idleRoomMs = options.idleRoomMs ?? DEFAULT_IDLE_ROOM_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.lockReclaimMs = options.lockReclaimMs ?? DEFAULT_LOCK_RECLAIM_MS;

    const child = (component: string): Logger | undefined => this.logger?.child({ component });

    this.events = new GameEventBus(child("events"), this.now);
    this.timers = new TimerEngine({ tickMs: options.tickMs, logger: child("timers"), now: this.now });
    this.locks = new RoomIsolationManager(child("locks"), this.now);
    this.metrics = new MetricsTracker(this.now);
    this.admission = new AdmissionController(
      {
        maxRooms: options.maxRooms ?? DEFAULT_MAX_ROOMS,
        maxPlayersPerRoom: this.gameConfig.maxPlayersPerRoom,
      },
      child("admission"),
      this.now,
    );
    this.registry = new RoomRegistry({
      timers: this.timers,
      metrics: this.metrics,
      logger: child("registry"),
      now: this.now,
      pickLetter: options.pickLetter,
    });
    this.scheduler = new TurnScheduler({
      timers: this.timers,
      registry: this.registry,
      locks: this.locks,
      events: this.events,
      metrics: this.metrics,
      logger: child("turns"),
      now: this.now,
    });
    this.processor = new WordProcessor(options.dictionary, child("words"));
  }

  start(): void {
    if (this.sweepTimer) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      this.sweepIdleRooms().catch((error: unknown) => {
        this.logger?.error({ err: describeError(error) }, "idle sweep failed");
      });
    }, this.sweepIntervalMs);
  }

  shutdown(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    const stopped = this.registry.stopAll();
    const cancelled = this.timers.cancelAll();
    this.logger?.info({ stopped, cancelled }, "game service shut down");
  }

  /**
   * Creates a waiting room for the first player, or seats the player in
   * the existing game. When admission is refused, idle rooms are swept
   * once and the join is retried.
   */
  async joinGame(roomId: string, request: JoinRequest): Promise<OperationResult> {
    const first = await this.inRoom(roomId, () => this.seatPlayer(roomId, request));
    if (first.ok || first.code !== "ADMISSION_DENIED") {
      return first;
    }

    const swept = await this.sweepIdleRooms();
    if (swept === 0) {
      return first;
    }

    return this.inRoom(roomId, () => this.seatPlayer(roomId, request));
  }

  /** Starts a waiting game immediately instead of at the end of the grace window. */
  startGame(roomId: string): Promise<OperationResult> {
    return this.inRoom(roomId, () => {
      const state = this.registry.promoteToActive(roomId);
      this.launch(state);
      return this.success(state);
    });
  }

  submitWord(roomId: string, playerId: number, word: string): Promise<SubmitResult> {
    return this.locks.withRoomLock(roomId, async (): Promise<SubmitResult> => {
      const state = this.registry.get(roomId);
      if (!state) {
        return {
          ok: false,
          error: "No active game in this room.",
          outcome: { result: "no_active_game", message: "No active game in this room." },
        };
      }

      const outcome = await this.processor.submit(state, playerId, word);
      const now = this.now();

      if (outcome.result !== "valid_word") {
        this.metrics.recordError(roomId, now);
        if (outcome.message) {
          this.events.publish({
            type: "word_rejected",
            roomId,
            playerId,
            result: outcome.result,
            message: outcome.message,
          });
        }
        return { ok: false, error: outcome.message, outcome, state: state.toSnapshot(now) };
      }

      const accepted = outcome.word ?? word;
      const player = state.currentPlayer();
      this.scheduler.cancelTurn(roomId);
      const transition = this.processor.computeNextState(accepted, state, now);
      this.metrics.recordWord(roomId, now);

      if (player) {
        this.events.publish({
          type: "word_accepted",
          roomId,
          player: toPublicPlayer(player),
          word: accepted,
          transition,
        });
      }

      this.scheduler.beginTurn(roomId);
      return { ok: true, outcome, state: state.toSnapshot(this.now()) };
    });
  }

  leaveGame(roomId: string, playerId: number): Promise<OperationResult> {
    return this.inRoom(roomId, () => {
      const state = this.requireRoom(roomId);
      const player = state.getPlayer(playerId);
      if (!player) {
        return { ok: false, error: "You are not in this game." };
      }

      const heldTurn = state.isActive && state.currentPlayer()?.id === playerId;
      state.removePlayer(playerId);
      this.metrics.recordPlayers(roomId, state.players.length, this.now());
      this.events.publish({ type: "player_left", roomId, player: toPublicPlayer(player) });

      return this.settleAfterRosterChange(state, heldTurn);
    });
  }

  /** Marks a player as away (or back) without removing them. */
  setPlayerActive(roomId: string, playerId: number, active: boolean): Promise<OperationResult> {
    return this.inRoom(roomId, () => {
      const state = this.requireRoom(roomId);
      const before = state.currentPlayer()?.id;

      if (!state.setPlayerActive(playerId, active, this.now())) {
        return { ok: false, error: "You are not in this game." };
      }

      const turnMoved = state.isActive && state.currentPlayer()?.id !== before;
      return this.settleAfterRosterChange(state, turnMoved);
    });
  }

  async stopGame(roomId: string): Promise<boolean> {
    return this.locks.withRoomLock(roomId, () => this.stopRoom(roomId, "stopped"));
  }

  getState(roomId: string): PublicGameState | undefined {
    return this.registry.get(roomId)?.toSnapshot(this.now());
  }

  hint(roomId: string): WordHint | undefined {
    const state = this.registry.get(roomId);
    return state?.isActive ? this.processor.hint(state) : undefined;
  }

  /** Stops rooms with no recorded activity in the idle window and drops stale locks. */
  async sweepIdleRooms(now: number = this.now()): Promise<number> {
    let stopped = 0;

    for (const roomId of this.metrics.inactiveRooms(this.idleRoomMs, now)) {
      try {
        if (await this.locks.withRoomLock(roomId, () => this.stopRoom(roomId, "idle"))) {
          stopped += 1;
        }
      } catch (error) {
        this.logger?.error({ roomId, err: describeError(error) }, "failed to stop idle room");
      }
    }

    const reclaimed = this.locks.reclaimIdle(this.lockReclaimMs, now);
    if (stopped > 0) {
      this.logger?.info({ stopped, reclaimed }, "idle rooms swept");
    }

    return stopped;
  }

  status(): SystemStatus {
    const roomCount = this.registry.size;

    return {
      roomCount,
      load: this.admission.classify(roomCount),
      limits: {
        maxRooms: this.admission.maxRooms,
        maxPlayersPerRoom: this.admission.maxPlayersPerRoom,
      },
      totalPlayers: this.registry.totalPlayers(),
      activeTimers: this.timers.activeCount(),
      lockedRooms: this.locks.size,
      warnings: this.admission.warnings(WARNING_WINDOW_MS),
      metrics: this.metrics.snapshot(this.now()),
    };
  }

  private seatPlayer(roomId: string, request: JoinRequest): OperationResult {
    const name = sanitizePlayerName(request.name) || `Player ${request.id}`;
    const player: Player = { id: request.id, name, active: true };
    const existing = this.registry.get(roomId);

    if (!existing) {
      // A new room seats only its creator; later seats are capped by GameState.addPlayer.
      const decision = this.admission.canAdmit(this.registry.size, 1);
      if (!decision.allowed) {
        throw new GameError("ADMISSION_DENIED", decision.reason ?? "Cannot start a new game right now.");
      }

      const state = this.registry.createWaiting(roomId, player, this.gameConfig);
      this.events.publish({
        type: "game_created",
        roomId,
        player: toPublicPlayer(player),
        waitingSeconds: state.config.waitingSeconds,
      });
      this.startWaitingTimer(state);
      return this.success(state);
    }

    if (existing.hasPlayer(player.id)) {
      // Rejoining brings a player who went away back into the rotation.
      existing.setPlayerActive(player.id, true, this.now());
      return this.success(existing);
    }

    if (existing.status !== "waiting") {
      throw new GameError("GAME_RUNNING", "This game has already started.");
    }

    if (!existing.addPlayer(player)) {
      throw new GameError("ROOM_FULL", `This game is full (max ${existing.config.maxPlayersPerRoom}).`);
    }

    this.metrics.recordPlayers(roomId, existing.players.length, this.now());
    this.events.publish({
      type: "player_joined",
      roomId,
      player: toPublicPlayer(player),
      playerCount: existing.players.length,
    });

    return this.success(existing);
  }

  private startWaitingTimer(state: GameState): void {
    const { roomId } = state;
    const waitingSeconds = state.config.waitingSeconds;
    if (waitingSeconds <= 0) {
      return;
    }

    this.timers.start(waitingTimerKey(roomId), {
      durationMs: waitingSeconds * 1000,
      warningOffsetsMs: WAITING_COUNTDOWN_SECONDS.filter((seconds) => seconds < waitingSeconds).map(
        (seconds) => seconds * 1000,
      ),
      onWarning: (_key, remainingMs) => {
        const current = this.registry.get(roomId);
        if (current?.status !== "waiting") {
          return;
        }
        this.events.publish({
          type: "waiting_countdown",
          roomId,
          remainingSeconds: Math.ceil(remainingMs / 1000),
          playerCount: current.players.length,
        });
      },
      onTimeout: () => this.locks.withRoomLock(roomId, () => this.closeWaitingWindow(roomId)),
    });
  }

  private closeWaitingWindow(roomId: string): void {
    const state = this.registry.get(roomId);
    if (state?.status !== "waiting") {
      return;
    }

    if (state.activePlayers().length < MIN_PLAYERS_TO_START) {
      this.logger?.info({ roomId }, "grace window ended without enough players");
      this.stopRoom(roomId, "not_enough_players");
      return;
    }

    this.launch(this.registry.promoteToActive(roomId));
  }

  private launch(state: GameState): void {
    this.events.publish({
      type: "game_started",
      roomId: state.roomId,
      players: state.players.map(toPublicPlayer),
      letter: state.currentLetter,
      requiredLength: state.requiredLength,
    });
    this.scheduler.beginTurn(state.roomId);
  }

  private settleAfterRosterChange(state: GameState, turnChanged: boolean): OperationResult {
    const { roomId } = state;

    if (state.status === "waiting") {
      if (state.players.length === 0) {
        this.stopRoom(roomId, "no_players");
        return { ok: true };
      }
      return this.success(state);
    }

    if (state.shouldTerminate()) {
      this.scheduler.endGame(roomId);
      return { ok: true, state: state.toSnapshot(this.now()) };
    }

    if (turnChanged) {
      state.skipInactive(this.now());
      this.scheduler.beginTurn(roomId);
    }

    return this.success(state);
  }

  private stopRoom(roomId: string, reason: "stopped" | "idle" | "no_players" | "not_enough_players"): boolean {
    const state = this.registry.get(roomId);
    if (!state) {
      return false;
    }

    this.registry.stop(roomId);
    this.events.publish({ type: "game_ended", roomId, winner: null, reason });
    return true;
  }

  private requireRoom(roomId: string): GameState {
    const state = this.registry.get(roomId);
    if (!state) {
      throw new GameError("ROOM_NOT_FOUND", "No game in this room.");
    }
    return state;
  }

  private success(state: GameState): OperationResult {
    return { ok: true, state: state.toSnapshot(this.now()) };
  }

  private async inRoom(roomId: string, operation: () => OperationResult): Promise<OperationResult> {
    try {
      return await this.locks.withRoomLock(roomId, operation);
    } catch (error) {
      if (isGameError(error)) {
        return { ok: false, error: error.message, code: error.code };
      }
      this.logger?.error({ roomId, err: describeError(error) }, "room operation failed");
      return { ok: false, error: "Something went wrong. Try again." };
    }
  }
}
