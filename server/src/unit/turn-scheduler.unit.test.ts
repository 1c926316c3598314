import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GameEventBus } from "../events";
import { GameState } from "../gameState";
import { MetricsTracker } from "../metrics";
import { RoomIsolationManager } from "../roomLocks";
import { RoomRegistry, turnTimerKey } from "../roomRegistry";
import { TimerEngine } from "../timerEngine";
import { TurnScheduler } from "../turnScheduler";
import type { GameConfig, GameEvent, Player } from "../types";
import { collectEvents, createConfig, createPlayer, eventsOfType, silentLogger } from "./helpers";

interface Harness {
  timers: TimerEngine;
  locks: RoomIsolationManager;
  registry: RoomRegistry;
  metrics: MetricsTracker;
  scheduler: TurnScheduler;
  events: GameEvent[];
  state: GameState;
}

function setup(players: Player[], config: Partial<GameConfig> = {}): Harness {
  const timers = new TimerEngine({ logger: silentLogger });
  const locks = new RoomIsolationManager(silentLogger);
  const metrics = new MetricsTracker();
  const bus = new GameEventBus(silentLogger);
  const registry = new RoomRegistry({ timers, metrics, logger: silentLogger, pickLetter: () => "C" });
  const scheduler = new TurnScheduler({ timers, registry, locks, events: bus, metrics, logger: silentLogger });
  const events = collectEvents(bus);

  const [first, ...rest] = players;
  const state = registry.createWaiting(
    "room",
    first,
    createConfig({ turnSeconds: 5, warningOffsets: [], ...config }),
  );
  rest.forEach((player) => state.addPlayer(player));
  registry.promoteToActive("room");

  return { timers, locks, registry, metrics, scheduler, events, state };
}

async function flush(): Promise<void> {
  for (let round = 0; round < 10; round += 1) {
    await Promise.resolve();
  }
}

const alice = () => createPlayer(1, "Alice");
const bob = () => createPlayer(2, "Bob");
const cara = () => createPlayer(3, "Cara");

describe("TurnScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts a turn with a fresh token and announces it", () => {
    const { scheduler, timers, events, state } = setup([alice(), bob()]);

    expect(scheduler.beginTurn("room")).toBe(true);

    expect(state.timerToken).toBe(timers.handle(turnTimerKey("room"))?.id);
    expect(eventsOfType(events, "turn_started")).toEqual([
      {
        type: "turn_started",
        roomId: "room",
        at: 0,
        player: { id: 1, name: "Alice", active: true },
        letter: "C",
        requiredLength: 2,
        timeoutSeconds: 5,
      },
    ]);
  });

  it("does not start turns for rooms that are not playing", () => {
    const { scheduler, registry } = setup([alice(), bob()]);
    registry.stop("room");

    expect(scheduler.beginTurn("room")).toBe(false);
    expect(scheduler.beginTurn("elsewhere")).toBe(false);
  });

  it("eliminates the player who runs out of time and moves on", async () => {
    const { scheduler, events, state, metrics } = setup([alice(), bob(), cara()]);
    scheduler.beginTurn("room");

    await vi.advanceTimersByTimeAsync(5_000);

    expect(eventsOfType(events, "player_eliminated")).toEqual([
      {
        type: "player_eliminated",
        roomId: "room",
        at: 5_000,
        player: { id: 1, name: "Alice", active: true },
        remainingPlayers: 2,
      },
    ]);
    expect(state.players.map((player) => player.name)).toEqual(["Bob", "Cara"]);
    expect(state.currentPlayer()?.name).toBe("Bob");
    expect(eventsOfType(events, "turn_started").map((event) => event.player.name)).toEqual(["Alice", "Bob"]);
    expect(metrics.get("room")?.timeouts).toBe(1);
  });

  it("declares the last player standing the winner", async () => {
    const { scheduler, events, registry, timers } = setup([alice(), bob()]);
    scheduler.beginTurn("room");

    await vi.advanceTimersByTimeAsync(5_000);

    expect(eventsOfType(events, "game_ended")).toEqual([
      { type: "game_ended", roomId: "room", at: 5_000, winner: { id: 2, name: "Bob", active: true }, reason: "winner" },
    ]);
    expect(registry.has("room")).toBe(false);
    expect(timers.activeCount()).toBe(0);
  });

  it("skips instead of eliminating under the skip policy", async () => {
    const { scheduler, events, state } = setup([alice(), bob()], { timeoutPolicy: "skip" });
    scheduler.beginTurn("room");

    await vi.advanceTimersByTimeAsync(5_000);

    expect(eventsOfType(events, "player_skipped").map((event) => event.player.id)).toEqual([1]);
    expect(state.players).toHaveLength(2);
    expect(state.currentPlayer()?.name).toBe("Bob");
    expect(state.isActive).toBe(true);
  });

  it("warns with whole seconds remaining", async () => {
    const { scheduler, events } = setup([alice(), bob()], { turnSeconds: 10, warningOffsets: [5, 2] });
    scheduler.beginTurn("room");

    await vi.advanceTimersByTimeAsync(8_000);

    expect(eventsOfType(events, "turn_warning").map((event) => event.remainingSeconds)).toEqual([5, 2]);
    expect(eventsOfType(events, "turn_warning")[0].player?.name).toBe("Alice");
  });

  it("ignores a timeout whose turn was replaced while it waited for the room", async () => {
    const { scheduler, locks, events, state } = setup([alice(), bob(), cara()]);
    scheduler.beginTurn("room");

    let release: () => void = () => undefined;
    const held = locks.withRoomLock(
      "room",
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    await vi.advanceTimersByTimeAsync(5_000);

    // A word landed first: the old turn was cancelled and a new one started.
    scheduler.cancelTurn("room");
    scheduler.beginTurn("room");
    release();
    await held;
    await flush();

    expect(eventsOfType(events, "player_eliminated")).toEqual([]);
    expect(state.players).toHaveLength(3);
    expect(state.currentPlayer()?.name).toBe("Alice");
  });

  it("never fires a cancelled turn", async () => {
    const { scheduler, events, state } = setup([alice(), bob()]);
    scheduler.beginTurn("room");

    expect(scheduler.cancelTurn("room")).toBe(true);
    expect(state.timerToken).toBeNull();
    await vi.advanceTimersByTimeAsync(10_000);

    expect(eventsOfType(events, "player_eliminated")).toEqual([]);
  });

  it("ends a game with the given reason and no winner when nobody is left", () => {
    const { scheduler, events, state } = setup([alice(), bob()]);
    state.setPlayerActive(1, false);
    state.setPlayerActive(2, false);

    expect(scheduler.endGame("room")).toBeNull();
    expect(scheduler.endGame("room")).toBeNull();

    expect(eventsOfType(events, "game_ended").map((event) => event.reason)).toEqual(["no_players"]);
    expect(state.status).toBe("terminated");
  });
});
