import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MetricsTracker } from "../metrics";
import { RoomRegistry, turnTimerKey, waitingTimerKey } from "../roomRegistry";
import { TimerEngine } from "../timerEngine";
import { createConfig, createPlayer, silentLogger } from "./helpers";

function thrown(operation: () => unknown): unknown {
  try {
    operation();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("RoomRegistry", () => {
  let timers: TimerEngine;
  let metrics: MetricsTracker;
  let registry: RoomRegistry;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    timers = new TimerEngine();
    metrics = new MetricsTracker(() => 0);
    registry = new RoomRegistry({ timers, metrics, logger: silentLogger, now: () => 1_000, pickLetter: () => "c" });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("creates a waiting room around the first player", () => {
    const state = registry.createWaiting("room", createPlayer(1, "Alice"), createConfig({ minWordLength: 3 }));

    expect(state.status).toBe("waiting");
    expect(state.currentLetter).toBe("C");
    expect(state.requiredLength).toBe(3);
    expect(state.createdAt).toBe(1_000);
    expect(Object.isFrozen(state.config)).toBe(true);
    expect(registry.get("room")).toBe(state);
    expect(metrics.get("room", 1_000)?.playerCount).toBe(1);
  });

  it("refuses a second game in the same room", () => {
    registry.createWaiting("room", createPlayer(1, "Alice"), createConfig());

    const error = thrown(() => registry.createWaiting("room", createPlayer(2, "Bob"), createConfig()));

    expect(error).toMatchObject({ code: "ROOM_EXISTS" });
    expect(registry.size).toBe(1);
  });

  it("keeps each room's config independent of the caller's object", () => {
    const config = createConfig({ warningOffsets: [10] });
    const state = registry.createWaiting("room", createPlayer(1, "Alice"), config);

    config.warningOffsets.push(5);

    expect(state.config.warningOffsets).toEqual([10]);
  });

  it("validates promotion", () => {
    expect(thrown(() => registry.promoteToActive("missing"))).toMatchObject({ code: "ROOM_NOT_FOUND" });

    const state = registry.createWaiting("room", createPlayer(1, "Alice"), createConfig());
    expect(thrown(() => registry.promoteToActive("room"))).toMatchObject({ code: "NOT_ENOUGH_PLAYERS" });

    state.addPlayer(createPlayer(2, "Bob"));
    expect(registry.promoteToActive("room")).toBe(state);
    expect(state.status).toBe("active");
    expect(state.startedAt).toBe(1_000);
    expect(state.currentPlayer()?.name).toBe("Alice");
    expect(registry.activeCount()).toBe(1);

    expect(thrown(() => registry.promoteToActive("room"))).toMatchObject({ code: "NOT_WAITING" });
  });

  it("counts only present players towards the start minimum", () => {
    const state = registry.createWaiting("room", createPlayer(1, "Alice"), createConfig());
    state.addPlayer(createPlayer(2, "Bob", false));

    expect(thrown(() => registry.promoteToActive("room"))).toMatchObject({
      code: "NOT_ENOUGH_PLAYERS",
      message: "Need at least 2 present players to start.",
    });
    expect(state.status).toBe("waiting");
  });

  it("cancels the grace-window timer on promotion", () => {
    const state = registry.createWaiting("room", createPlayer(1, "Alice"), createConfig());
    state.addPlayer(createPlayer(2, "Bob"));
    const onTimeout = vi.fn();
    timers.start(waitingTimerKey("room"), { durationMs: 60_000, onTimeout });

    registry.promoteToActive("room");
    vi.advanceTimersByTime(60_000);

    expect(onTimeout).not.toHaveBeenCalled();
  });

  it("stops a room once, cancelling its timers and metrics", () => {
    const state = registry.createWaiting("room", createPlayer(1, "Alice"), createConfig());
    timers.start(turnTimerKey("room"), { durationMs: 30_000, onTimeout: () => undefined });
    timers.start(waitingTimerKey("room"), { durationMs: 30_000, onTimeout: () => undefined });

    expect(registry.stop("room")).toBe(true);
    expect(registry.stop("room")).toBe(false);

    expect(state.status).toBe("terminated");
    expect(timers.activeCount()).toBe(0);
    expect(metrics.get("room")).toBeUndefined();
    expect(registry.has("room")).toBe(false);
  });

  it("reports false for stopping a room that never existed", () => {
    expect(registry.stop("nowhere")).toBe(false);
    expect(registry.stop("nowhere")).toBe(false);
  });

  it("stops every room and counts players across rooms", () => {
    const first = registry.createWaiting("a", createPlayer(1, "Alice"), createConfig());
    first.addPlayer(createPlayer(2, "Bob"));
    registry.createWaiting("b", createPlayer(3, "Cara"), createConfig());

    expect(registry.totalPlayers()).toBe(3);
    expect(registry.stopAll()).toBe(2);
    expect(registry.size).toBe(0);
  });
});
