import type { MetricsSnapshot, RoomMetrics } from "./types";

interface History {
  completedRooms: number;
  wordsAccepted: number;
  timeouts: number;
  errors: number;
  totalDurationMs: number;
}

const HOUR_MS = 60 * 60 * 1000;

export class MetricsTracker {
  private readonly rooms = new Map<string, RoomMetrics>();
  private readonly history: History = {
    completedRooms: 0,
    wordsAccepted: 0,
    timeouts: 0,
    errors: 0,
    totalDurationMs: 0,
  };
  private readonly bootedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.bootedAt = now();
  }

  track(roomId: string, playerCount: number, at: number = this.now()): RoomMetrics {
    const existing = this.rooms.get(roomId);
    if (existing) {
      existing.playerCount = playerCount;
      existing.lastActivity = at;
      return existing;
    }

    const metrics: RoomMetrics = {
      roomId,
      playerCount,
      startedAt: at,
      durationMs: 0,
      turnsTaken: 0,
      wordsAccepted: 0,
      timeouts: 0,
      errors: 0,
      lastActivity: at,
    };
    this.rooms.set(roomId, metrics);
    return metrics;
  }

  recordPlayers(roomId: string, playerCount: number, at: number = this.now()): void {
    this.touch(roomId, at, (metrics) => {
      metrics.playerCount = playerCount;
    });
  }

  recordWord(roomId: string, at: number = this.now()): void {
    this.touch(roomId, at, (metrics) => {
      metrics.wordsAccepted += 1;
      metrics.turnsTaken += 1;
    });
  }

  recordTimeout(roomId: string, at: number = this.now()): void {
    this.touch(roomId, at, (metrics) => {
      metrics.timeouts += 1;
      metrics.turnsTaken += 1;
    });
  }

  recordError(roomId: string, at: number = this.now()): void {
    this.touch(roomId, at, (metrics) => {
      metrics.errors += 1;
    });
  }

  /** Folds the room's counters into the historical totals. */
  remove(roomId: string, at: number = this.now()): boolean {
    const metrics = this.rooms.get(roomId);
    if (!metrics) {
      return false;
    }

    this.rooms.delete(roomId);
    this.history.completedRooms += 1;
    this.history.wordsAccepted += metrics.wordsAccepted;
    this.history.timeouts += metrics.timeouts;
    this.history.errors += metrics.errors;
    this.history.totalDurationMs += at - metrics.startedAt;
    return true;
  }

  get(roomId: string, at: number = this.now()): RoomMetrics | undefined {
    const metrics = this.rooms.get(roomId);
    return metrics ? { ...metrics, durationMs: at - metrics.startedAt } : undefined;
  }

  inactiveRooms(idleMs: number, at: number = this.now()): string[] {
    const cutoff = at - idleMs;
    return [...this.rooms.values()]
      .filter((metrics) => metrics.lastActivity < cutoff)
      .map((metrics) => metrics.roomId);
  }

  snapshot(at: number = this.now()): MetricsSnapshot {
    const rooms = [...this.rooms.values()].map((metrics) => ({
      ...metrics,
      durationMs: at - metrics.startedAt,
    }));
    const totalRooms = this.history.completedRooms + rooms.length;
    const uptimeMs = at - this.bootedAt;
    const totalDurationMs =
      this.history.totalDurationMs + rooms.reduce((sum, metrics) => sum + metrics.durationMs, 0);

    return {
      rooms,
      activeRooms: rooms.length,
      totalRooms,
      completedRooms: this.history.completedRooms,
      wordsAccepted: this.history.wordsAccepted + rooms.reduce((sum, m) => sum + m.wordsAccepted, 0),
      timeouts: this.history.timeouts + rooms.reduce((sum, m) => sum + m.timeouts, 0),
      errors: this.history.errors + rooms.reduce((sum, m) => sum + m.errors, 0),
      uptimeMs,
      gamesPerHour: uptimeMs > 0 ? (totalRooms / uptimeMs) * HOUR_MS : 0,
      averageDurationMs: totalRooms > 0 ? totalDurationMs / totalRooms : 0,
    };
  }

  private touch(roomId: string, at: number, update: (metrics: RoomMetrics) => void): void {
    const metrics = this.rooms.get(roomId);
    if (!metrics) {
      return;
    }

    update(metrics);
    metrics.lastActivity = at;
  }
}
