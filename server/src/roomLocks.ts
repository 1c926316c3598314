import type { Logger } from "pino";

interface RoomGate {
  tail: Promise<void>;
  pending: number;
  lastAccess: number;
}

/**
 * One FIFO gate per room. Work for the same room runs one operation at a
 * time; different rooms never wait on each other.
 */
export class RoomIsolationManager {
  private readonly gates = new Map<string, RoomGate>();

  constructor(
    private readonly logger?: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  async withRoomLock<T>(roomId: string, operation: () => T | Promise<T>): Promise<T> {
    const gate = this.gateFor(roomId);
    const previous = gate.tail;

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    gate.tail = previous.then(() => current);
    gate.pending += 1;

    await previous;
    gate.lastAccess = this.now();
    try {
      return await operation();
    } finally {
      gate.pending -= 1;
      gate.lastAccess = this.now();
      release();
    }
  }

  /** Drops gates untouched for `olderThanMs` with nothing queued. */
  reclaimIdle(olderThanMs: number, now: number = this.now()): number {
    const cutoff = now - olderThanMs;
    let reclaimed = 0;

    for (const [roomId, gate] of this.gates) {
      if (gate.pending === 0 && gate.lastAccess < cutoff) {
        this.gates.delete(roomId);
        reclaimed += 1;
      }
    }

    if (reclaimed > 0) {
      this.logger?.info({ reclaimed }, "reclaimed idle room locks");
    }

    return reclaimed;
  }

  isLocked(roomId: string): boolean {
    return (this.gates.get(roomId)?.pending ?? 0) > 0;
  }

  rooms(): string[] {
    return [...this.gates.keys()];
  }

  get size(): number {
    return this.gates.size;
  }

  private gateFor(roomId: string): RoomGate {
    const existing = this.gates.get(roomId);
    if (existing) {
      return existing;
    }

    const gate: RoomGate = { tail: Promise.resolve(), pending: 0, lastAccess: this.now() };
    this.gates.set(roomId, gate);
    return gate;
  }
}
