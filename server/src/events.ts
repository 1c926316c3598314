import type { Logger } from "pino";
import { describeError } from "./errors";
import type { GameEvent } from "./types";

export type GameEventListener = (event: GameEvent) => void;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type GameEventInput = DistributiveOmit<GameEvent, "at">;

/**
 * In-process channel between the game core and whatever delivers
 * notifications. Listeners run synchronously in subscription order; a
 * throwing listener is logged and does not stop delivery to the rest.
 */
export class GameEventBus {
  private readonly listeners = new Set<GameEventListener>();

  constructor(
    private readonly logger?: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  subscribe(listener: GameEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(input: GameEventInput): GameEvent {
    const event: GameEvent = { ...input, at: this.now() };

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger?.error(
          { roomId: event.roomId, type: event.type, err: describeError(error) },
          "event listener failed",
        );
      }
    }

    return event;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
