import type { Logger } from "pino";
import { describeError } from "./errors";

export type TimerState = "running" | "cancelled" | "expired";

export type TimeoutCallback = (key: string) => void | Promise<void>;
export type WarningCallback = (key: string, remainingMs: number) => void | Promise<void>;

export interface TimerOptions {
  durationMs: number;
  onTimeout: TimeoutCallback;
  onWarning?: WarningCallback;
  /** Milliseconds before timeout at which a warning fires once. */
  warningOffsetsMs?: number[];
}

export interface TimerHandle {
  readonly id: number;
  readonly key: string;
  readonly durationMs: number;
  readonly startedAt: number;
  readonly state: TimerState;
  readonly firedWarnings: ReadonlySet<number>;
}

export interface TimerEngineOptions {
  tickMs?: number;
  logger?: Logger;
  now?: () => number;
}

interface Countdown extends TimerHandle {
  state: TimerState;
  readonly firedWarnings: Set<number>;
  readonly offsets: number[];
  readonly onTimeout: TimeoutCallback;
  readonly onWarning?: WarningCallback;
  timeout: NodeJS.Timeout | null;
}

const DEFAULT_TICK_MS = 1000;

/**
 * Keyed countdowns. One running timer per key; starting a key again
 * replaces the previous countdown. Each tick checks that its countdown
 * is still the one registered for the key before doing anything.
 */
export class TimerEngine {
  private readonly timers = new Map<string, Countdown>();
  private readonly tickMs: number;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private nextId = 1;

  constructor(options: TimerEngineOptions = {}) {
    this.tickMs = Math.max(1, options.tickMs ?? DEFAULT_TICK_MS);
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  start(key: string, options: TimerOptions): TimerHandle {
    this.cancel(key);

    const countdown: Countdown = {
      id: this.nextId++,
      key,
      durationMs: Math.max(0, options.durationMs),
      startedAt: this.now(),
      state: "running",
      firedWarnings: new Set<number>(),
      offsets: [...new Set(options.warningOffsetsMs ?? [])].sort((a, b) => b - a),
      onTimeout: options.onTimeout,
      onWarning: options.onWarning,
      timeout: null,
    };

    this.timers.set(key, countdown);
    this.schedule(countdown, 0);
    this.logger?.debug({ key, durationMs: countdown.durationMs, timerId: countdown.id }, "timer started");

    return countdown;
  }

  cancel(key: string): boolean {
    const countdown = this.timers.get(key);
    if (!countdown) {
      return false;
    }

    this.timers.delete(key);
    countdown.state = "cancelled";
    if (countdown.timeout) {
      clearTimeout(countdown.timeout);
      countdown.timeout = null;
    }

    this.logger?.debug({ key, timerId: countdown.id }, "timer cancelled");
    return true;
  }

  cancelAll(): number {
    const keys = [...this.timers.keys()];
    for (const key of keys) {
      this.cancel(key);
    }
    return keys.length;
  }

  isActive(key: string): boolean {
    return this.timers.has(key);
  }

  handle(key: string): TimerHandle | undefined {
    return this.timers.get(key);
  }

  activeCount(): number {
    return this.timers.size;
  }

  remainingMs(key: string): number | undefined {
    const countdown = this.timers.get(key);
    if (!countdown) {
      return undefined;
    }

    return Math.max(0, countdown.durationMs - (this.now() - countdown.startedAt));
  }

  private isCurrent(countdown: Countdown): boolean {
    return countdown.state === "running" && this.timers.get(countdown.key) === countdown;
  }

  private schedule(countdown: Countdown, delayMs: number): void {
    countdown.timeout = setTimeout(() => this.tick(countdown), delayMs);
  }

  private tick(countdown: Countdown): void {
    countdown.timeout = null;
    if (!this.isCurrent(countdown)) {
      return;
    }

    const remaining = countdown.durationMs - (this.now() - countdown.startedAt);
    if (remaining <= 0) {
      this.expire(countdown);
      return;
    }

    for (const offset of countdown.offsets) {
      if (remaining > offset || countdown.firedWarnings.has(offset)) {
        continue;
      }

      countdown.firedWarnings.add(offset);
      this.invoke(countdown, "warning", () => countdown.onWarning?.(countdown.key, remaining));

      // A warning callback may cancel or replace this timer.
      if (!this.isCurrent(countdown)) {
        return;
      }
    }

    this.schedule(countdown, this.nextDelay(countdown, remaining));
  }

  private nextDelay(countdown: Countdown, remaining: number): number {
    const pending = countdown.offsets.find(
      (offset) => offset < remaining && !countdown.firedWarnings.has(offset),
    );
    const untilWarning = pending === undefined ? remaining : remaining - pending;
    return Math.max(1, Math.min(this.tickMs, untilWarning, remaining));
  }

  private expire(countdown: Countdown): void {
    this.timers.delete(countdown.key);
    countdown.state = "expired";
    this.logger?.debug({ key: countdown.key, timerId: countdown.id }, "timer expired");
    this.invoke(countdown, "timeout", () => countdown.onTimeout(countdown.key));
  }

  private invoke(
    countdown: Countdown,
    phase: "warning" | "timeout",
    callback: () => void | Promise<void>,
  ): void {
    const report = (error: unknown): void => {
      this.logger?.error(
        { key: countdown.key, timerId: countdown.id, phase, err: describeError(error) },
        "timer callback failed",
      );
    };

    try {
      const pending = callback();
      if (pending instanceof Promise) {
        pending.catch(report);
      }
    } catch (error) {
      report(error);
    }
  }
}
