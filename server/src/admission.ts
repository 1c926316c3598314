import type { Logger } from "pino";
import type { AdmissionDecision, LoadLevel, ResourceWarning } from "./types";

export interface AdmissionLimits {
  maxRooms: number;
  maxPlayersPerRoom: number;
  /** Most recent warnings kept in memory. */
  warningLimit?: number;
}

const DEFAULT_WARNING_LIMIT = 50;

export class AdmissionController {
  readonly maxRooms: number;
  readonly maxPlayersPerRoom: number;
  private readonly warningLimit: number;
  private readonly recent: ResourceWarning[] = [];

  constructor(
    limits: AdmissionLimits,
    private readonly logger?: Logger,
    private readonly now: () => number = Date.now,
  ) {
    this.maxRooms = Math.max(1, limits.maxRooms);
    this.maxPlayersPerRoom = Math.max(1, limits.maxPlayersPerRoom);
    this.warningLimit = Math.max(1, limits.warningLimit ?? DEFAULT_WARNING_LIMIT);
  }

  classify(roomCount: number): LoadLevel {
    const usage = roomCount / this.maxRooms;

    if (usage >= 0.9) {
      return "critical";
    }
    if (usage >= 0.7) {
      return "high";
    }
    if (usage >= 0.4) {
      return "medium";
    }
    return "low";
  }

  canAdmit(roomCount: number, requestedPlayers: number): AdmissionDecision {
    const load = this.classify(roomCount);
    if (load === "high" || load === "critical") {
      this.recordWarning(`${load} load: ${roomCount}/${this.maxRooms} rooms active`);
    }

    if (roomCount >= this.maxRooms) {
      return { allowed: false, load, reason: `Maximum concurrent games reached (${this.maxRooms}).` };
    }

    if (requestedPlayers > this.maxPlayersPerRoom) {
      return {
        allowed: false,
        load,
        reason: `Too many players for one game (max ${this.maxPlayersPerRoom}).`,
      };
    }

    if (load === "critical") {
      return { allowed: false, load, reason: "Server is at capacity. Try again later." };
    }

    return { allowed: true, load };
  }

  /** Warnings newer than `withinMs`, oldest first. */
  warnings(withinMs?: number): ResourceWarning[] {
    if (withinMs === undefined) {
      return [...this.recent];
    }

    const cutoff = this.now() - withinMs;
    return this.recent.filter((warning) => warning.at >= cutoff);
  }

  private recordWarning(message: string): void {
    this.recent.push({ at: this.now(), message });
    if (this.recent.length > this.warningLimit) {
      this.recent.splice(0, this.recent.length - this.warningLimit);
    }

    this.logger?.warn(message);
  }
}
