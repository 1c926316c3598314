import type { GameConfig, GameStatus, Player, PublicGameState } from "./types";
import { toPublicPlayer } from "./utils";

export interface GameStateInit {
  roomId: string;
  config: GameConfig;
  letter: string;
  players?: Player[];
  now?: number;
}

/**
 * Per-room game aggregate. Mutations keep the turn index pointing at a
 * player (or leave the game without a legal move) and never shrink the
 * used-word set or the required length.
 */
export class GameState {
  readonly roomId: string;
  readonly config: GameConfig;
  readonly players: Player[];
  readonly createdAt: number;

  status: GameStatus = "waiting";
  currentIndex = 0;
  currentLetter: string;
  turnStartedAt: number | null = null;
  startedAt: number | null = null;
  roundTurns = 0;
  roundsCompleted = 0;
  timerToken: number | null = null;
  winnerId: number | null = null;

  private requiredLengthValue: number;
  private readonly usedWordSet = new Set<string>();
  private readonly usedWordsOrdered: string[] = [];

  constructor(init: GameStateInit) {
    this.roomId = init.roomId;
    this.config = init.config;
    this.players = [...(init.players ?? [])];
    this.currentLetter = init.letter.toUpperCase();
    this.requiredLengthValue = init.config.minWordLength;
    this.createdAt = init.now ?? Date.now();
  }

  get requiredLength(): number {
    return this.requiredLengthValue;
  }

  get usedWords(): ReadonlySet<string> {
    return this.usedWordSet;
  }

  get isActive(): boolean {
    return this.status === "active";
  }

  currentPlayer(): Player | undefined {
    if (this.players.length === 0) {
      return undefined;
    }

    if (
      !Number.isInteger(this.currentIndex) ||
      this.currentIndex < 0 ||
      this.currentIndex >= this.players.length
    ) {
      return undefined;
    }

    return this.players[this.currentIndex];
  }

  nextPlayer(): Player | undefined {
    if (this.players.length === 0) {
      return undefined;
    }

    return this.players[(this.currentIndex + 1) % this.players.length];
  }

  /** Players starting from whoever holds the turn. */
  turnOrder(): Player[] {
    const index = this.currentIndex % Math.max(1, this.players.length);
    return [...this.players.slice(index), ...this.players.slice(0, index)];
  }

  activePlayers(): Player[] {
    return this.players.filter((player) => player.active);
  }

  getPlayer(playerId: number): Player | undefined {
    return this.players.find((player) => player.id === playerId);
  }

  hasPlayer(playerId: number): boolean {
    return this.players.some((player) => player.id === playerId);
  }

  advanceTurn(now: number = Date.now()): void {
    if (this.players.length === 0) {
      return;
    }

    this.currentIndex = (this.currentIndex + 1) % this.players.length;
    this.turnStartedAt = now;
  }

  addPlayer(player: Player): boolean {
    if (this.hasPlayer(player.id)) {
      return false;
    }

    if (this.players.length >= this.config.maxPlayersPerRoom) {
      return false;
    }

    this.players.push(player);
    return true;
  }

  removePlayer(playerId: number): boolean {
    const index = this.players.findIndex((player) => player.id === playerId);
    if (index === -1) {
      return false;
    }

    this.players.splice(index, 1);

    if (index < this.currentIndex) {
      this.currentIndex -= 1;
    } else if (this.currentIndex >= this.players.length) {
      // The removed player held the last seat; the turn wraps to the front.
      this.currentIndex = 0;
    }

    return true;
  }

  skipInactive(now: number = Date.now()): void {
    if (this.players.length === 0) {
      return;
    }

    for (let attempt = 0; attempt < this.players.length; attempt += 1) {
      if (this.currentPlayer()?.active) {
        break;
      }
      this.currentIndex = (this.currentIndex + 1) % this.players.length;
    }

    this.turnStartedAt = now;
  }

  setPlayerActive(playerId: number, active: boolean, now: number = Date.now()): boolean {
    const player = this.getPlayer(playerId);
    if (!player) {
      return false;
    }

    player.active = active;
    if (!active && this.currentPlayer()?.id === playerId) {
      this.skipInactive(now);
    }

    return true;
  }

  shouldTerminate(): boolean {
    return this.activePlayers().length <= 1;
  }

  remainingTurnMs(now: number = Date.now()): number | undefined {
    if (this.turnStartedAt === null) {
      return undefined;
    }

    const elapsed = now - this.turnStartedAt;
    return Math.max(0, this.config.turnSeconds * 1000 - elapsed);
  }

  markUsed(word: string): void {
    const normalized = word.toLowerCase();
    if (this.usedWordSet.has(normalized)) {
      return;
    }

    this.usedWordSet.add(normalized);
    this.usedWordsOrdered.push(normalized);
  }

  /** Raises the required length; values below the current one are ignored. */
  raiseRequiredLength(next: number): boolean {
    if (next <= this.requiredLengthValue) {
      return false;
    }

    this.requiredLengthValue = next;
    return true;
  }

  activate(now: number = Date.now()): void {
    this.status = "active";
    this.startedAt = now;
    this.turnStartedAt = now;
    this.currentIndex = 0;
    this.skipInactive(now);
  }

  terminate(winnerId: number | null = null): void {
    this.status = "terminated";
    this.winnerId = winnerId;
    this.timerToken = null;
    this.turnStartedAt = null;
  }

  toSnapshot(now: number = Date.now()): PublicGameState {
    return {
      roomId: this.roomId,
      status: this.status,
      players: this.players.map(toPublicPlayer),
      currentPlayerId: this.isActive ? this.currentPlayer()?.id ?? null : null,
      currentLetter: this.currentLetter,
      requiredLength: this.requiredLengthValue,
      usedWords: [...this.usedWordsOrdered],
      roundsCompleted: this.roundsCompleted,
      remainingMs: this.isActive ? this.remainingTurnMs(now) ?? 0 : 0,
      winnerId: this.winnerId,
    };
  }
}
