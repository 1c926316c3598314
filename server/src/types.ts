export type GameStatus = "waiting" | "active" | "terminated";

export type TimeoutPolicy = "eliminate" | "skip";

export type LengthRamp = "round_pairs" | "per_word";

export interface Player {
  readonly id: number;
  name: string;
  active: boolean;
}

export interface GameConfig {
  turnSeconds: number;
  minWordLength: number;
  maxWordLength: number;
  maxPlayersPerRoom: number;
  /** Seconds before timeout, highest first. */
  warningOffsets: number[];
  waitingSeconds: number;
  timeoutPolicy: TimeoutPolicy;
  lengthRamp: LengthRamp;
}

export type SubmissionResult =
  | "valid_word"
  | "invalid_letter"
  | "invalid_length"
  | "invalid_word"
  | "wrong_player"
  | "no_active_game"
  | "validation_error";

export interface SubmissionOutcome {
  result: SubmissionResult;
  message?: string;
  word?: string;
}

export interface StateTransition {
  letter: string;
  requiredLength: number;
  roundCompleted: boolean;
  lengthIncreased: boolean;
  nextPlayer: PublicPlayer | null;
}

export type LoadLevel = "low" | "medium" | "high" | "critical";

export interface AdmissionDecision {
  allowed: boolean;
  reason?: string;
  load: LoadLevel;
}

export interface ResourceWarning {
  at: number;
  message: string;
}

export interface RoomMetrics {
  roomId: string;
  playerCount: number;
  startedAt: number;
  durationMs: number;
  turnsTaken: number;
  wordsAccepted: number;
  timeouts: number;
  errors: number;
  lastActivity: number;
}

export interface MetricsSnapshot {
  rooms: RoomMetrics[];
  activeRooms: number;
  totalRooms: number;
  completedRooms: number;
  wordsAccepted: number;
  timeouts: number;
  errors: number;
  uptimeMs: number;
  gamesPerHour: number;
  averageDurationMs: number;
}

export interface PublicPlayer {
  id: number;
  name: string;
  active: boolean;
}

export interface PublicGameState {
  roomId: string;
  status: GameStatus;
  players: PublicPlayer[];
  currentPlayerId: number | null;
  currentLetter: string;
  requiredLength: number;
  usedWords: string[];
  roundsCompleted: number;
  remainingMs: number;
  winnerId: number | null;
}

export interface SystemStatus {
  roomCount: number;
  load: LoadLevel;
  limits: {
    maxRooms: number;
    maxPlayersPerRoom: number;
  };
  totalPlayers: number;
  activeTimers: number;
  lockedRooms: number;
  warnings: ResourceWarning[];
  metrics: MetricsSnapshot;
}

export type GameEndReason = "winner" | "no_players" | "not_enough_players" | "stopped" | "idle";

interface EventBase {
  roomId: string;
  at: number;
}

export type GameEvent =
  | (EventBase & { type: "game_created"; player: PublicPlayer; waitingSeconds: number })
  | (EventBase & { type: "player_joined"; player: PublicPlayer; playerCount: number })
  | (EventBase & { type: "player_left"; player: PublicPlayer })
  | (EventBase & { type: "waiting_countdown"; remainingSeconds: number; playerCount: number })
  | (EventBase & { type: "game_started"; players: PublicPlayer[]; letter: string; requiredLength: number })
  | (EventBase & {
      type: "turn_started";
      player: PublicPlayer;
      letter: string;
      requiredLength: number;
      timeoutSeconds: number;
    })
  | (EventBase & { type: "turn_warning"; player: PublicPlayer | null; remainingSeconds: number })
  | (EventBase & { type: "word_accepted"; player: PublicPlayer; word: string; transition: StateTransition })
  | (EventBase & { type: "word_rejected"; playerId: number; result: SubmissionResult; message: string })
  | (EventBase & { type: "player_eliminated"; player: PublicPlayer; remainingPlayers: number })
  | (EventBase & { type: "player_skipped"; player: PublicPlayer })
  | (EventBase & { type: "game_ended"; winner: PublicPlayer | null; reason: GameEndReason });

export type GameEventType = GameEvent["type"];

export interface AckResponse {
  ok: boolean;
  error?: string;
  roomId?: string;
  state?: PublicGameState;
}

export interface OperationResult {
  ok: boolean;
  error?: string;
  code?: string;
  state?: PublicGameState;
}

export interface SubmitResult extends OperationResult {
  outcome?: SubmissionOutcome;
}
