export type GameErrorCode =
  | "ROOM_EXISTS"
  | "ROOM_NOT_FOUND"
  | "NOT_WAITING"
  | "NOT_ENOUGH_PLAYERS"
  | "ROOM_FULL"
  | "GAME_RUNNING"
  | "ADMISSION_DENIED";

export class GameError extends Error {
  constructor(
    readonly code: GameErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "GameError";
  }
}

/** Raised by a dictionary that cannot answer right now; the caller may retry. */
export class DictionaryUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "DictionaryUnavailableError";
  }
}

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
