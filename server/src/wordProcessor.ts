import type { Logger } from "pino";
import type { Dictionary } from "./dictionary";
import { DictionaryUnavailableError, describeError } from "./errors";
import { GameState } from "./gameState";
import type { StateTransition, SubmissionOutcome } from "./types";
import { isAlphabetic, sanitizeWord, toPublicPlayer } from "./utils";

export type Difficulty = "easy" | "moderate" | "hard" | "very_hard" | "tricky_letter";

export interface WordHint {
  letter: string;
  requiredLength: number;
  difficulty: Difficulty;
}

const TRICKY_LETTERS = new Set(["Q", "X", "Z", "J"]);

export class WordProcessor {
  constructor(
    private readonly dictionary: Dictionary,
    private readonly logger?: Logger,
  ) {}

  /**
   * Checks a submission against the room's rules, first failure wins.
   * Only an accepted word touches the state (it joins the used-word set).
   */
  async submit(state: GameState, playerId: number, rawWord: string): Promise<SubmissionOutcome> {
    if (!state.isActive) {
      return { result: "no_active_game", message: "No active game in this room." };
    }

    const current = state.currentPlayer();
    if (!current) {
      return { result: "no_active_game", message: "No player holds the turn." };
    }

    if (current.id !== playerId) {
      return state.hasPlayer(playerId)
        ? { result: "wrong_player", message: `It is ${current.name}'s turn.` }
        : { result: "wrong_player" };
    }

    const word = sanitizeWord(rawWord);
    if (!word) {
      return { result: "invalid_word", message: "Enter a word." };
    }

    if (!isAlphabetic(word)) {
      return { result: "invalid_word", message: "Words may only contain letters A-Z.", word };
    }

    if (state.usedWords.has(word)) {
      return { result: "invalid_word", message: `"${word}" has already been used.`, word };
    }

    const letter = state.currentLetter.toLowerCase();
    if (!word.startsWith(letter)) {
      return {
        result: "invalid_letter",
        message: `Word must start with "${state.currentLetter}".`,
        word,
      };
    }

    if (word.length < state.requiredLength) {
      return {
        result: "invalid_length",
        message: `Word must be at least ${state.requiredLength} letters (yours has ${word.length}).`,
        word,
      };
    }

    if (word.length > state.config.maxWordLength) {
      return {
        result: "invalid_length",
        message: `Word must be at most ${state.config.maxWordLength} letters.`,
        word,
      };
    }

    let known: boolean;
    try {
      known = await this.dictionary.isValid(word);
    } catch (error) {
      if (error instanceof DictionaryUnavailableError) {
        this.logger?.warn({ roomId: state.roomId, err: error.message }, "dictionary unavailable");
      } else {
        this.logger?.error({ roomId: state.roomId, word, err: describeError(error) }, "dictionary lookup failed");
      }
      return {
        result: "validation_error",
        message: "Word checking is temporarily unavailable. Try again.",
        word,
      };
    }

    if (!known) {
      return { result: "invalid_word", message: `"${word}" is not in the dictionary.`, word };
    }

    state.markUsed(word);
    this.logger?.info({ roomId: state.roomId, playerId, word }, "word accepted");
    return { result: "valid_word", word };
  }

  computeNextState(word: string, state: GameState, now: number = Date.now()): StateTransition {
    const normalized = sanitizeWord(word);
    const lastLetter = normalized.slice(-1);
    if (lastLetter) {
      state.currentLetter = lastLetter.toUpperCase();
    }

    state.advanceTurn(now);
    state.skipInactive(now);
    state.roundTurns += 1;

    let roundCompleted = false;
    let lengthIncreased = false;
    const ceiling = state.config.maxWordLength;

    if (state.roundTurns >= state.players.length) {
      roundCompleted = true;
      state.roundsCompleted += 1;
      state.roundTurns = 0;

      // The barrier rises on every second completed round.
      if (state.config.lengthRamp === "round_pairs" && state.roundsCompleted % 2 === 0) {
        lengthIncreased = state.raiseRequiredLength(Math.min(ceiling, state.requiredLength + 1));
      }
    }

    if (state.config.lengthRamp === "per_word") {
      lengthIncreased = state.raiseRequiredLength(Math.min(ceiling, state.requiredLength + 1));
    }

    const next = state.currentPlayer();
    this.logger?.debug(
      {
        roomId: state.roomId,
        letter: state.currentLetter,
        requiredLength: state.requiredLength,
        roundsCompleted: state.roundsCompleted,
        roundTurns: state.roundTurns,
      },
      "game state advanced",
    );

    return {
      letter: state.currentLetter,
      requiredLength: state.requiredLength,
      roundCompleted,
      lengthIncreased,
      nextPlayer: next ? toPublicPlayer(next) : null,
    };
  }

  hint(state: GameState): WordHint {
    const letter = state.currentLetter.toUpperCase();
    const length = state.requiredLength;

    let difficulty: Difficulty = "easy";
    if (length >= 10) {
      difficulty = "very_hard";
    } else if (length >= 7) {
      difficulty = "hard";
    } else if (length >= 5) {
      difficulty = "moderate";
    } else if (TRICKY_LETTERS.has(letter)) {
      difficulty = "tricky_letter";
    }

    return { letter, requiredLength: length, difficulty };
  }
}
