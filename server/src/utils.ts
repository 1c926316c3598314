import type { Player, PublicPlayer } from "./types";

const STARTING_LETTERS = "ABCDEFGHIKLMNOPRSTUVWY";
const WORD_PATTERN = /^[a-z]+$/;

export function sanitizeRoomId(input: string): string {
  return input.trim().replace(/[^A-Za-z0-9_:-]/g, "").slice(0, 64);
}

export function sanitizePlayerName(input: string): string {
  return input
    .trim()
    .replace(/\s+/g, " ")
    .replace(/[^A-Za-z0-9 _-]/g, "")
    .slice(0, 32);
}

export function sanitizeWord(input: string): string {
  return input.trim().toLowerCase();
}

export function isAlphabetic(word: string): boolean {
  return WORD_PATTERN.test(word);
}

/** Q, X, Z and J never open a game. */
export function pickStartingLetter(random: () => number = Math.random): string {
  const index = Math.min(STARTING_LETTERS.length - 1, Math.floor(random() * STARTING_LETTERS.length));
  return STARTING_LETTERS[index];
}

export function toPublicPlayer(player: Player): PublicPlayer {
  return { id: player.id, name: player.name, active: player.active };
}
