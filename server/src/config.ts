import { z } from "zod";
import type { GameConfig } from "./types";

const booleanFlag = z
  .enum(["true", "false"])
  .default("true")
  .transform((value) => value === "true");

const warningOffsets = z
  .string()
  .default("15,10,5")
  .transform((raw) =>
    raw
      .split(",")
      .map((part) => part.trim())
      .filter(Boolean)
      .map(Number),
  )
  .pipe(z.array(z.number().int().positive()))
  .transform((offsets) => [...new Set(offsets)].sort((a, b) => b - a));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3001),
    CLIENT_ORIGIN: z.string().default("http://localhost:5173"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    DICTIONARY_ENABLED: booleanFlag,
    MAX_GAMES: z.coerce.number().int().positive().default(100),
    MAX_PLAYERS: z.coerce.number().int().min(2).max(50).default(10),
    TURN_TIMEOUT: z.coerce.number().int().min(5).max(300).default(30),
    MIN_WORD_LENGTH: z.coerce.number().int().min(1).max(20).default(2),
    MAX_WORD_LENGTH: z.coerce.number().int().min(1).max(64).default(20),
    WARNING_OFFSETS: warningOffsets,
    WAITING_SECONDS: z.coerce.number().int().min(0).max(600).default(60),
    TIMEOUT_POLICY: z.enum(["eliminate", "skip"]).default("eliminate"),
    LENGTH_RAMP: z.enum(["round_pairs", "per_word"]).default("round_pairs"),
    IDLE_ROOM_MINUTES: z.coerce.number().positive().default(60),
    SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
    LOCK_RECLAIM_HOURS: z.coerce.number().positive().default(24),
  })
  .refine((env) => env.MAX_WORD_LENGTH >= env.MIN_WORD_LENGTH, {
    message: "MAX_WORD_LENGTH must not be below MIN_WORD_LENGTH",
    path: ["MAX_WORD_LENGTH"],
  });

export interface ServerConfig {
  port: number;
  clientOrigins: string[];
  logLevel: string;
  dictionaryEnabled: boolean;
  maxRooms: number;
  idleRoomMs: number;
  sweepIntervalMs: number;
  lockReclaimMs: number;
  game: GameConfig;
}

export const DEFAULT_GAME_CONFIG: GameConfig = {
  turnSeconds: 30,
  minWordLength: 2,
  maxWordLength: 20,
  maxPlayersPerRoom: 10,
  warningOffsets: [15, 10, 5],
  waitingSeconds: 60,
  timeoutPolicy: "eliminate",
  lengthRamp: "round_pairs",
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/** Treats empty strings as unset so `FOO=` falls back to the default. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    clientOrigins: values.CLIENT_ORIGIN.split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
    logLevel: values.LOG_LEVEL,
    dictionaryEnabled: values.DICTIONARY_ENABLED,
    maxRooms: values.MAX_GAMES,
    idleRoomMs: values.IDLE_ROOM_MINUTES * 60 * 1000,
    sweepIntervalMs: values.SWEEP_INTERVAL_SECONDS * 1000,
    lockReclaimMs: values.LOCK_RECLAIM_HOURS * 60 * 60 * 1000,
    game: {
      turnSeconds: values.TURN_TIMEOUT,
      minWordLength: values.MIN_WORD_LENGTH,
      maxWordLength: values.MAX_WORD_LENGTH,
      maxPlayersPerRoom: values.MAX_PLAYERS,
      warningOffsets: values.WARNING_OFFSETS.filter((offset) => offset < values.TURN_TIMEOUT),
      waitingSeconds: values.WAITING_SECONDS,
      timeoutPolicy: values.TIMEOUT_POLICY,
      lengthRamp: values.LENGTH_RAMP,
    },
  };
}
