import { describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_GAME_CONFIG, loadConfig } from "../config";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 3001,
      clientOrigins: ["http://localhost:5173"],
      logLevel: "info",
      dictionaryEnabled: true,
      maxRooms: 100,
      idleRoomMs: 3_600_000,
      sweepIntervalMs: 300_000,
      lockReclaimMs: 86_400_000,
      game: DEFAULT_GAME_CONFIG,
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    const config = loadConfig({
      PORT: "4000",
      CLIENT_ORIGIN: "http://a.test, http://b.test",
      DICTIONARY_ENABLED: "false",
      TURN_TIMEOUT: "12",
      WARNING_OFFSETS: "5, 10, 5, 20",
      TIMEOUT_POLICY: "skip",
      LENGTH_RAMP: "per_word",
      MAX_GAMES: "  ",
    });

    expect(config.port).toBe(4000);
    expect(config.clientOrigins).toEqual(["http://a.test", "http://b.test"]);
    expect(config.dictionaryEnabled).toBe(false);
    expect(config.maxRooms).toBe(100);
    expect(config.game).toMatchObject({
      turnSeconds: 12,
      warningOffsets: [10, 5],
      timeoutPolicy: "skip",
      lengthRamp: "per_word",
    });
  });

  it("rejects turn timeouts outside 5 to 300 seconds", () => {
    expect(() => loadConfig({ TURN_TIMEOUT: "4" })).toThrow(ConfigError);
    expect(() => loadConfig({ TURN_TIMEOUT: "301" })).toThrow(ConfigError);
    expect(loadConfig({ TURN_TIMEOUT: "300" }).game.turnSeconds).toBe(300);
  });

  it("lists every problem it finds", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "nope", TURN_TIMEOUT: "4" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((issue) => issue.split(":")[0])).toEqual(["PORT", "TURN_TIMEOUT"]);
    }
  });

  it("checks that the longest word is not shorter than the shortest", () => {
    expect(() => loadConfig({ MIN_WORD_LENGTH: "6", MAX_WORD_LENGTH: "4" })).toThrow(
      "MAX_WORD_LENGTH: MAX_WORD_LENGTH must not be below MIN_WORD_LENGTH",
    );
  });
});
