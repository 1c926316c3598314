import express, { type Express } from "express";
import cors from "cors";
import type { Logger } from "pino";
import type { Server } from "socket.io";
import { z } from "zod";
import type { Dictionary } from "./dictionary";
import { describeError } from "./errors";
import type { GameService } from "./gameService";
import type { AckResponse, OperationResult } from "./types";
import { sanitizeRoomId } from "./utils";

const joinRoomSchema = z.object({
  roomId: z.string().min(1).max(64),
  playerId: z.coerce.number().int().nonnegative(),
  name: z.string().max(64).default(""),
});

const submitWordSchema = z.object({
  word: z.string().max(128),
});

export type Ack = (payload: AckResponse) => void;

interface SocketSession {
  roomId: string;
  playerId: number;
}

function ackWith(result: AckResponse, ack?: Ack): void {
  if (typeof ack === "function") {
    ack(result);
  }
}

export function toAck(result: OperationResult, roomId?: string): AckResponse {
  if (!result.ok) {
    return { ok: false, error: result.error ?? "Unknown error.", state: result.state };
  }

  return { ok: true, roomId, state: result.state };
}

export function createApp(service: GameService, dictionary: Dictionary, clientOrigins: string[]): Express {
  const app = express();
  app.use(cors({ origin: clientOrigins }));
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      dictionaryEnabled: dictionary.enabled,
      dictionarySize: dictionary.size,
    });
  });

  app.get("/status", (_req, res) => {
    res.json(service.status());
  });

  return app;
}

/** The part of a Socket.IO socket the handlers rely on. */
export interface ClientSocket {
  readonly id: string;
  on(event: "disconnect", listener: () => void): unknown;
  on(event: ClientEvent, listener: (payload: unknown, ack?: Ack) => void): unknown;
  join(roomId: string): unknown;
  leave(roomId: string): unknown;
}

export interface RoomBroadcaster {
  to(roomId: string): { emit(event: string, payload: unknown): unknown };
}

export type ClientEvent = "room:join" | "game:start" | "turn:submitWord" | "room:leave" | "game:stop";

/** Sends every game event, followed by the room's fresh state, to the room. */
export function forwardGameEvents(broadcaster: RoomBroadcaster, service: GameService): () => void {
  return service.events.subscribe((event) => {
    broadcaster.to(event.roomId).emit("game:event", event);
    const state = service.getState(event.roomId);
    if (state) {
      broadcaster.to(event.roomId).emit("room:update", state);
    }
  });
}

/** Maps one client's socket events onto game operations. */
export function bindSocket(socket: ClientSocket, service: GameService, logger: Logger): void {
  let session: SocketSession | null = null;

  const respond = (work: Promise<AckResponse>, ack?: Ack): void => {
    work
      .then((result) => ackWith(result, ack))
      .catch((error: unknown) => {
        logger.error({ socketId: socket.id, err: describeError(error) }, "socket handler failed");
        ackWith({ ok: false, error: "Something went wrong. Try again." }, ack);
      });
  };

  const withSession = async (
    action: (current: SocketSession) => Promise<OperationResult>,
  ): Promise<AckResponse> => {
    if (!session) {
      return { ok: false, error: "Join a room first." };
    }
    const current = session;
    return toAck(await action(current), current.roomId);
  };

  socket.on("room:join", (payload: unknown, ack?: Ack) => {
    const parsed = joinRoomSchema.safeParse(payload);
    if (!parsed.success) {
      ackWith({ ok: false, error: "Invalid join request." }, ack);
      return;
    }

    const roomId = sanitizeRoomId(parsed.data.roomId);
    if (!roomId) {
      ackWith({ ok: false, error: "Enter a valid room id." }, ack);
      return;
    }

    const { playerId, name } = parsed.data;
    const work = service.joinGame(roomId, { id: playerId, name }).then(async (result) => {
      if (result.ok) {
        session = { roomId, playerId };
        await socket.join(roomId);
      }
      return toAck(result, roomId);
    });
    respond(work, ack);
  });

  socket.on("game:start", (_payload: unknown, ack?: Ack) => {
    respond(
      withSession((current) => service.startGame(current.roomId)),
      ack,
    );
  });

  socket.on("turn:submitWord", (payload: unknown, ack?: Ack) => {
    const parsed = submitWordSchema.safeParse(payload);
    if (!parsed.success) {
      ackWith({ ok: false, error: "Invalid word submission." }, ack);
      return;
    }

    respond(
      withSession((current) => service.submitWord(current.roomId, current.playerId, parsed.data.word)),
      ack,
    );
  });

  socket.on("room:leave", (_payload: unknown, ack?: Ack) => {
    const work = withSession(async (current) => {
      const result = await service.leaveGame(current.roomId, current.playerId);
      session = null;
      await socket.leave(current.roomId);
      return result;
    });
    respond(work, ack);
  });

  socket.on("game:stop", (_payload: unknown, ack?: Ack) => {
    const work = withSession(async (current) => {
      const stopped = await service.stopGame(current.roomId);
      return stopped ? { ok: true } : { ok: false, error: "No game to stop." };
    });
    respond(work, ack);
  });

  socket.on("disconnect", () => {
    const current = session;
    session = null;
    if (!current) {
      return;
    }

    service.setPlayerActive(current.roomId, current.playerId, false).catch((error: unknown) => {
      logger.error({ roomId: current.roomId, err: describeError(error) }, "failed to mark player away");
    });
  });
}

/**
 * Maps socket events onto game operations and forwards every game event
 * to the sockets joined to that room.
 */
export function registerSocketHandlers(io: Server, service: GameService, logger: Logger): () => void {
  const unsubscribe = forwardGameEvents(io, service);
  io.on("connection", (socket) => bindSocket(socket, service, logger));
  return unsubscribe;
}
