import http from "node:http";
import dotenv from "dotenv";
import { Server } from "socket.io";
import { loadConfig } from "./config";
import { createDictionary } from "./dictionary";
import { GameService } from "./gameService";
import { createLogger } from "./logger";
import { createApp, registerSocketHandlers } from "./transport";

dotenv.config();

const config = loadConfig();
const logger = createLogger(config.logLevel);
const dictionary = createDictionary(config.dictionaryEnabled, { logger: logger.child({ component: "dictionary" }) });

const gameService = new GameService({
  dictionary,
  game: config.game,
  maxRooms: config.maxRooms,
  idleRoomMs: config.idleRoomMs,
  sweepIntervalMs: config.sweepIntervalMs,
  lockReclaimMs: config.lockReclaimMs,
  logger,
});

const app = createApp(gameService, dictionary, config.clientOrigins);
const httpServer = http.createServer(app);
const io = new Server(httpServer, {
  cors: {
    origin: config.clientOrigins,
    methods: ["GET", "POST"],
  },
});

const detachTransport = registerSocketHandlers(io, gameService, logger.child({ component: "transport" }));
gameService.start();

httpServer.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      origins: config.clientOrigins,
      dictionary: config.dictionaryEnabled ? "enabled" : "disabled",
      maxRooms: config.maxRooms,
    },
    "word chain server listening",
  );
});

function shutdown(signal: string): void {
  logger.info({ signal }, "shutting down");
  detachTransport();
  gameService.shutdown();
  io.close(() => {
    process.exit(0);
  });
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
