import http from "node:http";
import dotenv from "dotenv";
import { WebSocketServer, WebSocket } from "ws";
import { loadCatalog } from "./catalog.js";
import { loadConfig } from "./config.js";
import { createConversationController } from "./conversation.js";
import { describeError } from "./errors.js";
import { isAuthorized, parseFrame, type OutboundFrame } from "./frames.js";
import { createGenerationClient } from "./generation.js";
import { createKeyedQueue } from "./keyedQueue.js";
import { createLanguageResolver } from "./language.js";
import { createRateLimiter } from "./limiter.js";
import { createLogger } from "./log.js";
import { createEntityMatcher } from "./matcher.js";
import { createTranslator, loadLocales } from "./messages.js";
import { createPaymentClient } from "./payment.js";
import { createSessionStore } from "./store.js";

dotenv.config();

const config = loadConfig();
const logger = createLogger("gateway", config.logLevel);

const catalog = loadCatalog(config.catalogPath);
logger.child("catalog").info("loaded", { cards: catalog.length, path: config.catalogPath });

const store = await createSessionStore({
  redisUrl: config.redisUrl,
  timeoutMs: config.storeTimeoutMs,
  logger: logger.child("store"),
});

// userId -> the socket that last spoke for it. Replies and invoices follow the user.
const sockets = new Map<string, WebSocket>();

const sendTo = (userId: string, frame: OutboundFrame) => {
  const ws = sockets.get(userId);
  if (!ws || ws.readyState !== WebSocket.OPEN) return false;
  ws.send(JSON.stringify(frame));
  return true;
};

const controller = createConversationController({
  store,
  limiter: createRateLimiter({ maxRequests: config.rateLimitMax, windowMs: config.rateLimitWindowMs }),
  queue: createKeyedQueue(),
  resolver: createLanguageResolver(),
  matcher: createEntityMatcher(catalog, { threshold: config.matchThreshold }),
  generation: createGenerationClient({
    apiKey: config.openaiApiKey,
    model: config.generationModel,
    logger: logger.child("generation"),
  }),
  payment: createPaymentClient({
    sendInvoice: (frame) => sendTo(frame.userId, frame),
    logger: logger.child("payment"),
  }),
  translator: createTranslator(loadLocales(config.localesDir)),
  catalog,
  config: {
    paymentAllowlist: config.paymentAllowlist,
    readingPrice: config.readingPrice,
    generationTimeoutMs: config.generationTimeoutMs,
    paymentTimeoutMs: config.paymentTimeoutMs,
  },
  logger: logger.child("conversation"),
  onReply: (reply) => {
    if (!sendTo(reply.userId, { type: "reply", ...reply })) {
      logger.warn("reply dropped (no open socket)", { userId: reply.userId });
    }
  },
});

const server = http.createServer((req, res) => {
  if (req.method === "GET" && req.url === "/health") {
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ ok: true, store: store.backend, cards: catalog.length }));
    return;
  }
  res.writeHead(404);
  res.end();
});

const wss = new WebSocketServer({
  server,
  verifyClient: ({ req }: { req: http.IncomingMessage }) =>
    isAuthorized({ url: req.url, authorization: req.headers.authorization }, config.botToken),
});

const logPrefix = (wsId: string) => `[ws:${wsId}]`;

wss.on("connection", (ws: WebSocket) => {
  const wsId = Math.random().toString(36).slice(2, 8);
  const users = new Set<string>();

  console.log(`${logPrefix(wsId)} connected`);

  ws.on("message", (data) => {
    const parsed = parseFrame(data.toString());
    if (!parsed.ok) {
      console.warn(`${logPrefix(wsId)} bad frame`, parsed.message);
      const frame: OutboundFrame = { type: "error", message: parsed.message };
      ws.send(JSON.stringify(frame));
      return;
    }

    const { turn } = parsed;
    users.add(turn.userId);
    sockets.set(turn.userId, ws);
    controller.handleTurn(turn).catch((err: unknown) => {
      console.error(`${logPrefix(wsId)} turn failed`, { userId: turn.userId, err: describeError(err) });
    });
  });

  ws.on("close", (code, reason) => {
    for (const userId of users) {
      if (sockets.get(userId) === ws) sockets.delete(userId);
    }
    console.log(`${logPrefix(wsId)} disconnected`, { code, reason: reason.toString(), users: users.size });
  });

  ws.on("error", (err) => {
    console.error(`${logPrefix(wsId)} error`, err);
  });
});

const shutdown = (signal: string) => {
  logger.info(`received ${signal}, shutting down`);
  wss.close();
  server.close();
  store.close().catch((err: unknown) => {
    logger.error("store close failed", { err: describeError(err) });
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

server.listen(config.port, () => {
  logger.info(`WS gateway listening on :${config.port}`);
  logger.info(`environment=${config.environment} store=${store.backend} model=${config.generationModel}`);
});
