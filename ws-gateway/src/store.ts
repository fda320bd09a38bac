import { Redis } from "ioredis";
import { StorageUnavailable, describeError } from "./errors.js";
import type { Logger } from "./log.js";
import {
  SESSION_TTL_MS,
  createSession,
  fromRecord,
  toRecord,
  type Session,
  type SessionRecord,
} from "./session.js";
import { withTimeout } from "./timeout.js";

export type SessionStore = {
  readonly backend: "memory" | "redis";
  get: (userId: string) => Promise<Session | undefined>;
  set: (userId: string, session: Session) => Promise<void>;
  delete: (userId: string) => Promise<void>;
  exists: (userId: string) => Promise<boolean>;
  close: () => Promise<void>;
};

// The subset of the ioredis client the store talks to; tests hand in a fake.
export type RedisClient = {
  get: (key: string) => Promise<string | null>;
  set: (key: string, value: string, mode: "EX", seconds: number) => Promise<unknown>;
  del: (key: string) => Promise<number>;
  exists: (key: string) => Promise<number>;
};

export const sessionKey = (userId: string) => `tarot:session:${userId}`;

export const createMemorySessionStore = ({
  ttlMs = SESSION_TTL_MS,
  now = () => Date.now(),
}: { ttlMs?: number; now?: () => number } = {}): SessionStore => {
  // Every write restarts the ttl, as SET ... EX does on the redis backend.
  const records = new Map<string, { record: SessionRecord; expiresAt: number }>();

  const get = async (userId: string) => {
    const entry = records.get(userId);
    if (!entry) return undefined;
    if (now() > entry.expiresAt) {
      records.delete(userId);
      return undefined;
    }
    return fromRecord(entry.record) ?? undefined;
  };

  return {
    backend: "memory",
    get,
    async set(userId, session) {
      records.set(userId, { record: toRecord(session), expiresAt: now() + ttlMs });
    },
    async delete(userId) {
      records.delete(userId);
    },
    async exists(userId) {
      return (await get(userId)) !== undefined;
    },
    async close() {
      records.clear();
    },
  };
};

export const createRedisSessionStore = ({
  client,
  logger,
  ttlMs = SESSION_TTL_MS,
  onClose = async () => {},
}: {
  client: RedisClient;
  logger: Logger;
  ttlMs?: number;
  onClose?: () => Promise<void>;
}): SessionStore => {
  const ttlSeconds = Math.ceil(ttlMs / 1000);
  return {
    backend: "redis",
    async get(userId) {
      const raw = await client.get(sessionKey(userId));
      if (!raw) return undefined;
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (err) {
        logger.warn("corrupt session payload", { userId, err: describeError(err) });
        return undefined;
      }
      const session = fromRecord(parsed);
      if (!session) {
        logger.warn("invalid session record", { userId });
        return undefined;
      }
      return session;
    },
    async set(userId, session) {
      await client.set(sessionKey(userId), JSON.stringify(toRecord(session)), "EX", ttlSeconds);
    },
    async delete(userId) {
      await client.del(sessionKey(userId));
    },
    async exists(userId) {
      return (await client.exists(sessionKey(userId))) > 0;
    },
    close: onClose,
  };
};

export type RedisHandle = {
  client: RedisClient;
  open: () => Promise<void>;
  disconnect: () => void;
  quit: () => Promise<void>;
};

export const openRedis = (url: string, timeoutMs: number): RedisHandle => {
  const redis = new Redis(url, {
    lazyConnect: true,
    commandTimeout: timeoutMs,
    connectTimeout: timeoutMs,
    maxRetriesPerRequest: 1,
  });
  return {
    client: {
      get: (key) => redis.get(key),
      set: (key, value, mode, seconds) => redis.set(key, value, mode, seconds),
      del: (key) => redis.del(key),
      exists: (key) => redis.exists(key),
    },
    open: async () => {
      await redis.connect();
      await redis.ping();
    },
    disconnect: () => redis.disconnect(),
    quit: async () => {
      await redis.quit();
    },
  };
};

/**
 * Picks the backend from configuration. A configured but unreachable Redis is
 * logged and replaced by the in-process store so startup still succeeds.
 */
export const createSessionStore = async ({
  redisUrl,
  timeoutMs,
  logger,
  connect = openRedis,
}: {
  redisUrl: string;
  timeoutMs: number;
  logger: Logger;
  connect?: (url: string, timeoutMs: number) => RedisHandle;
}): Promise<SessionStore> => {
  if (!redisUrl) {
    logger.info("using in-memory session store");
    return createMemorySessionStore();
  }

  const handle = connect(redisUrl, timeoutMs);
  try {
    await withTimeout("redis connect", timeoutMs, () => handle.open());
  } catch (err) {
    const unavailable = new StorageUnavailable("redis unreachable at startup", err);
    logger.warn(`${describeError(unavailable)}; falling back to in-memory session store`, {
      cause: describeError(err),
    });
    handle.disconnect();
    return createMemorySessionStore();
  }

  logger.info("using redis session store");
  return createRedisSessionStore({ client: handle.client, logger, onClose: handle.quit });
};

export const loadOrCreate = async (store: SessionStore, userId: string, now: Date = new Date()) =>
  (await store.get(userId)) ?? createSession(userId, now);
