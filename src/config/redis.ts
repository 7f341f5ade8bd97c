/** Redis client singleton + ping + namespaced key builder */
import { createClient } from "redis";

import { env } from "./env.js";
import { logger } from "./logger.js";
import type { DepStatus } from "./db.js";
import type { KeyValueStore } from "../utils/idempotency.js";

type Client = ReturnType<typeof createClient>;

let client: Client | null = null;

function getClient(): Client {
  if (!client) {
    const useTls = env.REDIS_URL.startsWith("rediss://");

    client = createClient({
      url: env.REDIS_URL,
      socket: {
        tls: useTls,
        connectTimeout: 3000,
        keepAlive: 5000,
        reconnectStrategy: (retries) => {
          // wait up to 3s between retries
          const delay = Math.min(retries * 200, 3000);
          logger.info("redis.reconnecting", { delay });
          return delay;
        },
      },
    });

    client.on("error", (e: unknown) => {
      logger.warn("redis.client_error", { error: e instanceof Error ? e.message : String(e) });
    });

    client.on("ready", () => {
      logger.info("redis.ready");
    });
  }

  return client;
}

export async function redisClient(): Promise<Client> {
  const c = getClient();
  if (!c.isOpen) await c.connect();
  return c;
}

export function key(...parts: Array<string | number>): string {
  return `${env.REDIS_NAMESPACE}:${parts.join(":")}`;
}

/** Adapts the redis client to the small surface the idempotency helper needs. */
export function redisKeyValueStore(): KeyValueStore {
  return {
    async get(k) {
      const c = await redisClient();
      return c.get(k);
    },
    async setIfAbsent(k, value, ttlMs) {
      const c = await redisClient();
      const reply = await c.set(k, value, { NX: true, PX: ttlMs });
      return reply !== null;
    },
    async setWithTtl(k, value, ttlSecs) {
      const c = await redisClient();
      await c.set(k, value, { EX: ttlSecs });
    },
    async del(k) {
      const c = await redisClient();
      await c.del(k);
    },
  };
}

export async function pingRedis(): Promise<DepStatus> {
  try {
    const c = await redisClient();
    await c.ping();
    return { status: "ok" };
  } catch (err) {
    return { status: "error", message: err instanceof Error ? err.message : String(err) };
  }
}

export async function closeRedis() {
  if (client?.isOpen) await client.quit();
}
