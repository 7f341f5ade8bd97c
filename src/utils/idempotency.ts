// src/utils/idempotency.ts
// Header-based idempotency. Stores the exact {status, body} returned the first time and replays it on repeats.

export type Stored<T> = { status: number; body: T };

/** The slice of a key-value server the helper needs; redis backs it in production. */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  /** SET NX PX; true when this caller wrote the key. */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  setWithTtl(key: string, value: string, ttlSecs: number): Promise<void>;
  del(key: string): Promise<void>;
}

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

function isStored(value: unknown): value is Stored<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "status" in value &&
    typeof value.status === "number" &&
    "body" in value
  );
}

function decode(raw: string): Stored<unknown> | null {
  const parsed: unknown = JSON.parse(raw);
  return isStored(parsed) ? parsed : null;
}

/**
 * Idempotent get-or-compute with a short in-flight lock to avoid double-compute.
 * - key: fully-namespaced key (callers build it with config/redis `key()`)
 * - ttlSecs: cache TTL for the stored result
 * - compute: returns { status, body } to persist; only 2xx results are stored
 */
export async function getOrSetIdempotent(
  store: KeyValueStore,
  key: string,
  ttlSecs: number,
  compute: () => Promise<Stored<unknown>>,
  waitForMs = 1500 // how long a concurrent caller waits for the first writer
): Promise<{ value: Stored<unknown>; replay: boolean }> {
  const persist = async (value: Stored<unknown>) => {
    if (value.status >= 200 && value.status < 300) {
      await store.setWithTtl(key, JSON.stringify(value), ttlSecs);
    }
  };

  // 1) Fast path: already cached
  const cached = await store.get(key);
  const hit = cached ? decode(cached) : null;
  if (hit) return { value: hit, replay: true };

  // 2) Try to grab a short lock so only one caller computes
  const lockKey = `${key}:lock`;
  if (await store.setIfAbsent(lockKey, "1", 5000)) {
    try {
      const again = await store.get(key);
      const raced = again ? decode(again) : null;
      if (raced) return { value: raced, replay: true };

      const value = await compute();
      await persist(value);
      return { value, replay: false };
    } finally {
      await store.del(lockKey);
    }
  }

  // 3) Someone else is computing: wait briefly for the result
  const start = Date.now();
  while (Date.now() - start < waitForMs) {
    const got = await store.get(key);
    const ready = got ? decode(got) : null;
    if (ready) return { value: ready, replay: true };
    await sleep(75);
  }

  // 4) Fallback: compute (rare race), then store
  const value = await compute();
  await persist(value);
  return { value, replay: false };
}
