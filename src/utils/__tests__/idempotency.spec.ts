import { MemoryKeyValueStore } from "../../__tests__/support/memoryStores.js";
import { getOrSetIdempotent } from "../idempotency.js";

describe("getOrSetIdempotent", () => {
  it("computes once and replays the stored result", async () => {
    const store = new MemoryKeyValueStore();
    const compute = jest.fn().mockResolvedValue({ status: 200, body: { n: 1 } });

    const first = await getOrSetIdempotent(store, "k", 60, compute);
    const second = await getOrSetIdempotent(store, "k", 60, compute);

    expect(first).toEqual({ value: { status: 200, body: { n: 1 } }, replay: false });
    expect(second).toEqual({ value: { status: 200, body: { n: 1 } }, replay: true });
    expect(compute).toHaveBeenCalledTimes(1);
    expect(store.ttls.get("k")).toBe(60_000);
    expect(store.values.has("k:lock")).toBe(false);
  });

  it("does not store non-2xx results", async () => {
    const store = new MemoryKeyValueStore();
    const compute = jest.fn().mockResolvedValue({ status: 400, body: { error: "nope" } });

    await getOrSetIdempotent(store, "k", 60, compute);
    await getOrSetIdempotent(store, "k", 60, compute);

    expect(compute).toHaveBeenCalledTimes(2);
    expect(store.values.has("k")).toBe(false);
  });

  it("releases the lock when compute throws", async () => {
    const store = new MemoryKeyValueStore();

    await expect(
      getOrSetIdempotent(store, "k", 60, () => Promise.reject(new Error("boom")))
    ).rejects.toThrow("boom");
    expect(store.values.has("k:lock")).toBe(false);
  });

  it("waits for a concurrent writer holding the lock", async () => {
    const store = new MemoryKeyValueStore();
    await store.setIfAbsent("k:lock", "1", 5000);
    setTimeout(() => {
      void store.setWithTtl("k", JSON.stringify({ status: 201, body: { id: "x" } }), 60);
    }, 20);
    const compute = jest.fn();

    const out = await getOrSetIdempotent(store, "k", 60, compute, 1000);

    expect(out).toEqual({ value: { status: 201, body: { id: "x" } }, replay: true });
    expect(compute).not.toHaveBeenCalled();
  });
});
