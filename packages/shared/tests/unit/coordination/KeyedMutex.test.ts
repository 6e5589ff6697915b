import { KeyedMutex } from "../../../src/coordination/KeyedMutex";

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("KeyedMutex", () => {
  it("grants a free key immediately", async () => {
    const mutex = new KeyedMutex();

    await mutex.acquire("BTC");

    expect(mutex.isLocked("BTC")).toBe(true);
    mutex.release("BTC");
    expect(mutex.isLocked("BTC")).toBe(false);
  });

  it("queues callers on the same key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await mutex.acquire("BTC");
    const second = mutex.acquire("BTC").then(() => order.push("second"));
    const third = mutex.acquire("BTC").then(() => order.push("third"));
    await tick();

    expect(order).toEqual([]);
    expect(mutex.pendingCount("BTC")).toBe(2);

    mutex.release("BTC");
    await second;
    expect(order).toEqual(["second"]);

    mutex.release("BTC");
    await third;
    expect(order).toEqual(["second", "third"]);

    mutex.release("BTC");
    expect(mutex.isLocked("BTC")).toBe(false);
  });

  it("does not block across keys", async () => {
    const mutex = new KeyedMutex();

    await mutex.acquire("BTC");
    await mutex.acquire("ETH");

    expect(mutex.isLocked("BTC")).toBe(true);
    expect(mutex.isLocked("ETH")).toBe(true);
  });

  it("serialises read-modify-write sections", async () => {
    const mutex = new KeyedMutex();
    let counter = 0;

    const increment = (): Promise<void> =>
      mutex.runExclusive("counter", async () => {
        const read = counter;
        await tick();
        counter = read + 1;
      });

    await Promise.all([increment(), increment(), increment(), increment()]);

    expect(counter).toBe(4);
  });

  it("releases the lock when the task rejects", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("BTC", async () => {
        throw new Error("store unavailable");
      }),
    ).rejects.toThrow("store unavailable");

    expect(mutex.isLocked("BTC")).toBe(false);
    await expect(mutex.runExclusive("BTC", () => 42)).resolves.toBe(42);
  });

  it("ignores release of an unknown key", () => {
    const mutex = new KeyedMutex();

    expect(() => mutex.release("missing")).not.toThrow();
  });
});
