import { describe, it, expect } from "vitest";
import { KeyedMutex } from "../src/memory/keyed-mutex.js";
import { deferred } from "./helpers/fakes.js";

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("KeyedMutex", () => {
  it("runs sections with the same key one at a time, in call order", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const first = mutex.runExclusive("a", async () => {
      events.push("1:start");
      await gate.promise;
      events.push("1:end");
    });
    const second = mutex.runExclusive("a", async () => {
      events.push("2:start");
    });

    await tick();
    expect(events).toEqual(["1:start"]);
    expect(mutex.isLocked("a")).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(["1:start", "1:end", "2:start"]);
  });

  it("lets different keys run concurrently", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const a = mutex.runExclusive("a", async () => {
      events.push("a:start");
      await gate.promise;
      events.push("a:end");
    });
    const b = mutex.runExclusive("b", async () => {
      events.push("b:start");
    });

    await b;
    expect(events).toEqual(["a:start", "b:start"]);

    gate.resolve();
    await a;
  });

  it("drops idle keys", async () => {
    const mutex = new KeyedMutex();
    await mutex.runExclusive("a", async () => 1);
    expect(mutex.isLocked("a")).toBe(false);
    expect(mutex.size).toBe(0);
  });

  it("releases the key when a section throws", async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive("a", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(mutex.runExclusive("a", async () => 42)).resolves.toBe(42);
    expect(mutex.size).toBe(0);
  });

  it("returns the section's value", async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive("k", async () => "done")).resolves.toBe("done");
  });
});
