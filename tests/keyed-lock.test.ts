import { describe, it, expect } from "vitest";
import { KeyedLock } from "../src/router/keyed-lock.js";

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe("KeyedLock", () => {
  it("runs tasks for the same key one at a time in arrival order", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      lock.run("a", task("first", 20)),
      lock.run("a", task("second", 1)),
    ]);

    expect(results).toEqual(["first", "second"]);
    expect(events).toEqual(["first:start", "first:end", "second:start", "second:end"]);
  });

  it("runs different keys concurrently", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("a", async () => {
        events.push("a:start");
        await delay(20);
        events.push("a:end");
      }),
      lock.run("b", async () => {
        events.push("b:start");
        await delay(1);
        events.push("b:end");
      }),
    ]);

    expect(events.indexOf("b:end")).toBeLessThan(events.indexOf("a:end"));
  });

  it("keeps the queue moving after a failure", async () => {
    const lock = new KeyedLock();

    const failed = lock.run("a", async () => {
      throw new Error("boom");
    });
    const next = lock.run("a", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("drops drained keys", async () => {
    const lock = new KeyedLock();
    await lock.run("a", async () => undefined);
    expect(lock.size).toBe(0);
  });
});
