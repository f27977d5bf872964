import { describe, it, expect } from "vitest";
import { KeyedLock } from "./keyed-lock.js";
import { sleep } from "./retry.js";

describe("KeyedLock", () => {
  it("runs work under the same key in submission order", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("p1", async () => {
        events.push("a:start");
        await sleep(20);
        events.push("a:end");
      }),
      lock.run("p1", async () => {
        events.push("b:start");
        events.push("b:end");
      }),
    ]);

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("lets different keys interleave", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("p1", async () => {
        events.push("p1:start");
        await sleep(20);
        events.push("p1:end");
      }),
      lock.run("p2", async () => {
        events.push("p2:start");
        events.push("p2:end");
      }),
    ]);

    expect(events.indexOf("p2:end")).toBeLessThan(events.indexOf("p1:end"));
  });

  it("keeps serving a key after a failed run", async () => {
    const lock = new KeyedLock();
    await expect(
      lock.run("p1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(lock.run("p1", async () => 7)).resolves.toBe(7);
  });
});
