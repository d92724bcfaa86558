import { KeyedLock } from "../src/Utils/KeyedLock";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("KeyedLock", () => {
  it("runs tasks for the same key one at a time in call order", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const task = (label: string, ms: number) => async () => {
      events.push(`start ${label}`);
      await delay(ms);
      events.push(`end ${label}`);
      return label;
    };

    const results = await Promise.all([
      lock.run("A1", task("first", 20)),
      lock.run("A1", task("second", 1)),
    ]);

    expect(results).toEqual(["first", "second"]);
    expect(events).toEqual(["start first", "end first", "start second", "end second"]);
  });

  it("does not hold back tasks for other keys", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("A1", async () => {
        await delay(20);
        events.push("A1");
      }),
      lock.run("A2", async () => {
        events.push("A2");
      }),
    ]);

    expect(events).toEqual(["A2", "A1"]);
  });

  it("keeps going after a task rejects and forgets idle keys", async () => {
    const lock = new KeyedLock();

    const failed = lock.run("A1", async () => {
      throw new Error("boom");
    });
    const next = lock.run("A1", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
    expect(lock.pending).toBe(0);
  });

  it("runs an exclusive task after earlier work and before later work on any key", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("A1", async () => {
        await delay(15);
        events.push("A1");
      }),
      lock.runExclusive(async () => {
        events.push("start clear");
        await delay(15);
        events.push("end clear");
      }),
      lock.run("B1", async () => {
        events.push("B1");
      }),
    ]);

    expect(events).toEqual(["A1", "start clear", "end clear", "B1"]);
  });

  it("releases later work when an exclusive task rejects", async () => {
    const lock = new KeyedLock();

    const failed = lock.runExclusive(async () => {
      throw new Error("clear failed");
    });
    const next = lock.run("A1", async () => "ok");

    await expect(failed).rejects.toThrow("clear failed");
    await expect(next).resolves.toBe("ok");
  });
});
