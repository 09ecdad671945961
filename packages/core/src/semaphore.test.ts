import { describe, expect, it } from "vitest";
import { defaultParseConcurrency, Semaphore } from "./semaphore.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("Semaphore", () => {
  it("rejects a limit below one", () => {
    expect(() => new Semaphore(0)).toThrow("at least 1");
  });

  it("never runs more tasks than its limit and serves waiters in order", async () => {
    const semaphore = new Semaphore(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];
    let active = 0;
    let peak = 0;

    const runs = gates.map((gate, index) =>
      semaphore.run(async () => {
        started.push(index);
        active += 1;
        peak = Math.max(peak, active);
        await gate.promise;
        active -= 1;
        return index;
      }),
    );

    await Promise.resolve();
    expect(started).toEqual([0, 1]);
    gates[0]?.resolve();
    gates[1]?.resolve();
    gates[2]?.resolve();

    expect(await Promise.all(runs)).toEqual([0, 1, 2]);
    expect(started).toEqual([0, 1, 2]);
    expect(peak).toBe(2);
  });

  it("releases the slot when a task fails", async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.run(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await semaphore.run(async () => "next")).toBe("next");
  });
});

describe("defaultParseConcurrency", () => {
  it("uses a configured value and otherwise at least one worker", () => {
    expect(defaultParseConcurrency(3)).toBe(3);
    expect(defaultParseConcurrency(0)).toBeGreaterThanOrEqual(1);
  });
});
