import { describe, expect, it } from "vitest";

import { Semaphore } from "../src/semaphore.js";

describe("Semaphore", () => {
  it("rejects a non-positive capacity", () => {
    expect(() => new Semaphore(0)).toThrow("capacity must be > 0");
  });

  it("queues holders beyond capacity", async () => {
    const sem = new Semaphore(1);
    const releaseFirst = await sem.acquire();
    expect(sem.inUse).toBe(1);

    let secondAcquired = false;
    const second = sem.acquire().then((release) => {
      secondAcquired = true;
      return release;
    });
    await Promise.resolve();
    expect(secondAcquired).toBe(false);
    expect(sem.queued).toBe(1);

    releaseFirst();
    releaseFirst();
    const releaseSecond = await second;
    expect(secondAcquired).toBe(true);
    expect(sem.inUse).toBe(1);

    releaseSecond();
    expect(sem.inUse).toBe(0);
    expect(sem.queued).toBe(0);
  });

  it("drops a waiter whose signal aborts", async () => {
    const sem = new Semaphore(1);
    const release = await sem.acquire();
    const controller = new AbortController();

    const waiting = sem.acquire(controller.signal);
    controller.abort(new Error("caller went away"));

    await expect(waiting).rejects.toThrow("caller went away");
    expect(sem.queued).toBe(0);
    release();
    expect(sem.inUse).toBe(0);
  });

  it("releases after use even when the task throws", async () => {
    const sem = new Semaphore(1);
    await expect(
      sem.use(async () => {
        throw new Error("task failed");
      }),
    ).rejects.toThrow("task failed");
    expect(sem.inUse).toBe(0);
    expect(await sem.use(async () => 7)).toBe(7);
  });
});
