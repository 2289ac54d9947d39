import { describe, expect, test } from "vitest";
import { DirectoryLock } from "../src/repair/directoryLock.js";

const deferred = (): { promise: Promise<void>; resolve: () => void } => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

describe("DirectoryLock", () => {
  test("runs work for the same directory one after another", async () => {
    const lock = new DirectoryLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run("/projects/app", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.run("/projects/app/", async () => {
      order.push("second:start");
    });

    await new Promise((done) => setTimeout(done, 0));
    expect(order).toEqual(["first:start"]);
    expect(lock.isLocked("/projects/app")).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second:start"]);
    expect(lock.isLocked("/projects/app")).toBe(false);
  });

  test("lets different directories run concurrently", async () => {
    const lock = new DirectoryLock();
    const gate = deferred();
    let otherRan = false;

    const blocked = lock.run("/projects/a", () => gate.promise);
    await lock.run("/projects/b", async () => {
      otherRan = true;
    });

    expect(otherRan).toBe(true);
    gate.resolve();
    await blocked;
  });

  test("releases the directory when the work throws", async () => {
    const lock = new DirectoryLock();

    await expect(
      lock.run("/projects/app", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(lock.run("/projects/app", async () => "next")).resolves.toBe("next");
    expect(lock.isLocked("/projects/app")).toBe(false);
  });
});
