import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, removeDir } from "@dealbook/testkit";
import { FileLock, backoffDelay, lockPathFor } from "./lock.js";
import { Mutex } from "./mutex.js";
import { LockTimeoutError } from "./errors.js";
import { fileExists } from "./io.js";

describe("FileLock", () => {
  let testDir: string;
  let lockPath: string;

  beforeEach(async () => {
    testDir = await createTempDir();
    lockPath = lockPathFor(join(testDir, "pipeline.xlsx"));
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  it("should place the marker beside the durable file", () => {
    expect(lockPath).toBe(join(testDir, "pipeline.xlsx.lock"));
  });

  it("should write owner info on acquire and remove it on release", async () => {
    const lock = new FileLock(lockPath);
    await lock.acquire();

    expect(lock.isAcquired()).toBe(true);
    const info: unknown = JSON.parse(await readFile(lockPath, "utf-8"));
    expect(info).toMatchObject({ pid: process.pid });

    await lock.release();
    expect(lock.isAcquired()).toBe(false);
    expect(await fileExists(lockPath)).toBe(false);
  });

  it("should time out while another holder keeps the marker", async () => {
    const holder = new FileLock(lockPath);
    await holder.acquire();

    const retries: Array<[number, number]> = [];
    const contender = new FileLock(lockPath, {
      maxAttempts: 3,
      baseDelayMs: 5,
      maxDelayMs: 8,
      onRetry: (attempt, delayMs) => retries.push([attempt, delayMs]),
    });

    const failure = contender.acquire();
    await expect(failure).rejects.toBeInstanceOf(LockTimeoutError);
    await expect(failure).rejects.toThrow(`Failed to acquire lock after 3 attempts: ${lockPath}.`);
    expect(retries).toEqual([
      [1, 5],
      [2, 8],
    ]);
    expect(await FileLock.isHeld(lockPath)).toBe(true);

    await holder.release();
  });

  it("should not remove a marker it does not hold", async () => {
    await writeFile(lockPath, "{}");
    const lock = new FileLock(lockPath);
    await lock.release();
    expect(await fileExists(lockPath)).toBe(true);
  });

  it("should release after withLock throws", async () => {
    const lock = new FileLock(lockPath);
    await expect(
      lock.withLock(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(await fileExists(lockPath)).toBe(false);
  });

  it("should hand over to a waiting contender", async () => {
    const first = new FileLock(lockPath);
    await first.acquire();

    const second = new FileLock(lockPath, { baseDelayMs: 10, maxDelayMs: 20 });
    const waiting = second.acquire();
    setTimeout(() => {
      void first.release();
    }, 30);

    await waiting;
    expect(second.isAcquired()).toBe(true);
    await second.release();
  });

  it("should remove stale markers on request", async () => {
    await writeFile(lockPath, "{}");
    await FileLock.forceRemove(lockPath);
    await FileLock.forceRemove(lockPath);
    expect(await FileLock.isHeld(lockPath)).toBe(false);
  });
});

describe("backoffDelay", () => {
  it("should double per attempt up to the cap", () => {
    expect(backoffDelay(1, 50, 2000)).toBe(50);
    expect(backoffDelay(2, 50, 2000)).toBe(100);
    expect(backoffDelay(6, 50, 2000)).toBe(1600);
    expect(backoffDelay(7, 50, 2000)).toBe(2000);
  });
});

describe("Mutex", () => {
  it("should run critical sections one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const section = (name: string, ms: number) =>
      mutex.withLock(async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, ms));
        events.push(`${name}:end`);
      });

    await Promise.all([section("a", 20), section("b", 5), section("c", 1)]);

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
    expect(mutex.isLocked).toBe(false);
  });

  it("should release after a failure", async () => {
    const mutex = new Mutex();
    await expect(mutex.withLock(async () => Promise.reject(new Error("nope")))).rejects.toThrow("nope");
    expect(mutex.isLocked).toBe(false);
  });
});
