import { describe, it, expect } from "vitest";
import { ConflictError } from "@indexloom/errors";
import { UserLock } from "./user-lock.js";

describe("UserLock", () => {
  it("rejects a second holder for the same user", () => {
    const lock = new UserLock();
    const release = lock.acquire("user-1");

    expect(() => lock.acquire("user-1")).toThrow(ConflictError);
    expect(lock.isHeld("user-2")).toBe(false);

    release();
    expect(lock.isHeld("user-1")).toBe(false);
  });

  it("ignores a repeated release", () => {
    const lock = new UserLock();
    const release = lock.acquire("user-1");
    release();
    const second = lock.acquire("user-1");

    release();
    expect(lock.isHeld("user-1")).toBe(true);
    second();
  });

  it("releases after the guarded work fails", async () => {
    const lock = new UserLock();

    await expect(
      lock.withLock("user-1", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(lock.isHeld("user-1")).toBe(false);
  });
});
