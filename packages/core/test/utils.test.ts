import { describe, expect, it } from "vitest";
import { CompletionChannel } from "../src/utils/channel.js";
import { Mutex } from "../src/utils/mutex.js";
import { shellQuote } from "../src/utils/shell.js";

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("Mutex", () => {
  it("grants the lock in request order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const first = mutex.runExclusive(async () => {
      order.push("first:start");
      await tick();
      order.push("first:end");
    });
    const second = mutex.runExclusive(async () => {
      order.push("second");
    });

    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("releases the lock when the holder throws", async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(mutex.isLocked()).toBe(false);
    await expect(mutex.runExclusive(async () => "next")).resolves.toBe("next");
  });

  it("ignores a second release", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    expect(mutex.isLocked()).toBe(true);
    release();
    release();
    expect(mutex.isLocked()).toBe(false);
  });
});

describe("CompletionChannel", () => {
  it("delivers buffered values before reporting closed", async () => {
    const channel = new CompletionChannel<number>(3);
    channel.send(1);
    channel.send(2);
    channel.close();

    const received: number[] = [];
    for await (const value of channel) {
      received.push(value);
    }
    expect(received).toEqual([1, 2]);
  });

  it("wakes a waiting consumer", async () => {
    const channel = new CompletionChannel<string>(1);
    const received: string[] = [];
    const consumer = (async () => {
      for await (const value of channel) {
        received.push(value);
      }
    })();

    await tick();
    channel.send("a");
    await tick();
    channel.send("b");
    channel.close();
    await consumer;
    expect(received).toEqual(["a", "b"]);
  });

  it("rejects sends past capacity or after close", () => {
    const channel = new CompletionChannel<number>(1);
    channel.send(1);
    expect(() => channel.send(2)).toThrow("channel capacity 1 exceeded");
    channel.close();
    expect(channel.isClosed()).toBe(true);
    expect(() => channel.send(3)).toThrow("send on closed channel");
  });
});

describe("shellQuote", () => {
  it("leaves plain paths alone", () => {
    expect(shellQuote("/tmp/data.bin")).toBe("/tmp/data.bin");
    expect(shellQuote("~/logs/app-1.log")).toBe("~/logs/app-1.log");
  });

  it("quotes paths with shell metacharacters", () => {
    expect(shellQuote("/tmp/my file")).toBe("'/tmp/my file'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
    expect(shellQuote("")).toBe("''");
  });
});
