import { describe, expect, test } from "vitest";
import { AsyncQueue, Broadcaster } from "../src/dingtalk_stream/broadcast.js";
import { Mutex } from "../src/dingtalk_stream/mutex.js";
import { flush } from "./helpers.js";

async function drain<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

describe("AsyncQueue", () => {
  test("delivers in FIFO order", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(await queue.next()).toEqual({ value: 1, done: false });
    expect(await queue.next()).toEqual({ value: 2, done: false });
    expect(queue.size).toBe(0);
  });

  test("a pending next resolves on push", async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.next();
    queue.push("late");

    expect(await pending).toEqual({ value: "late", done: false });
  });

  test("close delivers what was queued, then ends", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.close();

    expect(queue.push(2)).toBe(false);
    expect(await drain(queue)).toEqual([1]);
  });

  test("close(true) drops unread items", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.close(true);

    expect(await queue.next()).toEqual({ value: undefined, done: true });
  });

  test("close wakes waiting readers", async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next();
    queue.close();

    expect(await pending).toEqual({ value: undefined, done: true });
    expect(queue.isClosed).toBe(true);
  });
});

describe("Broadcaster", () => {
  test("every subscriber receives every item", async () => {
    const channel = new Broadcaster<string>();
    const a = channel.subscribe();
    const b = channel.subscribe();

    expect(channel.publish("x")).toBe(2);
    expect(await a.messages.next()).toEqual({ value: "x", done: false });
    expect(await b.messages.next()).toEqual({ value: "x", done: false });
  });

  test("subscribers only see items published after they joined", async () => {
    const channel = new Broadcaster<string>();
    expect(channel.publish("early")).toBe(0);

    const sub = channel.subscribe();
    channel.publish("late");
    expect(await sub.messages.next()).toEqual({ value: "late", done: false });
  });

  test("unsubscribe closes that subscriber only", () => {
    const channel = new Broadcaster<string>();
    const a = channel.subscribe();
    const b = channel.subscribe();

    a.unsubscribe();
    expect(a.messages.isClosed).toBe(true);
    expect(b.messages.isClosed).toBe(false);
    expect(channel.publish("x")).toBe(1);
    expect(channel.subscriberCount).toBe(1);
  });

  test("close ends every subscriber and later subscriptions", async () => {
    const channel = new Broadcaster<number>();
    const sub = channel.subscribe();
    channel.publish(1);
    channel.close();

    expect(await drain(sub.messages)).toEqual([1]);
    expect(channel.subscribe().messages.isClosed).toBe(true);
    expect(channel.publish(2)).toBe(0);
  });
});

describe("Mutex", () => {
  test("runs bodies one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const a = mutex.lock(async () => {
      order.push("a:start");
      await gate;
      order.push("a:end");
      return "a";
    });
    const b = mutex.lock(async () => {
      order.push("b");
      return "b";
    });

    await flush();
    expect(order).toEqual(["a:start"]);
    expect(mutex.isLocked).toBe(true);

    release();
    expect(await Promise.all([a, b])).toEqual(["a", "b"]);
    expect(order).toEqual(["a:start", "a:end", "b"]);
    expect(mutex.isLocked).toBe(false);
  });

  test("a failing body releases the lock", async () => {
    const mutex = new Mutex();
    const failed = mutex.lock(async () => {
      throw new Error("boom");
    });
    const next = mutex.lock(async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    expect(await next).toBe("ok");
  });
});
