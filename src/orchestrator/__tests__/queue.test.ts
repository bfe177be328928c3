import { describe, expect, test } from "vitest";
import { EventQueue } from "../queue.js";

describe("EventQueue", () => {
  test("delivers buffered items in FIFO order", async () => {
    const queue = new EventQueue<string>();
    queue.put("a");
    queue.put("b");
    queue.put("c");
    expect(queue.size).toBe(3);

    expect(await queue.get()).toBe("a");
    expect(await queue.get()).toBe("b");
    expect(await queue.get()).toBe("c");
    expect(queue.size).toBe(0);
  });

  test("get waits until an item is put", async () => {
    const queue = new EventQueue<number>();
    let received: number | null = null;
    const pending = queue.get().then((item) => {
      received = item;
    });

    await new Promise((r) => setTimeout(r, 10));
    expect(received).toBeNull();

    queue.put(7);
    await pending;
    expect(received).toBe(7);
    expect(queue.size).toBe(0);
  });

  test("waiting consumers are served in call order", async () => {
    const queue = new EventQueue<string>();
    const first = queue.get();
    const second = queue.get();

    queue.put("x");
    queue.put("y");

    expect(await first).toBe("x");
    expect(await second).toBe("y");
  });

  test("interleaved producer and consumer keep order", async () => {
    const queue = new EventQueue<number>();
    const seen: number[] = [];

    const consumer = (async () => {
      for (;;) {
        const item = await queue.get();
        if (item < 0) return;
        seen.push(item);
      }
    })();

    for (let i = 0; i < 5; i++) {
      queue.put(i);
      if (i % 2 === 0) await Promise.resolve();
    }
    queue.put(-1);
    await consumer;

    expect(seen).toEqual([0, 1, 2, 3, 4]);
  });
});
