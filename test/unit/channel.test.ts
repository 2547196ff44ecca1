/**
 * Tests for WorkChannel delivery and closing
 */

import { describe, test, expect } from "vitest";
import { WorkChannel } from "../../src/ts/channel";

describe("WorkChannel", () => {
  test("delivers items in FIFO order", async () => {
    const channel = new WorkChannel<string>();
    channel.send("a");
    channel.send("b");

    expect(await channel.receive()).toEqual({ done: false, value: "a" });
    expect(await channel.receive()).toEqual({ done: false, value: "b" });
    expect(channel.size).toBe(0);
  });

  test("serves waiting receivers in the order they arrived", async () => {
    const channel = new WorkChannel<string>();
    const first = channel.receive();
    const second = channel.receive();
    const third = channel.receive();

    channel.send("a");
    channel.send("b");
    channel.send("c");

    expect(await first).toEqual({ done: false, value: "a" });
    expect(await second).toEqual({ done: false, value: "b" });
    expect(await third).toEqual({ done: false, value: "c" });
  });

  test("close wakes waiting receivers with done", async () => {
    const channel = new WorkChannel<number>();
    const waiting = [channel.receive(), channel.receive()];

    channel.close();

    expect(await Promise.all(waiting)).toEqual([
      { done: true, value: undefined },
      { done: true, value: undefined },
    ]);
  });

  test("items sent before close are still delivered", async () => {
    const channel = new WorkChannel<number>();
    channel.send(1);
    channel.send(2);
    channel.close();

    expect(channel.closed).toBe(true);
    expect(channel.size).toBe(2);
    expect(await channel.receive()).toEqual({ done: false, value: 1 });
    expect(await channel.receive()).toEqual({ done: false, value: 2 });
    expect(await channel.receive()).toEqual({ done: true, value: undefined });
  });

  test("send after close fails with ChannelClosed", () => {
    const channel = new WorkChannel<string>();
    channel.close();
    channel.close();

    expect(() => channel.send("late")).toThrow("Cannot send on a closed channel");
    try {
      channel.send("late");
    } catch (error) {
      expect(error).toMatchObject({ code: "ChannelClosed", operation: "send" });
    }
  });

  test("async iteration ends once closed and drained", async () => {
    const channel = new WorkChannel<string>();
    channel.send("x");
    channel.send("y");
    channel.close();

    const received: string[] = [];
    for await (const item of channel) {
      received.push(item);
    }

    expect(received).toEqual(["x", "y"]);
  });

  test("competing consumers each receive distinct items and nothing is lost", async () => {
    const channel = new WorkChannel<number>();
    const consumers = Array.from({ length: 4 }, async () => {
      const taken: number[] = [];
      for await (const item of channel) {
        taken.push(item);
      }
      return taken;
    });

    for (let i = 0; i < 10_000; i++) {
      channel.send(i);
    }
    channel.close();

    const results = await Promise.all(consumers);
    const all = results.flat().sort((a, b) => a - b);

    expect(all.length).toBe(10_000);
    expect(new Set(all).size).toBe(10_000);
    expect(all[0]).toBe(0);
    expect(all[9_999]).toBe(9_999);
  });

  test("consumers keep draining items sent while they wait", async () => {
    const channel = new WorkChannel<number>();
    const consumer = (async () => {
      let sum = 0;
      for await (const item of channel) {
        sum += item;
      }
      return sum;
    })();

    for (let i = 1; i <= 100; i++) {
      channel.send(i);
      await Promise.resolve();
    }
    channel.close();

    expect(await consumer).toBe(5050);
  });
});
