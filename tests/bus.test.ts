import {
  ChannelRefs,
  DeliveryQueue,
  decodeMessage,
} from "../src/bus/delivery.js";
import { InMemoryEventBus } from "../src/bus/memory.js";

describe("DeliveryQueue", () => {
  it("delivers one message at a time in order", async () => {
    const seen: string[] = [];
    let active = 0;
    let maxActive = 0;
    const queue = new DeliveryQueue("ch", async (p) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((r) => setImmediate(r));
      seen.push(String(p));
      active--;
    });

    ["a", "b", "c"].forEach((p) => queue.push(p));
    expect(queue.pending).toBe(3);
    await queue.drain();

    expect(seen).toEqual(["a", "b", "c"]);
    expect(maxActive).toBe(1);
    expect(queue.pending).toBe(0);
  });

  it("keeps going after a handler throws", async () => {
    const seen: unknown[] = [];
    const queue = new DeliveryQueue("ch", (p) => {
      if (p === "bad") throw new Error("handler blew up");
      seen.push(p);
    });
    queue.push("bad");
    queue.push("good");
    await queue.drain();
    expect(seen).toEqual(["good"]);
  });

  it("ignores pushes after close", async () => {
    const seen: unknown[] = [];
    const queue = new DeliveryQueue("ch", (p) => {
      seen.push(p);
    });
    queue.push(1);
    await queue.close();
    queue.push(2);
    await queue.drain();
    expect(seen).toEqual([1]);
  });
});

describe("decodeMessage", () => {
  it("parses JSON and returns undefined for junk", () => {
    expect(decodeMessage("ch", '{"a":1}')).toEqual({ a: 1 });
    expect(decodeMessage("ch", "not json")).toBeUndefined();
  });
});

describe("ChannelRefs", () => {
  it("reports the first listener added and the last one removed", () => {
    const refs = new ChannelRefs();
    expect(refs.add("alerts")).toBe(true);
    expect(refs.add("alerts")).toBe(false);
    expect(refs.add("events")).toBe(true);
    expect(refs.count("alerts")).toBe(2);

    expect(refs.remove("alerts")).toBe(false);
    expect(refs.count("alerts")).toBe(1);
    expect(refs.remove("alerts")).toBe(true);
    expect(refs.count("alerts")).toBe(0);
    expect(refs.count("events")).toBe(1);
  });
});

describe("InMemoryEventBus", () => {
  it("returns the subscriber count and delivers JSON copies", async () => {
    const bus = new InMemoryEventBus();
    expect(await bus.publish("alerts", { n: 1 })).toBe(0);

    const got: unknown[] = [];
    await bus.subscribe("alerts", (p) => {
      got.push(p);
    });
    await bus.subscribe("alerts", () => undefined);

    const sent = { n: 2, at: new Date("2024-01-02T15:00:00Z") };
    expect(await bus.publish("alerts", sent)).toBe(2);
    await bus.idle();
    expect(got).toEqual([{ n: 2, at: "2024-01-02T15:00:00.000Z" }]);
    await bus.close();
  });

  it("drops undecodable messages, stops delivering after close", async () => {
    const bus = new InMemoryEventBus();
    const got: unknown[] = [];
    const sub = await bus.subscribe("events", (p) => {
      got.push(p);
    });

    bus.publishRaw("events", "{broken");
    await bus.publish("events", { ok: true });
    await bus.idle();
    expect(got).toEqual([{ ok: true }]);

    await sub.close();
    expect(await bus.publish("events", { ok: false })).toBe(0);
    await bus.idle();
    expect(got).toEqual([{ ok: true }]);
  });
});
