import { describe, it, expect, vi } from "vitest";
import { Signal } from "../services/achievements";

interface Ping {
  n: number;
}

describe("Signal", () => {
  it("delivers to receivers in registration order with signal and sender", () => {
    const signal = new Signal<Ping>("ping");
    const calls: string[] = [];
    const sender = {};

    signal.connect((p) => calls.push(`a${p.n}`));
    signal.connect((p) => calls.push(`b${p.n}`));
    const first = vi.fn();
    signal.connect(first);

    signal.send(sender, { n: 1 });

    expect(calls).toEqual(["a1", "b1"]);
    expect(first).toHaveBeenCalledWith({ n: 1, signal, sender });
  });

  it("connecting the same receiver twice registers it once", () => {
    const signal = new Signal<Ping>("ping");
    const receiver = vi.fn();

    signal.connect(receiver);
    signal.connect(receiver);
    signal.send(null, { n: 1 });

    expect(receiver).toHaveBeenCalledTimes(1);
  });

  it("dispatchUid deduplicates different receiver functions", () => {
    const signal = new Signal<Ping>("ping");
    const first = vi.fn();
    const second = vi.fn();

    signal.connect(first, { dispatchUid: "feed" });
    signal.connect(second, { dispatchUid: "feed" });
    signal.send(null, { n: 1 });

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).not.toHaveBeenCalled();
  });

  it("sender-filtered receivers only hear their sender", () => {
    const signal = new Signal<Ping>("ping");
    const senderA = { id: "a" };
    const senderB = { id: "b" };
    const onlyA = vi.fn();
    const anyone = vi.fn();

    signal.connect(onlyA, { sender: senderA });
    signal.connect(anyone);

    signal.send(senderB, { n: 1 });
    expect(onlyA).not.toHaveBeenCalled();
    expect(anyone).toHaveBeenCalledTimes(1);

    signal.send(senderA, { n: 2 });
    expect(onlyA).toHaveBeenCalledTimes(1);
    expect(signal.hasListeners(senderB)).toBe(true);
  });

  it("disconnect removes the registration and reports whether it existed", () => {
    const signal = new Signal<Ping>("ping");
    const sender = {};
    const receiver = vi.fn();
    signal.connect(receiver, { sender });

    expect(signal.disconnect({ receiver })).toBe(false);
    expect(signal.disconnect({ receiver, sender })).toBe(true);
    expect(signal.hasListeners(sender)).toBe(false);
  });

  it("send returns receiver values and propagates the first error", () => {
    const signal = new Signal<Ping>("ping");
    const after = vi.fn();
    signal.connect((p) => p.n * 2);

    expect(signal.send(null, { n: 4 }).map((r) => r.value)).toEqual([8]);

    signal.connect(() => {
      throw new Error("boom");
    });
    signal.connect(after);

    expect(() => signal.send(null, { n: 1 })).toThrow("boom");
    expect(after).not.toHaveBeenCalled();
  });

  it("sendRobust runs every receiver and reports failures", () => {
    const signal = new Signal<Ping>("ping");
    const after = vi.fn(() => "ok");
    signal.connect(() => {
      throw new Error("boom");
    });
    signal.connect(() => {
      throw "not an error";
    });
    signal.connect(after);

    const results = signal.sendRobust(null, { n: 1 });

    expect(after).toHaveBeenCalledTimes(1);
    expect(results.map((r) => r.ok)).toEqual([false, false, true]);
    const [first, second, third] = results;
    expect(first.ok ? null : first.error.message).toBe("boom");
    expect(second.ok ? null : second.error.message).toBe("not an error");
    expect(third.ok ? third.value : null).toBe("ok");
  });

  it("a receiver connected during delivery is not called until the next send", () => {
    const signal = new Signal<Ping>("ping");
    const late = vi.fn();
    signal.connect(() => signal.connect(late));

    signal.send(null, { n: 1 });
    expect(late).not.toHaveBeenCalled();

    signal.send(null, { n: 2 });
    expect(late).toHaveBeenCalledTimes(1);
  });
});
