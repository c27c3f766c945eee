/**
 * Output Pump Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { OutputPump } from "./output-pump.js";
import { RingBuffer } from "./ring-buffer.js";
import { FakePty } from "../test-utils/fake-pty.js";
import { createDeferred } from "../test-utils/wait-for.js";
import { silentLogger } from "../utils/logger.js";

function createPty(): FakePty {
  return new FakePty({
    file: "/bin/sh",
    args: [],
    name: "xterm-256color",
    cols: 80,
    rows: 24,
    cwd: "/tmp",
    env: {},
  });
}

describe("OutputPump", () => {
  let scrollback: RingBuffer;
  let broadcasts: string[];
  let pump: OutputPump;
  let pty: FakePty;

  beforeEach(() => {
    scrollback = new RingBuffer(64);
    broadcasts = [];
    pump = new OutputPump(
      {
        scrollback,
        broadcast: async (data) => {
          broadcasts.push(data.toString());
        },
      },
      silentLogger
    );
    pty = createPty();
  });

  it("appends output to the scrollback and broadcasts it", async () => {
    pump.start(pty);
    pty.emitData("hello ");
    pty.emitData("world");
    await pump.drained();

    expect(scrollback.snapshot().toString()).toBe("hello world");
    expect(broadcasts).toEqual(["hello ", "world"]);
  });

  it("broadcasts in read order even when a broadcast is slow", async () => {
    const gate = createDeferred<void>();
    const order: string[] = [];
    const slowPump = new OutputPump(
      {
        scrollback,
        broadcast: async (data) => {
          const text = data.toString();
          if (text === "first") await gate.promise;
          order.push(text);
        },
      },
      silentLogger
    );

    slowPump.start(pty);
    pty.emitData("first");
    pty.emitData("second");
    await vi.waitFor(() => {
      expect(scrollback.snapshot().toString()).toBe("first");
    });

    gate.resolve();
    await slowPump.drained();

    expect(order).toEqual(["first", "second"]);
  });

  it("keeps going after a failing broadcast", async () => {
    const logger = { ...silentLogger, error: vi.fn() };
    let calls = 0;
    const flakyPump = new OutputPump(
      {
        scrollback,
        broadcast: async () => {
          calls++;
          if (calls === 1) throw new Error("boom");
        },
      },
      logger
    );

    flakyPump.start(pty);
    pty.emitData("a");
    pty.emitData("b");
    await flakyPump.drained();

    expect(calls).toBe(2);
    expect(scrollback.snapshot().toString()).toBe("ab");
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("detaches when the process exits", async () => {
    pump.start(pty);
    pty.emitData("before");
    pty.emitExit(0);
    pty.emitData("late");
    await pump.drained();

    expect(broadcasts).toEqual(["before"]);
  });

  it("can be started again after the process exits", async () => {
    pump.start(pty);
    pty.emitExit(0);

    const next = createPty();
    pump.start(next);
    next.emitData("again");
    await pump.drained();

    expect(broadcasts).toEqual(["again"]);
  });

  it("stops on request", async () => {
    pump.start(pty);
    pump.stop();
    pty.emitData("ignored");
    await pump.drained();

    expect(scrollback.length).toBe(0);
  });

  it("ignores a second start while running", async () => {
    pump.start(pty);
    pump.start(pty);
    pty.emitData("once");
    await pump.drained();

    expect(broadcasts).toEqual(["once"]);
  });
});
