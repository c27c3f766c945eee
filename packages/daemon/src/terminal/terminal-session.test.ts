/**
 * Terminal Session Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { TerminalSession } from "./terminal-session.js";
import { FakePty, createFakePtyFactory } from "../test-utils/fake-pty.js";
import { FakeSubscriber } from "../test-utils/fake-subscriber.js";
import { waitFor } from "../test-utils/wait-for.js";
import { PtySpawnError, SessionClosedError } from "../utils/errors.js";
import { silentLogger } from "../utils/logger.js";

describe("TerminalSession", () => {
  let spawned: FakePty[];
  let session: TerminalSession;

  beforeEach(() => {
    const fake = createFakePtyFactory();
    spawned = fake.spawned;
    session = new TerminalSession({
      ptyFactory: fake.factory,
      logger: silentLogger,
      home: "/home/tester",
      baseEnv: { PATH: "/usr/bin" },
      killTimeoutMs: 50,
    });
  });

  function pty(): FakePty {
    const [first] = spawned;
    if (!first) throw new Error("no PTY spawned");
    return first;
  }

  describe("defaults", () => {
    it("uses a 24x80 terminal running bash with 4096 bytes of scrollback", () => {
      expect(session.commandLine).toBe("/bin/bash");
      expect(session.rows).toBe(24);
      expect(session.cols).toBe(80);
      expect(session.scrollback.getStats().capacity).toBe(4096);
    });

    it("honours a custom command line", async () => {
      const fake = createFakePtyFactory();
      const custom = new TerminalSession({
        commandLine: "htop",
        ptyFactory: fake.factory,
        logger: silentLogger,
      });
      await custom.start();

      expect(fake.spawned[0]?.options.args[2]).toBe("htop");
    });
  });

  describe("state machine", () => {
    it("moves from unstarted to running to completed", async () => {
      expect(session.state).toBe("unstarted");

      await session.start();
      expect(session.state).toBe("running");

      pty().emitExit(0);
      expect(session.state).toBe("completed");
    });

    it("ends in shutdown from any state", async () => {
      await session.shutdown();
      expect(session.state).toBe("shutdown");
    });

    it("refuses start after shutdown", async () => {
      await session.shutdown();

      await expect(session.start()).rejects.toBeInstanceOf(SessionClosedError);
      expect(spawned).toHaveLength(0);
    });

    it("propagates spawn failures from start", async () => {
      const failing = new TerminalSession({
        ptyFactory: () => {
          throw new Error("out of ptys");
        },
        logger: silentLogger,
      });

      await expect(failing.start()).rejects.toBeInstanceOf(PtySpawnError);
      expect(failing.state).toBe("unstarted");
    });
  });

  describe("serialize", () => {
    it("reports an unstarted session without pid or exit code", () => {
      expect(session.serialize()).toEqual({
        isStarted: false,
        isCompleted: false,
        rows: 24,
        cols: 80,
        subscribers: 0,
      });
    });

    it("adds the pid once started", async () => {
      await session.start();

      expect(session.serialize()).toEqual({
        isStarted: true,
        isCompleted: false,
        pid: 4242,
        rows: 24,
        cols: 80,
        subscribers: 0,
      });
    });

    it("adds the exit code once the process exits", async () => {
      await session.start();
      pty().emitExit(2);

      expect(session.serialize()).toEqual({
        isStarted: true,
        isCompleted: true,
        pid: 4242,
        exitCode: 2,
        rows: 24,
        cols: 80,
        subscribers: 0,
      });
    });
  });

  describe("resize", () => {
    it("updates status, the device and writes the size report while running", async () => {
      await session.start();
      await session.resize(50, 160);

      expect(session.serialize()).toMatchObject({ rows: 50, cols: 160 });
      expect(pty().rows).toBe(50);
      expect(pty().cols).toBe(160);
      expect(pty().writtenText()).toBe("\x1b[8;50;160t");
    });

    it("does nothing before start", async () => {
      await session.resize(50, 160);

      expect(session.serialize()).toMatchObject({ rows: 24, cols: 80 });
    });
  });

  describe("shutdown", () => {
    it("kills the process, closes subscribers and empties the registry", async () => {
      const a = new FakeSubscriber();
      const b = new FakeSubscriber();
      session.attachSubscriber(a);
      session.attachSubscriber(b);
      await waitFor(() => session.isAlive());

      await session.shutdown();

      expect(session.isStarted()).toBe(true);
      expect(session.isAlive()).toBe(false);
      expect(a.isClosed()).toBe(true);
      expect(b.isClosed()).toBe(true);
      expect(session.subscriberCount).toBe(0);
      expect(pty().calls).toEqual([{ op: "kill", signal: "SIGKILL" }, { op: "close" }]);
    });

    it("can be called twice", async () => {
      await session.start();
      await session.shutdown();

      await expect(session.shutdown()).resolves.toBeUndefined();
      expect(pty().calls).toEqual([{ op: "kill", signal: "SIGKILL" }, { op: "close" }]);
    });

    it("logs the output totals once", async () => {
      const logger = { ...silentLogger, info: vi.fn() };
      const fake = createFakePtyFactory();
      const logged = new TerminalSession({
        ptyFactory: fake.factory,
        logger,
        scrollbackBytes: 4,
        killTimeoutMs: 50,
      });
      await logged.start();
      fake.spawned[0]?.emitData("hello\r\n");
      await logged.flushOutput();

      await logged.shutdown();
      await logged.shutdown();

      const shutdownLines = logger.info.mock.calls.filter(([msg]) => String(msg).startsWith("Session shut down"));
      expect(shutdownLines).toEqual([["Session shut down (7 bytes of output, 4 in scrollback)"]]);
    });

    it("closes subscribers offered after shutdown", async () => {
      await session.shutdown();
      const sub = new FakeSubscriber();

      session.attachSubscriber(sub);

      expect(sub.isClosed()).toBe(true);
      expect(session.hasSubscriber(sub)).toBe(false);
    });
  });

  describe("subscribers", () => {
    it("sends the current scrollback first, even before the process starts", async () => {
      const sub = new FakeSubscriber();

      session.attachSubscriber(sub);

      expect(sub.sent).toEqual([Buffer.alloc(0)]);
      await waitFor(() => session.isAlive());
    });

    it("keeps a single entry for a subscriber attached twice", () => {
      const sub = new FakeSubscriber();

      session.attachSubscriber(sub);
      session.attachSubscriber(sub);

      expect(session.subscriberCount).toBe(1);
    });

    it("relays input, broadcasts output, and replays it to late joiners", async () => {
      const a = new FakeSubscriber();
      session.attachSubscriber(a);
      await waitFor(() => session.isAlive());

      a.push("ls\n");
      await waitFor(() => pty().writtenText() === "ls\n");

      pty().emitData("ls\r\n");
      pty().emitData("notes.txt\r\n$ ");
      await session.flushOutput();

      expect(a.sentText()).toEqual(["", "ls\r\n", "notes.txt\r\n$ "]);

      const b = new FakeSubscriber();
      session.attachSubscriber(b);

      expect(b.sentText()).toEqual(["ls\r\nnotes.txt\r\n$ "]);
      expect(spawned).toHaveLength(1);
    });

    it("prunes a closed subscriber on the next broadcast and keeps serving the other", async () => {
      const a = new FakeSubscriber();
      const b = new FakeSubscriber();
      session.attachSubscriber(a);
      session.attachSubscriber(b);
      await waitFor(() => session.isAlive());

      b.disconnect();
      pty().emitData("hi");
      await session.flushOutput();

      expect(a.sentText()).toEqual(["", "hi"]);
      expect(session.hasSubscriber(b)).toBe(false);
      expect(session.subscriberCount).toBe(1);
    });
  });
});
