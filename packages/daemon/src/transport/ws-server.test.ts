/**
 * WebSocket Server Connection Handler Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { EventEmitter } from "node:events";
import type { IncomingMessage } from "node:http";
import { WebSocket } from "ws";
import { createConnectionHandler } from "./ws-server.js";
import { TerminalSession } from "../terminal/terminal-session.js";
import { FakePty, createFakePtyFactory } from "../test-utils/fake-pty.js";
import { waitFor } from "../test-utils/wait-for.js";
import { silentLogger } from "../utils/logger.js";

class FakeSocket extends EventEmitter {
  readyState: number = WebSocket.OPEN;
  sent: Buffer[] = [];
  closedWith: { code: number; reason: string } | null = null;

  send(data: Buffer, _options: { binary?: boolean }, cb: (err?: Error) => void): void {
    this.sent.push(Buffer.from(data));
    cb();
  }

  close(code: number, reason: string): void {
    this.closedWith = { code, reason };
    this.readyState = WebSocket.CLOSED;
    this.emit("close", code, Buffer.from(reason));
  }
}

function createRequest(url: string): IncomingMessage {
  return {
    url,
    headers: { host: "127.0.0.1:4460" },
    socket: { remoteAddress: "127.0.0.1" },
  } as unknown as IncomingMessage;
}

describe("createConnectionHandler", () => {
  let spawned: FakePty[];
  let session: TerminalSession;
  let handle: (ws: WebSocket, req: IncomingMessage) => void;

  beforeEach(() => {
    const fake = createFakePtyFactory();
    spawned = fake.spawned;
    session = new TerminalSession({ ptyFactory: fake.factory, logger: silentLogger });
    handle = createConnectionHandler(session, silentLogger);
  });

  it("rejects sockets on unknown paths", () => {
    const socket = new FakeSocket();

    handle(socket as unknown as WebSocket, createRequest("/admin"));

    expect(socket.closedWith).toEqual({ code: 4000, reason: "Invalid path" });
    expect(session.subscriberCount).toBe(0);
  });

  it.each(["/", "/terminal", "/terminal?client=cli"])("attaches sockets on %s", (path) => {
    const socket = new FakeSocket();

    handle(socket as unknown as WebSocket, createRequest(path));

    expect(session.subscriberCount).toBe(1);
  });

  it("replays scrollback, starts the process and relays frames both ways", async () => {
    const socket = new FakeSocket();
    handle(socket as unknown as WebSocket, createRequest("/terminal"));
    await waitFor(() => session.isAlive());
    const [pty] = spawned;
    if (!pty) throw new Error("no PTY spawned");

    expect(socket.sent).toEqual([Buffer.alloc(0)]);

    socket.emit("message", Buffer.from("echo hi\n"), false);
    await waitFor(() => pty.writtenText() === "echo hi\n");

    pty.emitData("hi\r\n");
    await session.flushOutput();

    expect(socket.sent.map((b) => b.toString())).toEqual(["", "hi\r\n"]);
  });

  it("logs connections", () => {
    const logger = { ...silentLogger, info: vi.fn() };
    const logged = createConnectionHandler(session, logger);

    logged(new FakeSocket() as unknown as WebSocket, createRequest("/"));

    expect(logger.info).toHaveBeenCalledWith("Client connected from 127.0.0.1");
  });
});
