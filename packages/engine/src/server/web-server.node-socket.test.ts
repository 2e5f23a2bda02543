import * as fs from "node:fs/promises";
import * as net from "node:net";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { defaultConfig } from "../config/server-config.js";
import { LogStore, memoryLogger } from "../logging/logger.js";
import { createNodeServer } from "../presets/node.js";
import type { WebServer } from "./web-server.js";

/** Write raw bytes, optionally half-close, and collect everything until close. */
function rawExchange(
  port: number,
  payload: string,
  endAfterWrite = false,
): Promise<string> {
  return new Promise((resolve, reject) => {
    const sock = net.createConnection(port, "127.0.0.1", () => {
      sock.write(payload);
      if (endAfterWrite) sock.end();
    });
    let data = "";
    sock.on("data", (chunk: Buffer) => {
      data += chunk.toString("utf8");
    });
    sock.on("close", () => resolve(data));
    sock.on("error", reject);
  });
}

let tmpDir: string;
let logs: LogStore;
let server: WebServer;
let port: number;

beforeAll(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "wire-server-socket-"));
  logs = new LogStore();
  server = createNodeServer({
    config: { ...defaultConfig(tmpDir), port: 0, quiet: true },
    logger: memoryLogger(logs),
  });
  port = await server.start();
});

afterAll(async () => {
  await server.stop();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("WebServer Node adapter (real socket)", () => {
  it("echoes over a real connection", async () => {
    const res = await fetch(`http://127.0.0.1:${port}/echo/socket`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("socket");
  });

  it("stores and serves a file", async () => {
    const created = await fetch(`http://127.0.0.1:${port}/files/real.bin`, {
      method: "POST",
      body: "real bytes",
    });
    expect(created.status).toBe(201);

    const res = await fetch(`http://127.0.0.1:${port}/files/real.bin`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("real bytes");
  });

  it("writes the exact response bytes", async () => {
    expect(await rawExchange(port, "GET /nope HTTP/1.1\r\n\r\n")).toBe(
      "HTTP/1.1 404 Not Found\r\nContent-Length: 0\r\n\r\n",
    );
  });

  it("drops a request whose body is cut short", async () => {
    const reply = await rawExchange(
      port,
      "POST /files/cut.txt HTTP/1.1\r\nContent-Length: 10\r\n\r\nhello",
      true,
    );
    expect(reply).toBe("");
  });

  it("answers a file upload from a client that half-closes", async () => {
    const warningsBefore = logs.messages("warn").length;

    const reply = await rawExchange(
      port,
      "POST /files/half.txt HTTP/1.1\r\nContent-Length: 3\r\n\r\nabc",
      true,
    );

    expect(reply).toBe("HTTP/1.1 201 Created\r\nContent-Length: 0\r\n\r\n");
    expect(await fs.readFile(path.join(tmpDir, "half.txt"), "utf8")).toBe(
      "abc",
    );
    expect(logs.messages("warn").slice(warningsBefore)).toEqual([]);
  });

  it("answers a file read from a client that half-closes", async () => {
    await fs.writeFile(path.join(tmpDir, "read-half.txt"), "xyz");

    const reply = await rawExchange(
      port,
      "GET /files/read-half.txt HTTP/1.1\r\n\r\n",
      true,
    );

    expect(reply).toBe(
      "HTTP/1.1 200 OK\r\nContent-Length: 3\r\n" +
        "Content-Type: application/octet-stream\r\n\r\nxyz",
    );
  });
});
