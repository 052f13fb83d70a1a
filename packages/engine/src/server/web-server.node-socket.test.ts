import * as fs from "node:fs/promises";
import * as net from "node:net";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { defaultConfig } from "../config/server-config.js";
import { silentLogger } from "../logging/logger.js";
import { createNodeServer } from "../presets/node.js";
import type { WebServer } from "./web-server.js";

let tmpDir: string;

beforeAll(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "sockserve-node-socket-"));
  await fs.writeFile(path.join(tmpDir, "index.html"), "<p>hello</p>");
});

afterAll(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

/**
 * Write `payload` over a loopback connection and collect the reply. With
 * `halfClose` the client shuts its write side right after the payload.
 */
function rawRequest(
  port: number,
  payload: string,
  options: { halfClose?: boolean } = {},
): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = net.connect(
      { port, host: "127.0.0.1", allowHalfOpen: true },
      () => {
        if (options.halfClose) {
          socket.end(payload);
        } else {
          socket.write(payload);
        }
      },
    );
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("end", () => {
      socket.end();
      resolve(Buffer.concat(chunks).toString("utf8"));
    });
    socket.on("error", reject);
  });
}

async function withNodeServer(
  testBody: (port: number, server: WebServer) => Promise<void>,
): Promise<void> {
  const server = createNodeServer({
    config: { ...defaultConfig(tmpDir), host: "127.0.0.1", port: 0, quiet: true },
    logger: silentLogger(),
  });
  const port = await server.start();
  try {
    await testBody(port, server);
  } finally {
    await server.stop();
    await server.idle();
  }
}

describe("WebServer Node adapter (real socket)", () => {
  it("binds to an ephemeral port and serves a request", async () => {
    await withNodeServer(async (port) => {
      const res = await fetch(`http://127.0.0.1:${port}/`);
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("text/html");
      expect(await res.text()).toBe("<p>hello</p>");
    });
  });

  it("refuses traversal over the wire", async () => {
    await withNodeServer(async (port) => {
      const response = await rawRequest(
        port,
        "GET /../etc/passwd.html HTTP/1.1\r\n\r\n",
      );
      expect(response.startsWith("HTTP/1.1 403 Forbidden\r\n")).toBe(true);
    });
  });

  it("answers a client that ends its side after the request", async () => {
    await withNodeServer(async (port) => {
      const response = await rawRequest(port, "GET / HTTP/1.0\r\n\r\n", {
        halfClose: true,
      });
      expect(response.startsWith("HTTP/1.1 200 OK\r\n")).toBe(true);
      expect(response.endsWith("\r\n\r\n<p>hello</p>")).toBe(true);
    });
  });

  it("answers a partial line followed by a half-close", async () => {
    await withNodeServer(async (port) => {
      const response = await rawRequest(port, "GET /index.html HTTP/1.0", {
        halfClose: true,
      });
      expect(response.startsWith("HTTP/1.1 200 OK\r\n")).toBe(true);
    });
  });

  it("writes nothing back when the client ends without sending", async () => {
    await withNodeServer(async (port, server) => {
      const response = await rawRequest(port, "", { halfClose: true });
      await server.idle();
      expect(response).toBe("");
    });
  });

  it("rejects start when the port is taken", async () => {
    await withNodeServer(async (port) => {
      const second = createNodeServer({
        config: { ...defaultConfig(tmpDir), host: "127.0.0.1", port },
        logger: silentLogger(),
      });
      await expect(second.start()).rejects.toThrow(/EADDRINUSE/);
    });
  });
});
