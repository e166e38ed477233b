import { afterEach, describe, expect, it } from "vitest";
import { createHash } from "node:crypto";
import type { RequestListener } from "node:http";
import { HttpChecksumClient } from "../src/http/client.js";
import { AuthError, FatalError, VolatileContentError } from "../src/errors.js";
import { createMemoryLogger } from "../src/log/logger.js";
import { HELLO_WORLD_SHA256, rejection, startServer, type TestServer } from "./helpers.js";

let server: TestServer | undefined;

afterEach(async () => {
  await server?.close();
  server = undefined;
});

/** HEAD answers 405 so resolution always reaches the download path. */
function getOnly(handler: RequestListener): RequestListener {
  return (req, res) => {
    if (req.method === "HEAD") {
      res.writeHead(405);
      res.end();
      return;
    }
    handler(req, res);
  };
}

function serveBody(body: string, headers: Record<string, string> = {}): RequestListener {
  return getOnly((_req, res) => {
    res.writeHead(200, { "Content-Length": Buffer.byteLength(body), ...headers });
    res.end(body);
  });
}

describe("HttpChecksumClient against a local server", () => {
  it("hashes the downloaded body", async () => {
    server = await startServer(serveBody("hello world"));
    const client = new HttpChecksumClient();

    const result = await client.resolve(`${server.url}/file.txt`);

    expect(result).toEqual({
      kind: "http",
      url: `${server.url}/file.txt`,
      checksum: `sha256:${HELLO_WORLD_SHA256}`,
      headers: {},
    });
  });

  it("sends the srcpin user agent and the S3 checksum mode on HEAD", async () => {
    server = await startServer(serveBody("hello world"));
    await new HttpChecksumClient().resolve(`${server.url}/file.txt`);

    const head = server.requests.find((r) => r.method === "HEAD");
    expect(head?.headers["user-agent"]).toBe("srcpin/0.1.0");
    expect(head?.headers["x-amz-checksum-mode"]).toBe("ENABLED");
  });

  it("stops at HEAD when it reports no-store, without downloading", async () => {
    server = await startServer((req, res) => {
      res.writeHead(200, { "Cache-Control": "no-store", "Content-Length": "11" });
      res.end(req.method === "HEAD" ? undefined : "hello world");
    });
    const client = new HttpChecksumClient();

    const err = await rejection(client.resolve(`${server.url}/live`));

    expect(err).toBeInstanceOf(VolatileContentError);
    expect(err).toMatchObject({ reason: "Cache-Control: no-store" });
    expect(server.requests.map((r) => r.method)).toEqual(["HEAD"]);
  });

  it("pins content with a positive max-age", async () => {
    server = await startServer(serveBody("hello world", { "Cache-Control": "max-age=300" }));
    const result = await new HttpChecksumClient().resolve(`${server.url}/a`);
    expect(result.checksum).toBe(`sha256:${HELLO_WORLD_SHA256}`);
  });

  it("pins private content with a long max-age", async () => {
    server = await startServer(serveBody("hello world", { "Cache-Control": "private, max-age=3600" }));
    const result = await new HttpChecksumClient().resolve(`${server.url}/a`);
    expect(result.checksum).toBe(`sha256:${HELLO_WORLD_SHA256}`);
  });

  it("treats s-maxage=0 as volatile even with a long max-age", async () => {
    server = await startServer(serveBody("hello world", { "Cache-Control": "max-age=3600, s-maxage=0" }));
    const url = `${server.url}/a`;

    const err = await rejection(new HttpChecksumClient().resolve(url));

    expect(err).toBeInstanceOf(VolatileContentError);
    expect(err.message).toBe(`volatile content at ${url} (Cache-Control: max-age=0 (immediately stale))`);
  });

  it("treats an Expires date in the past as volatile", async () => {
    server = await startServer(serveBody("hello world", { Expires: "Thu, 01 Jan 1970 00:00:00 GMT" }));
    const err = await rejection(new HttpChecksumClient().resolve(`${server.url}/a`));
    expect(err).toMatchObject({ kind: "volatile", reason: "Expires header indicates already expired content" });
  });

  it("ignores an unparsable Expires value", async () => {
    server = await startServer(serveBody("hello world", { Expires: "0" }));
    const result = await new HttpChecksumClient().resolve(`${server.url}/a`);
    expect(result.checksum).toBe(`sha256:${HELLO_WORLD_SHA256}`);
  });

  it("fails when fewer bytes arrive than Content-Length declared", async () => {
    server = await startServer(
      getOnly((_req, res) => {
        res.writeHead(200, { "Content-Length": "100" });
        res.write("hello", () => res.destroy());
      }),
    );

    const err = await rejection(new HttpChecksumClient().resolve(`${server.url}/short`));

    expect(err).toBeInstanceOf(FatalError);
    expect(err.message).toBe("content length mismatch: server declared 100 bytes but sent 5");
  });

  it("records the request headers named by Vary", async () => {
    server = await startServer(serveBody("hello world", { Vary: "Accept-Encoding, User-Agent" }));
    const result = await new HttpChecksumClient().resolve(`${server.url}/a`);
    expect(result.headers).toEqual({ "user-agent": "srcpin/0.1.0" });
  });

  it("records nothing for Vary: *", async () => {
    server = await startServer(serveBody("hello world", { Vary: "*" }));
    const result = await new HttpChecksumClient().resolve(`${server.url}/a`);
    expect(result.headers).toEqual({});
  });

  it("uses a sha256 ETag from HEAD and never downloads", async () => {
    const etag = HELLO_WORLD_SHA256.toUpperCase();
    server = await startServer((_req, res) => {
      res.writeHead(200, { ETag: `"${etag}"` });
      res.end();
    });

    const result = await new HttpChecksumClient().resolve(`${server.url}/a`);

    expect(result.checksum).toBe(`sha256:${HELLO_WORLD_SHA256}`);
    expect(server.requests.map((r) => r.method)).toEqual(["HEAD"]);
  });

  it("does not trust a weak ETag", async () => {
    server = await startServer((req, res) => {
      res.writeHead(200, { ETag: `W/"${"0".repeat(64)}"`, "Content-Length": "11" });
      res.end(req.method === "HEAD" ? undefined : "hello world");
    });

    const result = await new HttpChecksumClient().resolve(`${server.url}/a`);

    expect(result.checksum).toBe(`sha256:${HELLO_WORLD_SHA256}`);
    expect(server.requests.map((r) => r.method)).toEqual(["HEAD", "GET"]);
  });

  it("decodes the S3 base64 checksum header", async () => {
    const b64 = createHash("sha256").update("hello world").digest("base64");
    server = await startServer((_req, res) => {
      res.writeHead(200, { Server: "AmazonS3", "x-amz-checksum-sha256": b64, ETag: '"5eb63bbbe01eeed093cb22bb8f5acdc3"' });
      res.end();
    });

    const result = await new HttpChecksumClient().resolve(`${server.url}/bucket/key`);

    expect(result.checksum).toBe(`sha256:${HELLO_WORLD_SHA256}`);
    expect(server.requests).toHaveLength(1);
  });

  it("falls back to downloading when S3 sends no sha256 checksum", async () => {
    server = await startServer((req, res) => {
      res.writeHead(200, { Server: "AmazonS3", ETag: '"5eb63bbbe01eeed093cb22bb8f5acdc3"', "Content-Length": "11" });
      res.end(req.method === "HEAD" ? undefined : "hello world");
    });

    const result = await new HttpChecksumClient().resolve(`${server.url}/bucket/key`);

    expect(result.checksum).toBe(`sha256:${HELLO_WORLD_SHA256}`);
    expect(server.requests.map((r) => r.method)).toEqual(["HEAD", "GET"]);
  });

  it("raises AuthError on 401 from HEAD", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(401);
      res.end();
    });
    const url = `${server.url}/private`;

    const err = await rejection(new HttpChecksumClient().resolve(url));

    expect(err).toBeInstanceOf(AuthError);
    expect(err.message).toBe(`authentication required for ${url} (HTTP 401)`);
  });

  it("raises AuthError on 403 from GET", async () => {
    server = await startServer(
      getOnly((_req, res) => {
        res.writeHead(403);
        res.end();
      }),
    );
    const err = await rejection(new HttpChecksumClient().resolve(`${server.url}/x`));
    expect(err).toMatchObject({ kind: "auth", status: 403 });
  });

  it("reports a missing file as fatal", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(404);
      res.end();
    });

    const err = await rejection(new HttpChecksumClient().resolve(`${server.url}/missing`));

    expect(err).toBeInstanceOf(FatalError);
    expect(err.message).toBe("GET request failed: HTTP 404 Not Found");
  });

  it("feeds downloaded byte counts to the progress sink", async () => {
    server = await startServer(serveBody("hello world"));
    const seen: number[] = [];
    let declared = 0;

    await new HttpChecksumClient().resolve(`${server.url}/a`, {
      progress: (length) => {
        declared = length;
        return (n) => seen.push(n);
      },
    });

    expect(declared).toBe(11);
    expect(seen.reduce((a, b) => a + b, 0)).toBe(11);
  });

  it("logs which strategy resolved the URL", async () => {
    server = await startServer(serveBody("hello world"));
    const logger = createMemoryLogger();

    await new HttpChecksumClient({ logger }).resolve(`${server.url}/a`);

    expect(logger.records.map((r) => r.code)).toEqual([
      "CHECKSUM_STRATEGY_NEXT",
      "CHECKSUM_STRATEGY_NEXT",
      "CHECKSUM_STRATEGY",
    ]);
    expect(logger.records[2].details).toMatchObject({ strategy: "fullBodyStrategy" });
  });
});

describe("HttpChecksumClient input checks", () => {
  it("rejects URLs it cannot parse", async () => {
    await expect(new HttpChecksumClient().resolve("not a url")).rejects.toThrow("invalid URL: not a url");
  });

  it("rejects non-HTTP schemes", async () => {
    await expect(new HttpChecksumClient().resolve("ftp://example.com/a")).rejects.toThrow(
      "unsupported URL scheme ftp: in ftp://example.com/a",
    );
  });

  it("reports cancellation when the run is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      new HttpChecksumClient().resolve("http://127.0.0.1:1/a", { signal: controller.signal }),
    ).rejects.toThrow("resolution of http://127.0.0.1:1/a cancelled");
  });
});
