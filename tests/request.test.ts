import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { parseHeaderLine, readRequest } from "../src/request.js";

const limits = { maxLineBytes: 256, maxBodyBytes: 1024 };

function stream(...chunks: string[]): Readable {
  return Readable.from(chunks);
}

describe("readRequest", () => {
  it("parses the request line, headers and exact body", async () => {
    const request = await readRequest(
      stream("POST /gitea HTTP/1.1\r\nHost: ci.example\r\nContent-Type: application/json\r\nContent-Length: 2\r\n\r\n{}"),
      limits
    );
    expect(request.ok).toBe(true);
    if (!request.ok) return;
    expect(request.value.method).toBe("POST");
    expect(request.value.path).toBe("/gitea");
    expect(request.value.protocolVersion).toBe("HTTP/1.1");
    expect(request.value.headers).toEqual({
      host: "ci.example",
      "content-type": "application/json",
      "content-length": "2"
    });
    expect(request.value.body.toString("utf8")).toBe("{}");
  });

  it("reassembles lines and bodies split across chunks", async () => {
    const request = await readRequest(
      stream("PO", "ST / HTTP/1.1\nContent-", "Length: 3\n\nab", "cdef"),
      limits
    );
    expect(request.ok && request.value.body.toString("utf8")).toBe("abc");
  });

  it("lets the last duplicate header win", async () => {
    const request = await readRequest(
      stream("PUT / HTTP/1.1\r\nContent-Length: 10\r\ncontent-length: 4\r\n\r\nbody"),
      limits
    );
    expect(request.ok && request.value.headers["content-length"]).toBe("4");
    expect(request.ok && request.value.body.toString("utf8")).toBe("body");
  });

  it("skips blank lines before the request line and ignores colon-less header lines", async () => {
    const request = await readRequest(
      stream("\r\nPOST /adhoc HTTP/1.0\r\nnot a header\r\nContent-Length: 0\r\n\r\n"),
      limits
    );
    expect(request.ok && request.value.path).toBe("/adhoc");
    expect(request.ok && request.value.headers).toEqual({ "content-length": "0" });
  });

  it("accepts GET without content-length as an empty body", async () => {
    const request = await readRequest(stream("GET /version HTTP/1.1\r\n\r\n"), limits);
    expect(request.ok && request.value.body.length).toBe(0);
  });

  it.each([
    ["missing content-length", "POST / HTTP/1.1\r\nHost: x\r\n\r\n{}"],
    ["non-numeric content-length", "POST / HTTP/1.1\r\nContent-Length: two\r\n\r\n{}"],
    ["short body", "POST / HTTP/1.1\r\nContent-Length: 10\r\n\r\n{}"],
    ["two-field request line", "POST /\r\nContent-Length: 0\r\n\r\n"],
    ["unterminated header block", "POST / HTTP/1.1\r\nContent-Length: 0\r\n"],
    ["oversized body", "POST / HTTP/1.1\r\nContent-Length: 4096\r\n\r\n"],
    ["empty stream", ""]
  ])("reports %s as malformed", async (_name, raw) => {
    const request = await readRequest(stream(raw), limits);
    expect(!request.ok && request.failure.kind).toBe("malformed-request");
  });

  it("rejects header lines over the line limit", async () => {
    const request = await readRequest(
      stream(`POST / HTTP/1.1\r\nX-Long: ${"a".repeat(300)}\r\nContent-Length: 0\r\n\r\n`),
      limits
    );
    expect(request).toEqual({
      ok: false,
      failure: { kind: "malformed-request", reason: "header line longer than 256 bytes" }
    });
  });
});

describe("parseHeaderLine", () => {
  it("splits on the first colon and normalizes the name", () => {
    expect(parseHeaderLine("  X-Target-URL :  http://ci.example:8080/hook  ")).toEqual([
      "x-target-url",
      "http://ci.example:8080/hook"
    ]);
  });

  it("returns undefined for lines without a colon", () => {
    expect(parseHeaderLine("garbage")).toBeUndefined();
  });
});
