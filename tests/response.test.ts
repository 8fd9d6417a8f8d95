import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { responseForFailure, serializeResponse, writeResponse } from "../src/response.js";

describe("responseForFailure", () => {
  it("explains validation failures with 422", () => {
    expect(responseForFailure({ kind: "validation", field: "target" })).toEqual({
      status: 422,
      body: "Missing required field: target"
    });
  });

  it("lists ambiguous candidates", () => {
    expect(
      responseForFailure({ kind: "ambiguous-target", target: "release", candidates: ["release", "release-hotfix"] })
    ).toEqual({ status: 422, body: 'Ambiguous target "release" matches: release, release-hotfix' });
  });

  it("keeps infrastructure failures bare", () => {
    expect(responseForFailure({ kind: "malformed-request", reason: "short body" })).toEqual({ status: 400 });
    expect(responseForFailure({ kind: "write-failure", reason: "EACCES /var/spool" })).toEqual({ status: 500 });
    expect(responseForFailure({ kind: "configuration-missing", path: "/etc/build-bridge.ini" })).toEqual({ status: 500 });
    expect(responseForFailure({ kind: "not-found", path: "/unknown" })).toEqual({ status: 404 });
  });

  it("announces allowed methods on 405", () => {
    expect(responseForFailure({ kind: "method-not-allowed", method: "DELETE", allowed: ["POST", "PUT"] })).toEqual({
      status: 405,
      headers: { Allow: "POST, PUT" }
    });
  });
});

describe("serializeResponse", () => {
  it("renders a bodiless response", () => {
    expect(serializeResponse({ status: 204 })).toBe("HTTP/1.1 204 No Content\r\nConnection: close\r\n\r\n");
  });

  it("renders extra headers before the blank line", () => {
    expect(serializeResponse({ status: 405, headers: { Allow: "GET" } })).toBe(
      "HTTP/1.1 405 Method Not Allowed\r\nConnection: close\r\nAllow: GET\r\n\r\n"
    );
  });

  it("renders a text body with its byte length", () => {
    expect(serializeResponse({ status: 422, body: "Unknown project: ö/r" })).toBe(
      "HTTP/1.1 422 Unprocessable Entity\r\nConnection: close\r\n" +
        "Content-Type: text/plain; charset=utf-8\r\nContent-Length: 21\r\n\r\nUnknown project: ö/r"
    );
  });
});

describe("writeResponse", () => {
  it("writes the serialized response to the connection", async () => {
    const output = new PassThrough();
    await writeResponse(output, { status: 200, body: "1.0.0" });
    expect(output.read()?.toString("utf8")).toBe(
      "HTTP/1.1 200 OK\r\nConnection: close\r\nContent-Type: text/plain; charset=utf-8\r\nContent-Length: 5\r\n\r\n1.0.0"
    );
  });
});
