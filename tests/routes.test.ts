import { describe, expect, it } from "vitest";
import { createRouteTable, matchRoute } from "../src/routes.js";

describe("matchRoute", () => {
  const routes = createRouteTable();

  it.each([
    ["/gitea", "comprehensive"],
    ["/", "lightweight"],
    ["/adhoc", "adhoc"]
  ])("routes POST %s to the %s shape", (path, shape) => {
    expect(matchRoute(routes, "POST", path)).toEqual({ ok: true, value: { kind: "ingest", shape } });
  });

  it("accepts PUT for ingestion endpoints", () => {
    expect(matchRoute(routes, "PUT", "/adhoc")).toEqual({ ok: true, value: { kind: "ingest", shape: "adhoc" } });
  });

  it("serves the version over GET only", () => {
    expect(matchRoute(routes, "GET", "/version")).toEqual({ ok: true, value: { kind: "version" } });
    expect(matchRoute(routes, "POST", "/version")).toEqual({
      ok: false,
      failure: { kind: "method-not-allowed", method: "POST", allowed: ["GET"] }
    });
  });

  it("reports unknown paths as not found for any method", () => {
    expect(matchRoute(routes, "GET", "/unknown")).toEqual({ ok: false, failure: { kind: "not-found", path: "/unknown" } });
    expect(matchRoute(routes, "DELETE", "/unknown")).toEqual({ ok: false, failure: { kind: "not-found", path: "/unknown" } });
  });

  it("rejects DELETE on an ingestion endpoint", () => {
    expect(matchRoute(routes, "DELETE", "/gitea")).toEqual({
      ok: false,
      failure: { kind: "method-not-allowed", method: "DELETE", allowed: ["POST", "PUT"] }
    });
  });

  it("matches paths exactly", () => {
    expect(matchRoute(routes, "POST", "/gitea/")).toEqual({ ok: false, failure: { kind: "not-found", path: "/gitea/" } });
  });
});

describe("createRouteTable", () => {
  it("adds deployment endpoints next to the built-in ones", () => {
    const routes = createRouteTable(new Map([["/hooks/ci", "lightweight"]]));
    expect(matchRoute(routes, "POST", "/hooks/ci")).toEqual({ ok: true, value: { kind: "ingest", shape: "lightweight" } });
    expect(matchRoute(routes, "POST", "/gitea")).toEqual({ ok: true, value: { kind: "ingest", shape: "comprehensive" } });
  });
});
