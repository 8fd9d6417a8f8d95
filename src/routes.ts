import { Outcome, fail, succeed } from "./errors.js";
import { PayloadShape } from "./types.js";

/**
 * What an endpoint does once its method is accepted.
 */
export type RouteAction = { readonly kind: "ingest"; readonly shape: PayloadShape } | { readonly kind: "version" };

export interface Route {
  readonly methods: readonly string[];
  readonly action: RouteAction;
}

export type RouteTable = ReadonlyMap<string, Route>;

const INGEST_METHODS: readonly string[] = ["POST", "PUT"];

const ingest = (shape: PayloadShape): Route => ({ methods: INGEST_METHODS, action: { kind: "ingest", shape } });

const BUILT_IN_ROUTES: ReadonlyArray<readonly [string, Route]> = [
  ["/gitea", ingest("comprehensive")],
  ["/", ingest("lightweight")],
  ["/adhoc", ingest("adhoc")],
  ["/version", { methods: ["GET"], action: { kind: "version" } }]
];

/**
 * Build the endpoint table: built-in paths plus the deployment's extra ingestion endpoints.
 *
 * @param extra - Path to payload shape, from `route:` settings. Overrides built-ins on the same path.
 * @returns Exact-path lookup table.
 */
export function createRouteTable(extra: ReadonlyMap<string, PayloadShape> = new Map()): RouteTable {
  const table = new Map<string, Route>(BUILT_IN_ROUTES);
  for (const [path, shape] of extra) {
    table.set(path, ingest(shape));
  }
  return table;
}

/**
 * Select the action for a request by exact path, then check the method.
 */
export function matchRoute(routes: RouteTable, method: string, path: string): Outcome<RouteAction> {
  const route = routes.get(path);
  if (!route) {
    return fail({ kind: "not-found", path });
  }
  if (!route.methods.includes(method)) {
    return fail({ kind: "method-not-allowed", method, allowed: route.methods });
  }
  return succeed(route.action);
}
