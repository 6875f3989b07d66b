import fs from "fs";
import path from "path";
import yaml from "js-yaml";

/**
 * One HTTP endpoint mapped onto one RPC method, as written in a route file:
 *
 * ```yaml
 * - method: POST
 *   path: /v1/echo
 *   rpc: demo.Echo/Say
 *   body: "*"
 * ```
 */
export interface RouteDoc {
  method: string;
  path: string;
  /** Fully qualified method, `package.Service/Method` */
  rpc: string;
  /** "*" decodes the request body into the request message; otherwise query parameters are used */
  body?: "*";
}

const ROUTE_FILE = /\.(yaml|yml|json)$/i;

function isRouteDoc(value: unknown): value is RouteDoc {
  if (typeof value !== "object" || value === null) return false;
  const doc: Record<string, unknown> = { ...value };
  return (
    typeof doc.method === "string" &&
    typeof doc.path === "string" &&
    doc.path.startsWith("/") &&
    typeof doc.rpc === "string" &&
    (doc.body === undefined || doc.body === "*")
  );
}

export function routeKey(method: string, pathname: string): string {
  return `${method.toUpperCase()} ${pathname}`;
}

/**
 * Read every route file in `routeDir`. A file holds a list of routes, or an
 * object with a `routes` list.
 *
 * @throws Error naming the file when an entry is malformed or a route is declared twice
 */
export function loadRoutes(routeDir: string): RouteDoc[] {
  if (!fs.existsSync(routeDir)) return [];
  const files = fs.readdirSync(routeDir).filter(f => ROUTE_FILE.test(f)).sort();
  const routes: RouteDoc[] = [];
  const seen = new Set<string>();

  for (const f of files) {
    const raw = fs.readFileSync(path.join(routeDir, f), "utf8");
    let doc: unknown = f.endsWith(".json") ? JSON.parse(raw) : yaml.load(raw);
    if (doc === undefined || doc === null) continue;
    if (!Array.isArray(doc) && typeof doc === "object" && "routes" in doc) doc = doc.routes;
    if (!Array.isArray(doc)) throw new Error(`${f}: expected a list of routes`);

    doc.forEach((entry: unknown, i: number) => {
      if (!isRouteDoc(entry)) throw new Error(`${f}: route #${i + 1} needs method, path (starting with /) and rpc`);
      const key = routeKey(entry.method, entry.path);
      if (seen.has(key)) throw new Error(`${f}: duplicate route ${key}`);
      seen.add(key);
      routes.push({ ...entry, method: entry.method.toUpperCase() });
    });
  }
  return routes;
}
