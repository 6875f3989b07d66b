import { loadConfig } from "./config.js";
import { createDefaultCodecRegistry } from "./infrastructure/codec/registry.js";
import { createGatewayServer, type GatewayRoute, type GatewayServer } from "./infrastructure/gatewayServer.js";
import { loadProtos } from "./infrastructure/protoLoader.js";
import { loadRoutes } from "./infrastructure/routeLoader.js";
import { createUpstream, type Upstream } from "./infrastructure/upstream.js";
import { createGateway } from "./interfaces/http/gateway.js";
import { err, log } from "./utils/logger.js";

let server: GatewayServer | null = null;
let upstream: Upstream | null = null;

/**
 * Stop the HTTP server, then close the upstream channel. Safe to call more
 * than once.
 */
async function shutdown(): Promise<void> {
  log("[shutdown] Starting shutdown...");
  if (server) {
    try {
      await server.stop();
    } catch (e) {
      err("[shutdown] Failed to stop gateway server:", e);
    }
    server = null;
  }
  if (upstream) {
    upstream.close();
    upstream = null;
  }
  log("[shutdown] Done");
}

async function main(): Promise<void> {
  const config = loadConfig();

  const { root, report } = await loadProtos(config.protoDir);
  for (const r of report) {
    if (r.status === "loaded") log(`[protos] loaded ${r.file}`);
    else err(`[protos] skipped ${r.file}: ${r.error}`);
  }

  const routeDocs = loadRoutes(config.routeDir);
  upstream = createUpstream(config.upstream, root);

  const routes: GatewayRoute[] = [];
  for (const doc of routeDocs) {
    try {
      routes.push({ method: doc.method, path: doc.path, body: doc.body, binding: upstream.bind(doc.rpc) });
      log(`[routes] ${doc.method} ${doc.path} -> ${doc.rpc}`);
    } catch (e) {
      err(`[routes] skipped ${doc.method} ${doc.path}:`, e instanceof Error ? e.message : e);
    }
  }
  if (routes.length === 0) err("Warning: no routes bound; every request will get 404");

  const gateway = createGateway({
    codecs: createDefaultCodecRegistry(config.defaultCodec),
    logger: log,
    errorLogger: err,
  });

  server = createGatewayServer({
    port: config.httpPort,
    host: config.host,
    routes,
    gateway,
    maxBodyBytes: config.maxBodyBytes,
    requestTimeoutMs: config.requestTimeoutMs,
    corsEnabled: config.corsEnabled,
    corsOrigins: config.corsOrigins,
    logger: log,
    errorLogger: err,
  });
  await server.start();
  log(`Forwarding to ${config.upstream}`);
}

process.on("unhandledRejection", r => err("Unhandled rejection", r));

const graceful = async (signal: string) => {
  log(`[lifecycle] ${signal} → graceful shutdown`);
  try {
    await shutdown();
  } finally {
    process.exit(0);
  }
};
process.on("SIGTERM", () => void graceful("SIGTERM"));
process.on("SIGINT", () => void graceful("SIGINT"));

main().catch(e => {
  err("Failed to start gateway:", e);
  process.exitCode = 1;
  void shutdown();
});
