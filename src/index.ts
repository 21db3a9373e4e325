#!/usr/bin/env node

import { parseArgs } from "node:util";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { ConfigError, StoreUnavailableError } from "./errors.js";
import { SessionRegistry } from "./protocol/session-registry.js";
import { VaultMcpServer } from "./server.js";
import { createHttpApp, serveHttp } from "./transport/http.js";
import { runStdio } from "./transport/stdio.js";

const TRANSPORTS = ["stdio", "sse", "http"] as const;
type TransportName = (typeof TRANSPORTS)[number];

function isTransportName(value: string): value is TransportName {
  return TRANSPORTS.some((name) => name === value);
}

function parseCli(): { transport: TransportName; port?: number } {
  const { values } = parseArgs({
    options: {
      transport: { type: "string", short: "t", default: "stdio" },
      port: { type: "string", short: "p" },
    },
  });
  if (!isTransportName(values.transport)) {
    throw new Error(`Unknown transport '${values.transport}'. Expected one of: ${TRANSPORTS.join(", ")}`);
  }
  if (values.port === undefined) return { transport: values.transport };

  const port = Number(values.port);
  if (!Number.isInteger(port) || port < 1 || port > 65535) throw new Error(`Invalid port '${values.port}'`);
  return { transport: values.transport, port };
}

async function main(): Promise<void> {
  const cli = parseCli();
  const config = loadConfig();
  const server = new VaultMcpServer(config);

  if (!(await server.store.probe())) {
    // Keep serving: every read degrades to empty or not-found until the store is back.
    const warning = new StoreUnavailableError("startup probe", `${config.couch.url} did not answer for ${config.couch.database}`);
    console.error(`Warning: ${warning.message}`);
  }

  if (cli.transport === "stdio") {
    const session = server.createSession("stdio");
    const transport = new StdioServerTransport();
    const shutdown = () => session.close();
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    process.stdin.once("end", shutdown);

    console.error(`couch-notes-mcp running on stdio (db: ${config.couch.database})`);
    await runStdio(session, transport);
    server.close();
    return;
  }

  const registry = new SessionRegistry({
    createSession: (id) => server.createSession(id),
    idleTimeoutMs: config.http.sessionIdleTimeoutMs,
  });
  const app = createHttpApp({ registry, apiKey: config.http.apiKey });
  const httpServer = serveHttp(app, config.http.host, cli.port ?? config.http.port);

  const shutdown = () => {
    console.error("Shutting down...");
    registry.closeAll();
    server.close();
    httpServer.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
