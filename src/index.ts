#!/usr/bin/env node

/**
 * woocommerce-mcp
 *
 * An MCP (Model Context Protocol) server for WooCommerce stores. Exposes the
 * store's products, orders and customers from the WooCommerce REST API v3 as
 * tools an AI agent can call over stdio.
 *
 * Usage: woocommerce-mcp [path/to/config.json]
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { logger } from "./logger.js";
import { createServer, SERVER_VERSION, shutdownServer } from "./server/create-server.js";

async function main() {
  const config = loadConfig();
  const mcp = createServer(config);
  const { server, dispatcher } = mcp;

  // Client hung up: stop taking calls and let the running ones finish.
  server.onclose = () => {
    dispatcher.close().then(
      () => logger.info("transport closed"),
      (error: unknown) => logger.error({ err: error }, "error while draining tool calls"),
    );
  };

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    shutdownServer(mcp).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, "error while closing server");
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  dispatcher.start();
  await server.connect(new StdioServerTransport());

  logger.info({ version: SERVER_VERSION, store: config.credentials.storeUrl }, "woocommerce-mcp connected");
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "fatal error starting woocommerce-mcp");
  process.exit(1);
});
