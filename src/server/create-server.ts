import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { WooClient } from "../client/woo-client.js";
import type { AdapterConfig } from "../config.js";
import { buildToolRegistry } from "../tools/index.js";
import type { ToolRegistry } from "../tools/registry.js";
import { ToolDispatcher } from "./dispatcher.js";

export const SERVER_NAME = "woocommerce-mcp";
export const SERVER_VERSION = "0.1.0";

export interface WooMcpServer {
  server: Server;
  dispatcher: ToolDispatcher;
  registry: ToolRegistry;
  client: WooClient;
}

/**
 * Wires client, tool registry and dispatcher onto an MCP server.
 * The dispatcher is left `uninitialized`; the caller starts it once the
 * transport is ready.
 */
export function createServer(config: AdapterConfig): WooMcpServer {
  const client = new WooClient(config);
  const registry = buildToolRegistry(client);
  const dispatcher = new ToolDispatcher(registry);

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: { tools: {} },
      instructions:
        "Tools for a WooCommerce store: list, get, create, update and delete products, orders and customers. List tools return one page per call; use page and per_page to move through results.",
    },
  );
  dispatcher.attach(server);

  return { server, dispatcher, registry, client };
}

/** Closes the transport, then waits for in-flight tool calls to finish. */
export async function shutdownServer({ server, dispatcher }: Pick<WooMcpServer, "server" | "dispatcher">): Promise<void> {
  await server.close();
  await dispatcher.close();
}
