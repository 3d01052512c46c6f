import type { WooClient } from "../client/woo-client.js";
import { customerTools } from "./customers.js";
import { orderTools } from "./orders.js";
import { productTools } from "./products.js";
import { ToolRegistry } from "./registry.js";
import { storeTools } from "./store.js";

export function buildToolRegistry(client: WooClient): ToolRegistry {
  return new ToolRegistry([
    ...productTools(client),
    ...orderTools(client),
    ...customerTools(client),
    ...storeTools(client),
  ]);
}
