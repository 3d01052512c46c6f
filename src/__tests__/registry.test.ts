import { describe, it, expect } from "vitest";
import { z } from "zod";
import { WooClient } from "../client/woo-client.js";
import { ok, ToolRegistryError } from "../errors.js";
import { buildToolRegistry } from "../tools/index.js";
import { buildProductUpdate, SEO_DESCRIPTION_META_KEY, SEO_TITLE_META_KEY } from "../tools/products.js";
import { defineTool, ToolRegistry, type RegisteredTool } from "../tools/registry.js";
import { testConfig } from "./fixtures.js";

function echoTool(name: string): RegisteredTool {
  return defineTool({
    name,
    description: `Echo for ${name}`,
    resource: "products",
    operation: "get",
    schema: z.object({ id: z.number().int().positive() }),
    handler: async (params) => ok(params),
  });
}

describe("ToolRegistry", () => {
  it("rejects two tools with the same name", () => {
    expect(() => new ToolRegistry([echoTool("get_product"), echoTool("get_product")])).toThrow(
      new ToolRegistryError('Tool "get_product" is declared more than once'),
    );
  });

  it("rejects a tool without a name", () => {
    expect(() => new ToolRegistry([echoTool("")])).toThrow(ToolRegistryError);
  });

  it("rejects a tool whose handler is missing", () => {
    const broken = { ...echoTool("broken") };
    Reflect.deleteProperty(broken, "invoke");

    expect(() => new ToolRegistry([broken])).toThrow('Tool "broken" has no handler');
  });

  it("rejects a definition without a handler", () => {
    const spec = {
      name: "no_handler",
      description: "Missing handler",
      resource: "products",
      operation: "get" as const,
      schema: z.object({}),
      handler: async () => ok(null),
    };
    Reflect.deleteProperty(spec, "handler");

    expect(() => defineTool(spec)).toThrow(ToolRegistryError);
  });

  it("validates parameters before the handler runs", async () => {
    let calls = 0;
    const tool = defineTool({
      name: "count",
      description: "Counts calls",
      resource: "products",
      operation: "get",
      schema: z.object({ id: z.number().int().positive() }),
      handler: async () => {
        calls += 1;
        return ok(null);
      },
    });

    const result = await tool.invoke({ id: "seven" }, {});

    expect(calls).toBe(0);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.kind).toBe("ValidationError");
    expect(!result.ok && result.error.message.startsWith("Invalid parameters for count: id: ")).toBe(true);
  });
});

describe("buildToolRegistry", () => {
  const registry = buildToolRegistry(new WooClient(testConfig()));

  it("registers every store tool once, in a fixed order", () => {
    expect(registry.list().map((tool) => tool.name)).toEqual([
      "list_products",
      "get_product",
      "create_product",
      "update_product",
      "delete_product",
      "list_orders",
      "get_order",
      "create_order",
      "update_order",
      "delete_order",
      "list_customers",
      "get_customer",
      "create_customer",
      "update_customer",
      "delete_customer",
      "list_product_categories",
      "get_product_category",
      "get_system_status",
    ]);
  });

  it("publishes JSON Schemas with required parameters", () => {
    const byName = new Map(registry.list().map((tool) => [tool.name, tool.inputSchema]));

    expect(byName.get("get_order")?.required).toEqual(["id"]);
    expect(byName.get("create_order")?.required).toEqual(["order"]);
    expect(byName.get("list_products")?.required).toBeUndefined();
    expect(Object.keys(byName.get("list_products")?.properties ?? {})).toContain("per_page");
    expect(byName.get("get_system_status")).toEqual({ type: "object", properties: {} });
  });
});

describe("buildProductUpdate", () => {
  it("turns SEO fields into Yoast meta data entries", () => {
    const body = buildProductUpdate({
      id: 5,
      updates: { description: "Long description" },
      meta_title: "Title",
      meta_description: "Summary",
    });

    expect(body).toEqual({
      description: "Long description",
      meta_data: [
        { key: SEO_TITLE_META_KEY, value: "Title" },
        { key: SEO_DESCRIPTION_META_KEY, value: "Summary" },
      ],
    });
  });

  it("replaces SEO entries already present in meta_data and keeps the rest", () => {
    const body = buildProductUpdate({
      id: 5,
      updates: {
        meta_data: [
          { key: "color", value: "red" },
          { key: SEO_TITLE_META_KEY, value: "Old" },
        ],
      },
      meta_title: "New",
    });

    expect(body.meta_data).toEqual([
      { key: "color", value: "red" },
      { key: SEO_TITLE_META_KEY, value: "New" },
    ]);
  });

  it("leaves the body untouched without SEO fields", () => {
    expect(buildProductUpdate({ id: 5, updates: { sku: "TEST-1" } })).toEqual({ sku: "TEST-1" });
  });
});
