/**
 * Tool definitions and the startup-validated tool table.
 *
 * `defineTool` binds a zod parameter schema to a handler that performs one
 * WooCommerce call, and erases the parameter type so tools of different
 * shapes can live in one table. The table is built once; duplicate or
 * nameless tools and missing handlers fail construction.
 */

import { z } from "zod";
import { err, ToolRegistryError, type Result, type WooFailure } from "../errors.js";

export type ToolOperation = "list" | "get" | "create" | "update" | "delete" | "read";

export interface ToolContext {
  signal?: AbortSignal;
}

export interface ToolSpec<S extends z.ZodType> {
  name: string;
  description: string;
  /** WooCommerce endpoint the tool reaches, e.g. `products`. */
  resource: string;
  operation: ToolOperation;
  schema: S;
  handler: (params: z.output<S>, context: ToolContext) => Promise<Result<unknown>>;
}

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, object>;
  required?: string[];
}

export interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  readonly resource: string;
  readonly operation: ToolOperation;
  readonly inputSchema: ToolInputSchema;
  /** Validates `parameters`, then runs the handler. Invalid input never reaches the handler. */
  invoke(parameters: Record<string, unknown>, context: ToolContext): Promise<Result<unknown>>;
}

export interface ToolListing {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

function toInputSchema(schema: z.ZodType): ToolInputSchema {
  const json = z.toJSONSchema(schema, { io: "input" });
  const properties: Record<string, object> = {};
  for (const [key, value] of Object.entries(json.properties ?? {})) {
    if (typeof value === "object" && value !== null) properties[key] = value;
  }
  return json.required?.length ? { type: "object", properties, required: json.required } : { type: "object", properties };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(parameters)"}: ${issue.message}`)
    .join("; ");
}

export function defineTool<S extends z.ZodType>(spec: ToolSpec<S>): RegisteredTool {
  if (typeof spec.handler !== "function") {
    throw new ToolRegistryError(`Tool "${spec.name}" has no handler`);
  }
  const { name, description, resource, operation, schema, handler } = spec;

  return {
    name,
    description,
    resource,
    operation,
    inputSchema: toInputSchema(schema),
    async invoke(parameters, context) {
      const parsed = schema.safeParse(parameters);
      if (!parsed.success) {
        return err<WooFailure>({ kind: "ValidationError", message: `Invalid parameters for ${name}: ${formatIssues(parsed.error)}` });
      }
      return handler(parsed.data, context);
    },
  };
}

export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, RegisteredTool>;

  constructor(tools: readonly RegisteredTool[]) {
    const table = new Map<string, RegisteredTool>();
    for (const tool of tools) {
      if (!tool.name) {
        throw new ToolRegistryError(`A ${tool.resource} ${tool.operation} tool was declared without a name`);
      }
      if (table.has(tool.name)) {
        throw new ToolRegistryError(`Tool "${tool.name}" is declared more than once`);
      }
      if (typeof tool.invoke !== "function") {
        throw new ToolRegistryError(`Tool "${tool.name}" has no handler`);
      }
      table.set(tool.name, tool);
    }
    this.tools = table;
  }

  get size(): number {
    return this.tools.size;
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  list(): ToolListing[] {
    return [...this.tools.values()].map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));
  }
}
