/**
 * Bridges MCP tool calls to the tool registry.
 *
 * Lifecycle: `uninitialized` → start() → `running` → close() → `shutdown`.
 * Each call produces exactly one ToolResult, except a cancelled call, which
 * produces none. Store failures arrive as values and leave as failed tool
 * results; they never surface as protocol errors.
 */

import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import type { Result, ToolErrorKind } from "../errors.js";
import { childLogger } from "../logger.js";
import { errorResult, successResult } from "../tools/_helpers.js";
import type { ToolListing, ToolRegistry } from "../tools/registry.js";

export type DispatcherState = "uninitialized" | "running" | "shutdown";

export interface ToolRequest {
  toolName: string;
  parameters: Record<string, unknown>;
}

export type ToolResult =
  | { status: "success"; payload: unknown }
  | { status: "failure"; kind: ToolErrorKind; message: string; httpStatus?: number; code?: string };

const log = childLogger("dispatcher");

function failure(kind: ToolErrorKind, message: string): ToolResult {
  return { status: "failure", kind, message };
}

export function toCallToolResult(result: ToolResult): CallToolResult {
  if (result.status === "success") return successResult(result.payload);
  return errorResult({ kind: result.kind, message: result.message, status: result.httpStatus, code: result.code });
}

export class ToolDispatcher {
  private currentState: DispatcherState = "uninitialized";
  private readonly inFlight = new Set<Promise<Result<unknown>>>();

  constructor(private readonly registry: ToolRegistry) {}

  get state(): DispatcherState {
    return this.currentState;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  start(): void {
    if (this.currentState !== "uninitialized") {
      throw new Error(`Cannot start a dispatcher in state "${this.currentState}"`);
    }
    this.currentState = "running";
    log.info({ tools: this.registry.size }, "dispatcher running");
  }

  /** Stops accepting calls and resolves once every in-flight call has finished. Safe to call repeatedly. */
  async close(): Promise<void> {
    if (this.currentState !== "shutdown") {
      this.currentState = "shutdown";
      log.info({ pending: this.inFlight.size }, "dispatcher shutting down");
    }
    await Promise.allSettled([...this.inFlight]);
  }

  listTools(): ToolListing[] {
    return this.registry.list();
  }

  /**
   * Runs one tool call. Resolves to `undefined` when `signal` cancels the call.
   */
  async dispatch(request: ToolRequest, signal?: AbortSignal): Promise<ToolResult | undefined> {
    const { toolName } = request;
    if (this.currentState !== "running") {
      return failure("Unavailable", `Server is ${this.currentState}; tool ${toolName} was not run`);
    }

    const tool = this.registry.get(toolName);
    if (!tool) {
      log.warn({ tool: toolName }, "unknown tool");
      return failure("UnknownTool", `Unknown tool: ${toolName}`);
    }

    const started = Date.now();
    const call = tool.invoke(request.parameters, { signal });
    this.inFlight.add(call);
    let outcome: Result<unknown>;
    try {
      outcome = await call;
    } finally {
      this.inFlight.delete(call);
    }
    const durationMs = Date.now() - started;

    if (outcome.ok && !signal?.aborted) {
      log.info({ tool: toolName, outcome: "success", durationMs }, "tool call completed");
      return { status: "success", payload: outcome.value };
    }

    if (outcome.ok || outcome.error.kind === "Cancelled" || signal?.aborted) {
      log.info({ tool: toolName, durationMs }, "tool call cancelled");
      return undefined;
    }

    const kind = outcome.error.kind;
    const { message, status, code } = outcome.error;
    log.info({ tool: toolName, outcome: kind, status, durationMs }, "tool call failed");
    return { status: "failure", kind, message, httpStatus: status, code };
  }

  /** Installs `tools/list` and `tools/call` handlers on an MCP server. */
  attach(server: Server): void {
    server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: this.listTools() }));

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const result = await this.dispatch(
        { toolName: request.params.name, parameters: request.params.arguments ?? {} },
        extra.signal,
      );
      if (!result) {
        // The SDK drops responses to cancelled requests; this only ends the handler.
        throw new McpError(ErrorCode.InternalError, `Tool call ${request.params.name} was cancelled`);
      }
      return toCallToolResult(result);
    });
  }
}
