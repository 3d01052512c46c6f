import pino from "pino";

// stdout carries the MCP stdio stream, so every log line goes to stderr.
export const logger = pino(
  {
    name: "woocommerce-mcp",
    level: process.env.LOG_LEVEL || "info",
    redact: ["consumerKey", "consumerSecret", "*.consumerKey", "*.consumerSecret"],
  },
  pino.destination(2),
);

export function childLogger(component: string) {
  return logger.child({ component });
}
