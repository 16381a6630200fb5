import pino from "pino";

// stdout carries MCP frames, so every log line goes to fd 2.
export const logger = pino(
  {
    name: "buck2-mcp",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);
