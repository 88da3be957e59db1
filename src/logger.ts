import { destination, pino } from "pino";

// stderr keeps stdout free for the MCP stdio transport.
export const logger = pino(
  {
    name: "lastwar-reminder-bot",
    level: process.env.LOG_LEVEL?.trim() || "info"
  },
  destination(2)
);

export type { Logger } from "pino";
