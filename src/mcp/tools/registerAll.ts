import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ReminderToolDeps } from "./helpers.js";
import { registerReminderCancelTool } from "./reminder_cancel.js";
import { registerReminderCreateTool } from "./reminder_create.js";
import { registerReminderListTool } from "./reminder_list.js";

export function registerReminderTools(server: McpServer, deps: ReminderToolDeps): void {
  registerReminderCreateTool(server, deps);
  registerReminderListTool(server, deps);
  registerReminderCancelTool(server, deps);
}
