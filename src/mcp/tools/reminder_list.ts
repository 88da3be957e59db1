import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { idSchema, textResult, type ReminderToolDeps } from "./helpers.js";

export function registerReminderListTool(server: McpServer, deps: ReminderToolDeps): void {
  server.registerTool(
    "reminder_list",
    {
      title: "List Reminders",
      description: "List the pending reminders of an owner in a chat, soonest first",
      inputSchema: {
        owner_id: idSchema,
        chat_id: idSchema
      }
    },
    async ({ owner_id, chat_id }) => {
      const jobs = deps.scheduler.list(owner_id, chat_id);
      if (!jobs.length) return textResult("No pending reminders.");
      const lines = jobs.map((j) => `${deps.scheduler.display(j.id, j.fireAt)} (${j.id})`);
      return textResult(lines.join("\n"));
    }
  );
}
