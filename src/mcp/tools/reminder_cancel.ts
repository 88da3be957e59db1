import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { idSchema, textResult, type ReminderToolDeps } from "./helpers.js";

export function registerReminderCancelTool(server: McpServer, deps: ReminderToolDeps): void {
  server.registerTool(
    "reminder_cancel",
    {
      title: "Cancel Reminder",
      description: "Cancel one pending reminder by its job id (as shown by reminder_list)",
      inputSchema: {
        job_id: z.string().trim().min(1)
      }
    },
    async ({ job_id }) => textResult(deps.scheduler.cancel(job_id) ? "Cancelled" : "Not found")
  );

  server.registerTool(
    "reminder_cancel_all",
    {
      title: "Cancel All Reminders",
      description: "Cancel every pending reminder of an owner in a chat",
      inputSchema: {
        owner_id: idSchema,
        chat_id: idSchema
      }
    },
    async ({ owner_id, chat_id }) => {
      const n = deps.scheduler.cancelAll(owner_id, chat_id);
      return textResult(`Cancelled ${n} reminder(s).`);
    }
  );
}
