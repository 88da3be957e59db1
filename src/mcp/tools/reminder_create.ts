import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { isInputError } from "../../errors.js";
import { parseDuration } from "../../reminders/duration.js";
import { parseServerTimeToDuration } from "../../reminders/serverTime.js";
import { TASK_KINDS } from "../../reminders/types.js";
import { errorResult, idSchema, textResult, type ReminderToolDeps } from "./helpers.js";

export function registerReminderCreateTool(server: McpServer, deps: ReminderToolDeps): void {
  server.registerTool(
    "reminder_create",
    {
      title: "Create Reminder",
      description:
        "Schedule a Last War reminder. Give either a duration (e.g. 2h, 1h30m, 1d7:04) or the in-game server time (17:09 or 8-11-2025 17:09), plus an optional heads-up lead time.",
      inputSchema: {
        owner_id: idSchema,
        chat_id: idSchema,
        kind: z.enum(TASK_KINDS),
        task_name: z.string().trim().min(1).optional(),
        duration: z.string().trim().min(1).optional(),
        server_time: z.string().trim().min(1).optional(),
        lead_time: z.string().trim().min(1).optional()
      }
    },
    async (args) => {
      if (Boolean(args.duration) === Boolean(args.server_time)) {
        return errorResult("Provide exactly one of duration or server_time.");
      }

      try {
        const now = deps.now ? deps.now() : Date.now();
        const duration = args.server_time
          ? parseServerTimeToDuration(args.server_time, new Date(now))
          : parseDuration(args.duration ?? "");
        const { label, jobIds } = deps.scheduler.schedule({
          ownerId: args.owner_id,
          chatId: args.chat_id,
          kind: args.kind,
          taskName: args.task_name,
          duration,
          leadTime: args.lead_time,
          webhookUrl: deps.webhookUrl
        });
        return textResult(`Scheduled ${label}\n${jobIds.join("\n")}`);
      } catch (err) {
        if (isInputError(err)) return errorResult(err.message);
        throw err;
      }
    }
  );
}
