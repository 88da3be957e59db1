import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "../../config.js";
import { logger } from "../../logger.js";
import { createReminderNotifier } from "../../reminders/notifier.js";
import { ReminderScheduler } from "../../reminders/scheduler.js";
import { WebhookNotifier } from "../../reminders/webhook.js";
import { registerReminderTools } from "../tools/registerAll.js";

const config = loadConfig();

const scheduler = new ReminderScheduler({
  notify: createReminderNotifier({ webhook: new WebhookNotifier(config.LASTWAR_WEBHOOK_URL) }),
  timeZone: config.DISPLAY_TIMEZONE
});
scheduler.start();

const server = new McpServer({ name: "lastwar-reminders", version: "0.1.0" });
registerReminderTools(server, { scheduler, webhookUrl: config.LASTWAR_WEBHOOK_URL });

const transport = new StdioServerTransport();
transport.onclose = () => scheduler.stop();
await server.connect(transport);
logger.info({ webhook: Boolean(config.LASTWAR_WEBHOOK_URL) }, "reminder MCP server ready");
