import "dotenv/config";
import { loadConfig, requireBotToken } from "./config.js";
import { logger } from "./logger.js";
import { TelegramClient } from "./adapters/telegram/TelegramClient.js";
import { ReminderConversation } from "./core/conversation.js";
import { ConversationStore } from "./core/conversationStore.js";
import { DuolingoHandler } from "./core/duolingo.js";
import { OpenAiCompatClient } from "./llm/openaiCompat.js";
import { interpretNaturalCommand } from "./nl/interpreter.js";
import { printError, printInbound } from "./observability/console.js";
import { createReminderNotifier } from "./reminders/notifier.js";
import { ReminderScheduler } from "./reminders/scheduler.js";
import { WebhookNotifier } from "./reminders/webhook.js";

const config = loadConfig();
const telegram = new TelegramClient(config, requireBotToken(config));

const scheduler = new ReminderScheduler({
  notify: createReminderNotifier({
    chat: {
      sendText: async (chatId, text) => {
        await telegram.sendText(chatId, text);
      }
    },
    webhook: new WebhookNotifier(config.LASTWAR_WEBHOOK_URL),
    defaultWebhookUrl: config.LASTWAR_WEBHOOK_URL
  }),
  timeZone: config.DISPLAY_TIMEZONE
});
scheduler.start();

const llm = new OpenAiCompatClient(config.LLM_BASE_URL, config.LLM_API_KEY);
const conversation = new ReminderConversation({
  transport: telegram,
  scheduler,
  store: new ConversationStore(config.CONVERSATION_TTL_MS),
  interpret: llm.configured
    ? (text) => interpretNaturalCommand(llm, { model: config.LLM_MODEL, temperature: config.LLM_TEMPERATURE }, text)
    : undefined,
  webhookUrl: config.LASTWAR_WEBHOOK_URL
});
const duolingo = new DuolingoHandler({ transport: telegram, notifier: new WebhookNotifier(config.DUOLINGO_WEBHOOK_URL) });

function shutdown(signal: string): void {
  logger.info({ signal }, "Shutting down");
  scheduler.stop();
  telegram.stop().catch((err) => logger.error({ err }, "Telegram stop failed"));
}
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

logger.info(
  {
    telegramApi: config.TELEGRAM_API_BASE,
    webhook: Boolean(config.LASTWAR_WEBHOOK_URL),
    duolingoWebhook: Boolean(config.DUOLINGO_WEBHOOK_URL),
    naturalLanguage: llm.configured,
    timeZone: config.DISPLAY_TIMEZONE ?? "local"
  },
  "Bot started"
);

await telegram.startPolling(async (evt) => {
  printInbound(evt);
  try {
    if (await duolingo.handle(evt)) return;
    await conversation.handle(evt);
  } catch (err) {
    printError("handle/send", err);
    logger.error({ err }, "handle/send failed");
  }
});
