import { logger } from "../logger.js";
import { errorMessage } from "../utils/async.js";
import type { NotifyFn, ReminderMessage } from "./types.js";
import type { WebhookNotifier } from "./webhook.js";

export interface ChatSender {
  sendText(chatId: string, text: string): Promise<void>;
}

/**
 * Builds the scheduler's delivery callback: the chat message decides success,
 * the webhook copy (per-request URL, else the default) is best effort.
 */
export function createReminderNotifier(deps: { chat?: ChatSender; webhook?: WebhookNotifier; defaultWebhookUrl?: string }): NotifyFn {
  return async (msg: ReminderMessage) => {
    const hookUrl = msg.webhookUrl ?? deps.defaultWebhookUrl;
    const hook =
      deps.webhook && hookUrl ? deps.webhook.post({ chat_id: msg.chatId, message: msg.text }, hookUrl) : Promise.resolve(true);

    let delivered = true;
    if (deps.chat) {
      try {
        await deps.chat.sendText(msg.chatId, msg.text);
      } catch (err) {
        logger.error({ chatId: msg.chatId, err: errorMessage(err) }, "chat delivery failed");
        delivered = false;
      }
    } else {
      logger.info({ chatId: msg.chatId, text: msg.text }, "reminder fired (no chat transport)");
    }

    const hookOk = await hook;
    if (!deps.chat) return hookOk;
    return delivered;
  };
}
