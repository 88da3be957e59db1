import { Bot, InlineKeyboard } from "grammy";
import type { Update } from "grammy/types";
import { logger } from "../../logger.js";
import { errorMessage } from "../../utils/async.js";
import type { AppConfig } from "../../config.js";
import type { ChatEvent, ChatTransport, Keyboard, SentMessage } from "../../types.js";

export function toInlineKeyboard(keyboard: Keyboard): InlineKeyboard {
  const kb = new InlineKeyboard();
  keyboard.forEach((row, i) => {
    if (i > 0) kb.row();
    for (const b of row) kb.text(b.text, b.data);
  });
  return kb;
}

export function toChatEvent(u: Update): ChatEvent | null {
  const m = u.message;
  if (m?.text !== undefined && m.from) {
    return {
      kind: "message",
      chatId: String(m.chat.id),
      chatType: m.chat.type,
      userId: String(m.from.id),
      messageId: String(m.message_id),
      text: m.text,
      timestampMs: m.date * 1000
    };
  }
  const q = u.callback_query;
  if (q?.data && q.message) {
    return {
      kind: "button",
      chatId: String(q.message.chat.id),
      chatType: q.message.chat.type,
      userId: String(q.from.id),
      messageId: String(q.message.message_id),
      callbackId: q.id,
      data: q.data,
      timestampMs: Date.now()
    };
  }
  return null;
}

/** grammY bot wrapped as a `ChatTransport`, with long polling for inbound updates. */
export class TelegramClient implements ChatTransport {
  readonly bot: Bot;
  private listening = false;

  constructor(
    private readonly config: Pick<AppConfig, "TELEGRAM_API_BASE" | "TELEGRAM_POLL_TIMEOUT_S">,
    token: string
  ) {
    this.bot = new Bot(token, { client: { apiRoot: config.TELEGRAM_API_BASE.replace(/\/+$/, "") } });
    this.bot.catch((err) => {
      logger.error({ err: errorMessage(err.error), updateId: err.ctx.update.update_id }, "Telegram middleware failed");
    });
  }

  async sendText(chatId: string, text: string, keyboard?: Keyboard): Promise<SentMessage> {
    const sent = await this.bot.api.sendMessage(chatId, text, keyboard ? { reply_markup: toInlineKeyboard(keyboard) } : undefined);
    return { chatId: String(sent.chat.id), messageId: String(sent.message_id), text };
  }

  /** Replaces the text and drops any inline keyboard. */
  async editText(chatId: string, messageId: string, text: string): Promise<void> {
    await this.bot.api.editMessageText(chatId, Number(messageId), text);
  }

  async answerButton(callbackId: string): Promise<void> {
    await this.bot.api.answerCallbackQuery(callbackId);
  }

  /** Routes text messages and button presses to `onEvent`. Handler errors are logged per update. */
  listen(onEvent: (evt: ChatEvent) => Promise<void>): void {
    if (this.listening) return;
    this.listening = true;
    const dispatch = async (update: Update): Promise<void> => {
      const evt = toChatEvent(update);
      if (!evt) return;
      try {
        await onEvent(evt);
      } catch (err) {
        logger.error({ err: errorMessage(err), updateId: update.update_id }, "Handle update failed");
      }
    };
    this.bot.on("message:text", (ctx) => dispatch(ctx.update));
    this.bot.on("callback_query:data", (ctx) => dispatch(ctx.update));
  }

  /** Polls until `stop()`; resolves once polling has ended. */
  async startPolling(onEvent: (evt: ChatEvent) => Promise<void>): Promise<void> {
    this.listen(onEvent);
    await this.bot.start({
      timeout: this.config.TELEGRAM_POLL_TIMEOUT_S,
      allowed_updates: ["message", "callback_query"],
      onStart: (me) => logger.info({ username: me.username }, "Telegram polling started")
    });
    logger.info("Telegram polling stopped");
  }

  async stop(): Promise<void> {
    await this.bot.stop();
  }
}
