import { logger } from "../logger.js";
import type { WebhookNotifier } from "../reminders/webhook.js";
import type { ChatEvent, ChatTransport, Keyboard } from "../types.js";
import { errorMessage } from "../utils/async.js";

export const DuolingoMessages = {
  WELCOME: "🦉 Duolingo Bot\n\nWhat would you like to do?",
  NOTIFYING: "⏳ Notifying your friends...",
  SUCCESS: "🔔 Notification sent successfully!\n\nYour friends have been notified. Keep up the great work! 🎉",
  FAILED: "❌ Failed to notify friends. Please try again later."
} as const;

// Sent to friends as-is, so they stay in Portuguese.
export const FRIEND_MESSAGES: readonly string[] = [
  "Sobrevivi ao Duolingo de hoje! E você, já fez a sua lição ou vai deixar a coruja nervosa?",
  "A lição de hoje foi difícil, mas a ofensiva tá viva! 🧠🔥 Já garantiu a sua também?",
  "Duolingo feito com sucesso ✅ A coruja sorriu. E aí, vai deixar ela decepcionada hoje?",
  "Quase perdi a ofensiva, mas dei o gás no final! 🏃‍♂️🔥 Já fez a sua parte ou vai arriscar?",
  "🦉 Missão do dia cumprida! Agora é sua vez... Não me decepciona 😏",
  "Mais um dia de aprendizado, mais um dia salvo da fúria da coruja. 🕊️ E você, já estudou hoje?",
  "Se eu consegui fazer Duolingo hoje, você também consegue! 💪 Bora manter essa ofensiva viva!",
  "Já fiz minha parte no Duolingo. Agora é com vocês! 👀 Não vão quebrar a sequência hein!",
  "🧩 Duolingo do dia concluído! E você, já alimentou sua corujinha hoje?",
  "A lição de hoje quase me quebrou… mas a ofensiva tá salva 😮‍💨 Já garantiu a sua?"
];

const NOTIFY = "duo:notify";
const MENU: Keyboard = [[{ text: "Notify Friends", data: NOTIFY }]];

export type DuolingoDeps = {
  transport: ChatTransport;
  notifier: Pick<WebhookNotifier, "post">;
  /** Returns a value in [0, 1); `Math.random` when unset. */
  random?: () => number;
};

export function pickFriendMessage(random: () => number): string {
  const i = Math.min(FRIEND_MESSAGES.length - 1, Math.floor(random() * FRIEND_MESSAGES.length));
  return FRIEND_MESSAGES[Math.max(0, i)];
}

/** `/duolingo` menu whose single button pings friends through the Duolingo webhook. */
export class DuolingoHandler {
  private readonly random: () => number;

  constructor(private readonly deps: DuolingoDeps) {
    this.random = deps.random ?? Math.random;
  }

  /** Returns true when the event belonged to this bot. */
  async handle(evt: ChatEvent): Promise<boolean> {
    if (evt.kind === "message") {
      const command = evt.text.trim().split(/\s+/)[0].replace(/@.*$/, "").toLowerCase();
      if (command !== "/duolingo") return false;
      await this.deps.transport.sendText(evt.chatId, DuolingoMessages.WELCOME, MENU);
      return true;
    }

    if (!evt.data.startsWith("duo:")) return false;
    try {
      await this.deps.transport.answerButton(evt.callbackId);
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, "answerCallbackQuery failed");
    }
    if (evt.data === NOTIFY) await this.notifyFriends(evt.chatId, evt.messageId);
    return true;
  }

  private async notifyFriends(chatId: string, messageId: string): Promise<void> {
    await this.deps.transport.editText(chatId, messageId, DuolingoMessages.NOTIFYING);
    const ok = await this.deps.notifier.post({ message: pickFriendMessage(this.random) });
    logger.info({ chatId, ok }, "duolingo friends notified");
    await this.deps.transport.sendText(chatId, ok ? DuolingoMessages.SUCCESS : DuolingoMessages.FAILED);
  }
}
