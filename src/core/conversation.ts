import { isInputError } from "../errors.js";
import { logger } from "../logger.js";
import { commandDuration, type ParsedCommand } from "../nl/interpreter.js";
import { printOutbound } from "../observability/console.js";
import { formatDuration, parseDuration, toMinutes } from "../reminders/duration.js";
import type { ReminderScheduler } from "../reminders/scheduler.js";
import { parseServerTimeToDuration } from "../reminders/serverTime.js";
import { capitalize, isTaskKind, type Duration } from "../reminders/types.js";
import type { ChatEvent, ChatTransport, Keyboard } from "../types.js";
import { errorMessage } from "../utils/async.js";
import type { ConversationContext, ConversationStore, PromptKey } from "./conversationStore.js";

export const HEADER = "⚔️ Last War Bot\n\n";

export const Messages = {
  WELCOME: "What would you like to be reminded about?",
  DURATION_QUESTION: "When should the reminder go off?",
  DURATION_EXAMPLE: "(e.g. 2h, 1h30m, or tap below)",
  DURATION_ERROR: "The duration you sent is not valid. Please, try formats like 2h, 1d7:04, or 30m.",
  SERVER_TIME_ASK: "Inform the server time shown in-game:",
  SERVER_TIME_EXAMPLE: "(e.g., 8-11-2025 17:09 or 17:09)",
  SERVER_TIME_ERROR: "The server time you sent is not valid. Please, try formats like 17:09 or 8-11-2025 17:09.",
  HEADS_UP_QUESTION: "Heads-up before start?",
  CUSTOM_TASK_ASK: "Inform the task name:",
  NL_INVALID: "I couldn't understand that. Please, try again.",
  NL_UNAVAILABLE: "Please, pick an option from the menu.",
  MENU_EXPIRED: "This menu has expired. Send /lw to start again.",
  NO_REMINDERS: "No pending reminders.",
  CANCEL_QUESTION: "Which reminder should be cancelled?",
  CANCELLED_ONE: "🗑 Reminder cancelled.",
  CANCEL_GONE: "That reminder already fired or was cancelled.",
  CONVERSATION_CANCELLED: "Cancelled.",
  HELP:
    "/lw - set a reminder (truck, build, research, train, ministry or custom)\n" +
    "/list - show pending reminders\n" +
    "/clear - cancel all pending reminders\n" +
    "/cancel - abandon the current setup"
} as const;

const MENU: Keyboard = [
  [
    { text: "🚚 Truck", data: "lw:truck" },
    { text: "🏗 Build", data: "lw:build" },
    { text: "🔬 Research", data: "lw:research" }
  ],
  [
    { text: "🪖 Train", data: "lw:train" },
    { text: "🏛 Ministry", data: "lw:ministry" },
    { text: "✏️ Custom", data: "lw:custom" }
  ],
  [
    { text: "📝 List", data: "lw:list" },
    { text: "🗑 Cancel", data: "lw:cancel" }
  ]
];

const DURATION_KEYBOARD: Keyboard = [
  [
    { text: "30m", data: "lw:dur:30m" },
    { text: "1h", data: "lw:dur:1h" },
    { text: "2h", data: "lw:dur:2h" }
  ]
];

const HEADS_UP_KEYBOARD: Keyboard = [
  [
    { text: "1m", data: "lw:lead_time:1m" },
    { text: "3m", data: "lw:lead_time:3m" },
    { text: "5m", data: "lw:lead_time:5m" }
  ],
  [{ text: "No", data: "lw:lead_time:skip" }]
];

export type NaturalInterpreter = (text: string) => Promise<ParsedCommand | null>;

export type ConversationDeps = {
  transport: ChatTransport;
  scheduler: ReminderScheduler;
  store: ConversationStore;
  interpret?: NaturalInterpreter;
  webhookUrl?: string;
  now?: () => number;
};

type Turn = { chatId: string; userId: string; ctx: ConversationContext };

/** Menu-driven reminder setup; one context per (chat, user). */
export class ReminderConversation {
  private readonly now: () => number;

  constructor(private readonly deps: ConversationDeps) {
    this.now = deps.now ?? Date.now;
  }

  async handle(evt: ChatEvent): Promise<void> {
    if (evt.kind === "button") {
      await this.answer(evt.callbackId);
      await this.onButton(evt.chatId, evt.userId, evt.data);
      return;
    }

    const text = evt.text.trim();
    if (text.startsWith("/")) {
      await this.onCommand(evt.chatId, evt.userId, text);
      return;
    }

    const ctx = this.deps.store.get(evt.chatId, evt.userId, this.now());
    if (!ctx) return;
    const turn = { chatId: evt.chatId, userId: evt.userId, ctx };
    switch (ctx.state) {
      case "choosing":
        return this.onNaturalText(turn, text);
      case "entering_custom_task":
        return this.onCustomTask(turn, text);
      case "entering_duration":
        return this.onDuration(turn, text);
      case "entering_heads_up":
        return this.onHeadsUp(turn, text || undefined);
    }
  }

  private async onCommand(chatId: string, userId: string, text: string): Promise<void> {
    const command = text.split(/\s+/)[0].replace(/@.*$/, "").toLowerCase();
    switch (command) {
      case "/lw":
      case "/start": {
        const ctx = this.deps.store.begin(chatId, userId, this.now());
        await this.send({ chatId, userId, ctx }, Messages.WELCOME, MENU, "menu");
        return;
      }
      case "/list":
        await this.send({ chatId, userId }, this.renderList(chatId, userId));
        return;
      case "/clear": {
        const n = this.deps.scheduler.cancelAll(userId, chatId);
        await this.send({ chatId, userId }, `🗑 Cancelled ${n} reminder(s).`);
        return;
      }
      case "/cancel":
        this.deps.store.end(chatId, userId);
        await this.send({ chatId, userId }, Messages.CONVERSATION_CANCELLED);
        return;
      case "/help":
        await this.send({ chatId, userId }, Messages.HELP);
        return;
      default:
        return;
    }
  }

  private async onButton(chatId: string, userId: string, data: string): Promise<void> {
    if (!data.startsWith("lw:")) return;
    const ctx = this.deps.store.get(chatId, userId, this.now());
    if (!ctx) {
      await this.send({ chatId, userId }, Messages.MENU_EXPIRED);
      return;
    }
    const turn = { chatId, userId, ctx };
    const [, tag, value = ""] = data.match(/^lw:([^:]+)(?::(.*))?$/) ?? [];

    if (tag === "dur") {
      if (ctx.state === "entering_duration") await this.onDuration(turn, value);
      return;
    }
    if (tag === "lead_time") {
      if (ctx.state === "entering_heads_up") await this.onHeadsUp(turn, value === "skip" ? undefined : value);
      return;
    }
    if (tag === "rm") {
      await this.onCancelChoice(turn, value);
      return;
    }
    if (ctx.state === "choosing" && tag) await this.onChoose(turn, tag);
  }

  private async onChoose(turn: Turn, tag: string): Promise<void> {
    const { ctx } = turn;
    if (tag === "list") {
      await this.closePrompt(turn, "menu", "List");
      await this.send(turn, this.renderList(turn.chatId, turn.userId));
      return;
    }
    if (tag === "cancel") {
      await this.closePrompt(turn, "menu", "Cancel");
      await this.askCancelChoice(turn);
      return;
    }
    if (!isTaskKind(tag)) {
      await this.closePrompt(turn, "menu", "<unknown>");
      this.deps.store.end(turn.chatId, turn.userId);
      return;
    }

    ctx.kind = tag;
    await this.closePrompt(turn, "menu", capitalize(tag));

    if (tag === "custom") {
      ctx.state = "entering_custom_task";
      await this.send(turn, Messages.CUSTOM_TASK_ASK, undefined, "custom_task");
      return;
    }
    ctx.durationInput = tag === "ministry" ? "server_time" : "duration";
    await this.askDuration(turn);
  }

  private async onCustomTask(turn: Turn, text: string): Promise<void> {
    if (!text) {
      await this.send(turn, Messages.CUSTOM_TASK_ASK, undefined, "custom_task");
      return;
    }
    turn.ctx.taskName = text;
    await this.closePrompt(turn, "custom_task", text);
    await this.askDuration(turn);
  }

  private async onDuration(turn: Turn, text: string): Promise<void> {
    const { ctx } = turn;
    const parsed = this.readDuration(ctx, text);
    if (!parsed) {
      const msg = ctx.durationInput === "server_time" ? Messages.SERVER_TIME_ERROR : Messages.DURATION_ERROR;
      await this.send(turn, msg);
      return;
    }
    ctx.duration = parsed;
    await this.closePrompt(turn, "duration", formatDuration(parsed));
    await this.askHeadsUp(turn);
  }

  private async onHeadsUp(turn: Turn, leadTime: string | undefined): Promise<void> {
    const { ctx, chatId, userId } = turn;
    await this.closePrompt(turn, "lead", leadTime ?? "No");
    this.deps.store.end(chatId, userId);

    if (!ctx.kind || !ctx.duration) {
      await this.send(turn, Messages.MENU_EXPIRED);
      return;
    }

    let label: string;
    try {
      label = this.deps.scheduler.schedule({
        ownerId: userId,
        chatId,
        kind: ctx.kind,
        taskName: ctx.kind === "custom" ? ctx.taskName : undefined,
        duration: ctx.duration,
        leadTime,
        webhookUrl: this.deps.webhookUrl
      }).label;
    } catch (err) {
      if (!isInputError(err)) throw err;
      await this.send(turn, Messages.DURATION_ERROR);
      return;
    }

    const summary = `✅ Scheduled\n• Task: ${label}\n• Duration: ${formatDuration(ctx.duration)}\n• Heads-up: ${leadTime ?? "None"}`;
    await this.send(turn, summary);
  }

  private async onNaturalText(turn: Turn, text: string): Promise<void> {
    if (!text) return;
    if (!this.deps.interpret) {
      await this.send(turn, Messages.NL_UNAVAILABLE);
      return;
    }

    let cmd: ParsedCommand | null;
    try {
      cmd = await this.deps.interpret(text);
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, "natural command failed");
      await this.send(turn, `There was an error while processing your text:\n\n${errorMessage(err)}`);
      return;
    }
    const parsed = cmd ? commandDuration(cmd, new Date(this.now())) : null;
    if (!cmd || !parsed) {
      await this.send(turn, Messages.NL_INVALID);
      return;
    }

    const { ctx } = turn;
    ctx.kind = cmd.kind ?? "custom";
    ctx.taskName = cmd.task_name;
    ctx.duration = parsed;
    await this.closePrompt(turn, "menu", `${capitalize(ctx.kind === "custom" ? cmd.task_name : ctx.kind)} · ${formatDuration(parsed)}`);
    await this.askHeadsUp(turn);
  }

  private async onCancelChoice(turn: Turn, value: string): Promise<void> {
    const { ctx, chatId, userId } = turn;
    if (value === "all") {
      const n = this.deps.scheduler.cancelAll(userId, chatId);
      ctx.cancelChoices = [];
      await this.closePrompt(turn, "cancel", "All");
      await this.send(turn, `🗑 Cancelled ${n} reminder(s).`);
      return;
    }

    const jobId = /^\d+$/.test(value) ? ctx.cancelChoices[Number(value)] : undefined;
    if (!jobId) {
      await this.send(turn, Messages.CANCEL_GONE);
      return;
    }
    const ok = this.deps.scheduler.cancel(jobId);
    ctx.cancelChoices = ctx.cancelChoices.map((id) => (id === jobId ? "" : id));
    await this.closePrompt(turn, "cancel", `#${Number(value) + 1}`);
    await this.send(turn, ok ? Messages.CANCELLED_ONE : Messages.CANCEL_GONE);
  }

  private readDuration(ctx: ConversationContext, text: string): Duration | null {
    try {
      const d = ctx.durationInput === "server_time" ? parseServerTimeToDuration(text, new Date(this.now())) : parseDuration(text);
      return toMinutes(d) > 0 ? d : null;
    } catch (err) {
      if (isInputError(err)) return null;
      throw err;
    }
  }

  private async askDuration(turn: Turn): Promise<void> {
    turn.ctx.state = "entering_duration";
    if (turn.ctx.durationInput === "server_time") {
      await this.send(turn, `${Messages.SERVER_TIME_ASK}\n${Messages.SERVER_TIME_EXAMPLE}`, undefined, "duration");
      return;
    }
    await this.send(turn, `${Messages.DURATION_QUESTION}\n${Messages.DURATION_EXAMPLE}`, DURATION_KEYBOARD, "duration");
  }

  private async askHeadsUp(turn: Turn): Promise<void> {
    turn.ctx.state = "entering_heads_up";
    await this.send(turn, Messages.HEADS_UP_QUESTION, HEADS_UP_KEYBOARD, "lead");
  }

  private async askCancelChoice(turn: Turn): Promise<void> {
    const jobs = this.deps.scheduler.list(turn.userId, turn.chatId);
    if (!jobs.length) {
      await this.send(turn, Messages.NO_REMINDERS);
      return;
    }
    turn.ctx.cancelChoices = jobs.map((j) => j.id);
    const keyboard: Keyboard = jobs.map((j, i) => [{ text: this.deps.scheduler.display(j.id, j.fireAt), data: `lw:rm:${i}` }]);
    keyboard.push([{ text: "All", data: "lw:rm:all" }]);
    await this.send(turn, Messages.CANCEL_QUESTION, keyboard, "cancel");
  }

  private renderList(chatId: string, userId: string): string {
    const jobs = this.deps.scheduler.list(userId, chatId);
    if (!jobs.length) return Messages.NO_REMINDERS;
    const lines = jobs.map((j) => this.deps.scheduler.display(j.id, j.fireAt));
    return `📋 Pending reminders:\n${lines.join("\n")}`;
  }

  private async send(
    to: { chatId: string; userId: string; ctx?: ConversationContext },
    msg: string,
    keyboard?: Keyboard,
    promptKey?: PromptKey
  ): Promise<void> {
    const sent = await this.deps.transport.sendText(to.chatId, `${HEADER}${msg}`, keyboard);
    if (to.ctx && promptKey) to.ctx.prompts[promptKey] = sent;
    printOutbound(to.chatId, msg);
  }

  /** Appends the user's answer to a prompt and removes its buttons. */
  private async closePrompt(turn: Turn, key: PromptKey, answer: string): Promise<void> {
    const prompt = turn.ctx.prompts[key];
    if (!prompt) return;
    const text = `${prompt.text}\n\n${answer}`;
    try {
      await this.deps.transport.editText(prompt.chatId, prompt.messageId, text);
      turn.ctx.prompts[key] = { ...prompt, text };
    } catch (err) {
      logger.warn({ key, err: errorMessage(err) }, "failed to close prompt");
    }
  }

  private async answer(callbackId: string): Promise<void> {
    try {
      await this.deps.transport.answerButton(callbackId);
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, "answerCallbackQuery failed");
    }
  }
}
