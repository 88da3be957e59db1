import type { Duration, TaskKind } from "../reminders/types.js";
import type { SentMessage } from "../types.js";

export type ConversationState = "choosing" | "entering_custom_task" | "entering_duration" | "entering_heads_up";

/** Prompt messages whose buttons get closed once answered. */
export type PromptKey = "menu" | "custom_task" | "duration" | "lead" | "cancel";

export type ConversationContext = {
  state: ConversationState;
  kind?: TaskKind;
  taskName?: string;
  /** Ministry timers are entered as in-game server time instead of a duration. */
  durationInput: "duration" | "server_time";
  duration?: Duration;
  prompts: Partial<Record<PromptKey, SentMessage>>;
  /** Job ids behind the buttons of the last cancel menu, by index. */
  cancelChoices: string[];
  lastAtMs: number;
};

function keyFor(chatId: string, userId: string): string {
  return `${chatId}::${userId}`;
}

export class ConversationStore {
  private sessions = new Map<string, ConversationContext>();

  constructor(private readonly ttlMs: number) {}

  get(chatId: string, userId: string, nowMs: number): ConversationContext | undefined {
    const k = keyFor(chatId, userId);
    const s = this.sessions.get(k);
    if (!s) return undefined;
    if (this.ttlMs > 0 && nowMs - s.lastAtMs > this.ttlMs) {
      this.sessions.delete(k);
      return undefined;
    }
    s.lastAtMs = nowMs;
    return s;
  }

  begin(chatId: string, userId: string, nowMs: number): ConversationContext {
    const ctx: ConversationContext = { state: "choosing", durationInput: "duration", prompts: {}, cancelChoices: [], lastAtMs: nowMs };
    this.sessions.set(keyFor(chatId, userId), ctx);
    this.prune(nowMs);
    return ctx;
  }

  end(chatId: string, userId: string): boolean {
    return this.sessions.delete(keyFor(chatId, userId));
  }

  get size(): number {
    return this.sessions.size;
  }

  private prune(nowMs: number): void {
    if (this.ttlMs <= 0) return;
    for (const [k, s] of this.sessions) {
      if (nowMs - s.lastAtMs > this.ttlMs) this.sessions.delete(k);
    }
  }
}
