import type { ChatEvent } from "../types.js";

function brief(text: string, max = 160): string {
  const t = text.replace(/\s+/g, " ").trim();
  if (t.length <= max) return t;
  return `${t.slice(0, max)}…`;
}

export function printInbound(evt: ChatEvent): void {
  const body = evt.kind === "message" ? evt.text : `[button ${evt.data}]`;
  console.error(`RX ${evt.chatType} c=${evt.chatId} u=${evt.userId} : ${brief(body)}`);
}

export function printOutbound(chatId: string, text: string): void {
  console.error(`TX c=${chatId} : ${brief(text)}`);
}

export function printError(context: string, err: unknown): void {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`ERR ${context} : ${msg}`);
}
