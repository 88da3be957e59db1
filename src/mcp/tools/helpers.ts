import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { ReminderScheduler } from "../../reminders/scheduler.js";

export type ReminderToolDeps = {
  scheduler: ReminderScheduler;
  /** Default webhook attached to every reminder created through the tools. */
  webhookUrl?: string;
  now?: () => number;
};

/** Owner and chat ids end up inside job ids, which use ":" as separator. */
export const idSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^[^:]+$/, "must not contain ':'");

export function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

export function errorResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }], isError: true };
}

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  isError: z.boolean().optional()
});

/** Flattens the text parts of a `callTool` result. */
export function readToolText(result: unknown): { text: string; isError: boolean } {
  const parsed = toolResultSchema.safeParse(result);
  if (!parsed.success) return { text: "", isError: true };
  const text = parsed.data.content
    .filter((c) => c.type === "text")
    .map((c) => c.text ?? "")
    .join("\n");
  return { text, isError: parsed.data.isError ?? false };
}
