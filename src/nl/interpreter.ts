import { z } from "zod";
import { logger } from "../logger.js";
import type { ChatCompleter } from "../llm/openaiCompat.js";
import { duration, toMinutes } from "../reminders/duration.js";
import { parseServerTimeToDuration } from "../reminders/serverTime.js";
import { TASK_KINDS, type Duration } from "../reminders/types.js";
import { errorMessage } from "../utils/async.js";

const MAX_ATTEMPTS = 2;

export const parsedCommandSchema = z.object({
  kind: z.enum(TASK_KINDS).nullable().default(null),
  task_name: z.string().trim().min(1),
  days: z.number().int().min(0).default(0),
  hours: z.number().int().min(0).default(0),
  minutes: z.number().int().min(0).default(0),
  server_time: z.string().trim().min(1).nullable().default(null),
  language: z.enum(["pt", "en"]).nullable().default(null)
});

export type ParsedCommand = z.infer<typeof parsedCommandSchema>;

export const SYSTEM_PROMPT = `You are a command interpreter for a Telegram reminder bot for the mobile game "Last War".

Read a user message (Portuguese or English) and extract a structured reminder command.

Task kinds (internal values):
- "truck"    -> supply trucks, convoys, vehicle arrivals, "caminhão"
- "build"    -> building or construction finishing, upgrades, "construção"
- "research" -> research tasks or lab upgrades, "pesquisa"
- "train"    -> troop training, "treinar", "treino"
- "ministry" -> ministry / HQ / special building timers, "ministério"
- "custom"   -> anything else

Reply with a single JSON object:
{"kind": <one of the values above or null>, "task_name": <short label in the user's words>,
 "days": <int>=0>, "hours": <int>=0>, "minutes": <int>=0>,
 "server_time": <"HH:MM" or "D-M-YYYY HH:MM" when the user gives a clock time, else null>,
 "language": <"pt" | "en" | null>}

Rules:
- Durations count from NOW: "in 30 minutes" -> minutes 30; "em 1 dia e 4 horas" -> days 1, hours 4; "em 90 minutos" -> hours 1, minutes 30.
- When the user names a clock time ("at 10:00", "às 17:09"), put it in server_time and leave days/hours/minutes at 0.
- Ignore seconds. Never produce negative numbers.
- If nothing tells when the reminder should fire, set all numbers to 0 and server_time to null.`;

function isZero(cmd: ParsedCommand): boolean {
  return cmd.days === 0 && cmd.hours === 0 && cmd.minutes === 0;
}

function parseReply(raw: string): { ok: true; cmd: ParsedCommand } | { ok: false; error: string } {
  const text = raw.trim().replace(/^```(?:json)?\s*/i, "").replace(/\s*```$/, "");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return { ok: false, error: "not_json" };
  }
  const parsed = parsedCommandSchema.safeParse(json);
  if (!parsed.success) return { ok: false, error: "schema_mismatch" };
  if (isZero(parsed.data) && !parsed.data.server_time) return { ok: false, error: "zero_duration" };
  return { ok: true, cmd: parsed.data };
}

/**
 * Asks the model to read a free-form request; one retry when the reply is unusable.
 * Resolves null when both attempts fail validation. Transport errors propagate.
 */
export async function interpretNaturalCommand(
  llm: ChatCompleter,
  opts: { model: string; temperature: number },
  text: string
): Promise<ParsedCommand | null> {
  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    const raw = await llm.chatCompletions({
      model: opts.model,
      temperature: opts.temperature,
      json: true,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: text }
      ]
    });
    const r = parseReply(raw);
    if (r.ok) return r.cmd;
    logger.debug({ attempt, error: r.error }, "natural command rejected");
  }
  return null;
}

/** Resolves the command's timing; null when its server time is unusable. */
export function commandDuration(cmd: ParsedCommand, now: Date = new Date()): Duration | null {
  if (cmd.server_time) {
    try {
      return parseServerTimeToDuration(cmd.server_time, now);
    } catch (err) {
      logger.debug({ serverTime: cmd.server_time, err: errorMessage(err) }, "natural command server time rejected");
      return null;
    }
  }
  const d = duration({ days: cmd.days, hours: cmd.hours, minutes: cmd.minutes });
  return toMinutes(d) > 0 ? d : null;
}
