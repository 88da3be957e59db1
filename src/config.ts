import { z } from "zod";

function normalizeSecret(v: unknown): unknown {
  if (typeof v !== "string") return v;
  const s = v.trim();
  const m1 = s.match(/^["']([\s\S]*)["']$/);
  const v1 = (m1 ? m1[1] : s).trim();
  const m2 = v1.match(/^`([\s\S]*)`$/);
  return (m2 ? m2[1] : v1).trim();
}

function emptyToUndefined(v: unknown): unknown {
  const n = normalizeSecret(v);
  return typeof n === "string" && !n ? undefined : n;
}

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  TELEGRAM_API_BASE: z.preprocess(emptyToUndefined, z.string().url().default("https://api.telegram.org")),
  TELEGRAM_POLL_TIMEOUT_S: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(50).default(30)),

  LASTWAR_WEBHOOK_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  DUOLINGO_WEBHOOK_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),

  LLM_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().default("https://api.openai.com/v1")),
  LLM_API_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  LLM_MODEL: z.preprocess(emptyToUndefined, z.string().min(1).default("gpt-4.1-mini")),
  LLM_TEMPERATURE: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(2).default(0)),

  DISPLAY_TIMEZONE: z.preprocess(emptyToUndefined, z.string().refine(isTimeZone, { message: "Unknown time zone" }).optional()),
  CONVERSATION_TTL_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(10_000).max(86_400_000).default(900_000))
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env: Record<string, unknown> = { ...source };
  if (!env.LLM_API_KEY && env.OPENAI_API_KEY) env.LLM_API_KEY = env.OPENAI_API_KEY;

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid configuration:\n${issues}`);
  }
  return parsed.data;
}

export function requireBotToken(cfg: AppConfig): string {
  if (!cfg.TELEGRAM_BOT_TOKEN) throw new Error("Invalid configuration:\nTELEGRAM_BOT_TOKEN: Required");
  return cfg.TELEGRAM_BOT_TOKEN;
}
