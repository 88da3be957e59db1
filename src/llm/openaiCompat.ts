import { z } from "zod";
import { logger } from "../logger.js";

export type LlmMessage = { role: "system" | "user" | "assistant"; content: string };

export type ChatCompletionOptions = {
  model: string;
  temperature: number;
  messages: LlmMessage[];
  /** Ask the server for a JSON object reply. */
  json?: boolean;
};

/** The part of the client the rest of the bot depends on. */
export interface ChatCompleter {
  chatCompletions(opts: ChatCompletionOptions): Promise<string>;
}

const chatResponseSchema = z.object({
  model: z.string().optional(),
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string(),
        content: z.string().nullable()
      })
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative().optional(),
      completion_tokens: z.number().int().nonnegative().optional(),
      total_tokens: z.number().int().nonnegative().optional()
    })
    .optional()
});

export class OpenAiCompatClient implements ChatCompleter {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string | undefined
  ) {}

  get configured(): boolean {
    return Boolean(this.apiKey);
  }

  private v1Base(): string {
    const base = this.baseUrl.replace(/\/+$/, "");
    return base.endsWith("/v1") ? base : `${base}/v1`;
  }

  async chatCompletions(opts: ChatCompletionOptions): Promise<string> {
    if (!this.apiKey) throw new Error("Missing LLM_API_KEY");
    const url = `${this.v1Base()}/chat/completions`;
    const res = await fetch(url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify({
        model: opts.model,
        temperature: opts.temperature,
        messages: opts.messages.map((m) => ({ role: m.role, content: m.content })),
        ...(opts.json ? { response_format: { type: "json_object" } } : {})
      })
    });
    const json: unknown = await res.json().catch(() => undefined);
    if (!res.ok) throw new Error(`LLM request failed: ${res.status} ${JSON.stringify(json)}`);
    const parsed = chatResponseSchema.safeParse(json);
    if (!parsed.success) throw new Error("Unexpected LLM response shape");
    const { model, usage } = parsed.data;
    if (usage) {
      logger.debug(
        { model: model ?? opts.model, promptTokens: usage.prompt_tokens, completionTokens: usage.completion_tokens, totalTokens: usage.total_tokens },
        "llm usage"
      );
    }
    return parsed.data.choices[0]?.message.content ?? "";
  }
}
