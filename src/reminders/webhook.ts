import { logger } from "../logger.js";
import { errorMessage, withTimeout } from "../utils/async.js";

export type WebhookPayload = Record<string, unknown>;

/** Posts JSON to an outbound webhook (e.g. an automation flow listening for fired reminders). */
export class WebhookNotifier {
  constructor(
    private readonly webhookUrl: string | undefined,
    private readonly timeoutMs = 10_000
  ) {}

  /** Resolves true on a 2xx response; never rejects. */
  async post(payload: WebhookPayload, url = this.webhookUrl): Promise<boolean> {
    if (!url) {
      logger.warn("WebhookNotifier: no URL configured");
      return false;
    }
    try {
      const res = await withTimeout(
        fetch(url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(payload)
        }),
        this.timeoutMs,
        "webhook post"
      );
      if (!res.ok) logger.warn({ url, status: res.status }, "WebhookNotifier: non-2xx response");
      return res.ok;
    } catch (err) {
      logger.error({ url, err: errorMessage(err) }, "WebhookNotifier error");
      return false;
    }
  }
}
