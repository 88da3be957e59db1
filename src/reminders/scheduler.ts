import { InvalidDurationError, NotificationDeliveryError, SchedulerNotReadyError, isInputError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { errorMessage } from "../utils/async.js";
import { systemClock, type SchedulerClock, type TimerHandle } from "./clock.js";
import { MAX_DATE_MS, assertRepresentable, formatDuration, fromMinutes, parseDuration, subtractDurations, toMilliseconds, toMinutes } from "./duration.js";
import { describeJobId, encodeJobId } from "./jobId.js";
import { capitalize, type JobRole, type NotifyFn, type ReminderRequest, type Duration, type ScheduleResult, type ScheduledJobInfo, type TaskKind } from "./types.js";

type JobEntry = ScheduledJobInfo & {
  webhookUrl?: string;
  timer: TimerHandle;
};

export type ReminderSchedulerOptions = {
  notify: NotifyFn;
  clock?: SchedulerClock;
  /** IANA zone for listing times; the process's local zone when unset. */
  timeZone?: string;
  logger?: Logger;
};

export function formatTaskLabel(kind: TaskKind, taskName: string | undefined, createdAt: number): string {
  const name = taskName?.trim();
  const base = kind === "custom" && name ? name : capitalize(kind);
  return `${base} #${String(createdAt).slice(-3)}`;
}

function ownerKey(ownerId: string, chatId: string): string {
  // Ids never contain ":" (the encoder rejects it), so the pair is unambiguous.
  return `${ownerId}:${chatId}`;
}

export class ReminderScheduler {
  private readonly clock: SchedulerClock;
  private readonly log: Logger;
  private readonly jobs = new Map<string, JobEntry>();
  private readonly byOwner = new Map<string, Set<string>>();
  private readonly timeFormat: Intl.DateTimeFormat;
  private running = false;

  constructor(private readonly opts: ReminderSchedulerOptions) {
    this.clock = opts.clock ?? systemClock;
    this.log = opts.logger ?? rootLogger.child({ component: "scheduler" });
    this.timeFormat = new Intl.DateTimeFormat("en-US", {
      timeZone: opts.timeZone,
      weekday: "short",
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23"
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.log.info("scheduler started");
  }

  stop(): void {
    if (!this.running) return;
    for (const job of this.jobs.values()) job.timer.cancel();
    const dropped = this.jobs.size;
    this.jobs.clear();
    this.byOwner.clear();
    this.running = false;
    this.log.info({ dropped }, "scheduler stopped");
  }

  schedule(request: ReminderRequest): ScheduleResult {
    this.ensureRunning();
    if (toMinutes(request.duration) <= 0) throw new InvalidDurationError("Reminder duration must be positive");
    assertRepresentable(request.duration);

    const now = this.clock.now();
    // Checked before anything is registered so a rejected request leaves no job behind.
    if (!isDateTime(now + toMilliseconds(request.duration))) throw new InvalidDurationError("Reminder time is out of range");
    const createdAt = Math.floor(now / 1000);
    const label = formatTaskLabel(request.kind, request.taskName, createdAt);

    const mainId = this.register(request, createdAt, "main", now, toMilliseconds(request.duration), `⏰ ${label} is ready!`);
    const jobIds = [mainId];

    if (request.leadTime) {
      const headsupId = this.scheduleHeadsUp(request, createdAt, now, label);
      if (headsupId) jobIds.push(headsupId);
    }

    return { jobIds, label };
  }

  list(ownerId: string, chatId: string): ScheduledJobInfo[] {
    this.ensureRunning();
    const ids = this.byOwner.get(ownerKey(ownerId, chatId));
    if (!ids) return [];
    const out: ScheduledJobInfo[] = [];
    for (const id of ids) {
      const job = this.jobs.get(id);
      if (job) out.push(toInfo(job));
    }
    return out.sort((a, b) => a.fireAt - b.fireAt);
  }

  cancel(jobId: string): boolean {
    this.ensureRunning();
    const job = this.remove(jobId);
    if (!job) {
      this.log.debug({ jobId }, "cancel: job not found");
      return false;
    }
    job.timer.cancel();
    this.log.info({ jobId }, "job cancelled");
    return true;
  }

  cancelAll(ownerId: string, chatId: string): number {
    let count = 0;
    for (const job of this.list(ownerId, chatId)) {
      if (this.cancel(job.id)) count += 1;
    }
    return count;
  }

  display(jobId: string, fireAt: number): string {
    const when = this.formatWhen(fireAt);
    const d = describeJobId(jobId);
    if (!d) {
      this.log.warn({ jobId }, "invalid job id format");
      return `⏰ Unknown - ${when}`;
    }
    if (!d.kind.known) {
      this.log.warn({ jobId, kind: d.kind.raw }, "unknown kind in job id");
      return `⏰ Unknown - ${when}`;
    }
    if (d.createdAt === null) {
      this.log.warn({ jobId }, "invalid timestamp in job id");
      return `⏰ Unknown - ${when}`;
    }
    const label = formatTaskLabel(d.kind.kind, undefined, d.createdAt);
    if (d.role.known && d.role.role === "headsup") return `🔔 ${label} (heads-up) - ${when}`;
    return `⏰ ${label} - ${when}`;
  }

  private scheduleHeadsUp(request: ReminderRequest, createdAt: number, now: number, label: string): string | null {
    const lead = this.parseLeadTime(request.leadTime ?? "");
    if (!lead) return null;

    const headsupMinutes = subtractDurations(request.duration, lead);
    if (headsupMinutes <= 0) {
      this.log.warn(
        { leadTime: request.leadTime, duration: formatDuration(request.duration) },
        "heads-up lead time is not shorter than the duration, skipping"
      );
      return null;
    }
    const delayMs = toMilliseconds(fromMinutes(headsupMinutes));
    return this.register(request, createdAt, "headsup", now, delayMs, `🔔 ${label} will be ready in ${formatDuration(lead)}`);
  }

  private parseLeadTime(text: string): Duration | null {
    try {
      return parseDuration(text);
    } catch (err) {
      if (!isInputError(err)) throw err;
      this.log.error({ leadTime: text, err: errorMessage(err) }, "failed to parse lead time, skipping heads-up");
      return null;
    }
  }

  private register(request: ReminderRequest, createdAt: number, role: JobRole, now: number, delayMs: number, message: string): string {
    const id = encodeJobId({
      ownerId: request.ownerId,
      chatId: request.chatId,
      kind: request.kind,
      createdAt: String(createdAt),
      role
    });

    const existing = this.remove(id);
    if (existing) {
      existing.timer.cancel();
      this.log.warn({ jobId: id }, "replacing existing job");
    }

    const fireAt = now + delayMs;
    const timer = this.clock.setTimer(delayMs, () => this.fire(id));
    const job: JobEntry = {
      id,
      ownerId: request.ownerId,
      chatId: request.chatId,
      kind: request.kind,
      role,
      createdAt,
      fireAt,
      message,
      webhookUrl: request.webhookUrl,
      timer
    };
    this.jobs.set(id, job);
    const key = ownerKey(request.ownerId, request.chatId);
    const set = this.byOwner.get(key) ?? new Set<string>();
    set.add(id);
    this.byOwner.set(key, set);

    this.log.info({ jobId: id, fireAt: new Date(fireAt).toISOString() }, `scheduled ${role} reminder`);
    return id;
  }

  private remove(jobId: string): JobEntry | undefined {
    const job = this.jobs.get(jobId);
    if (!job) return undefined;
    this.jobs.delete(jobId);
    const key = ownerKey(job.ownerId, job.chatId);
    const set = this.byOwner.get(key);
    if (set) {
      set.delete(jobId);
      if (!set.size) this.byOwner.delete(key);
    }
    return job;
  }

  private fire(jobId: string): void {
    const job = this.remove(jobId);
    if (!job) return;
    this.log.info({ jobId }, "firing reminder");
    void this.deliver(job);
  }

  private async deliver(job: JobEntry): Promise<void> {
    try {
      const ok = await this.opts.notify({ chatId: job.chatId, text: job.message, webhookUrl: job.webhookUrl });
      if (ok === false) throw new NotificationDeliveryError(job.id, "notification transport reported failure");
    } catch (err) {
      const failure = err instanceof NotificationDeliveryError ? err : new NotificationDeliveryError(job.id, errorMessage(err));
      this.log.error({ jobId: job.id, chatId: job.chatId, err: failure.message }, "reminder delivery failed");
    }
  }

  private formatWhen(fireAt: number): string {
    if (!isDateTime(fireAt)) return "unknown time";
    const parts = this.timeFormat.formatToParts(new Date(fireAt));
    const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
    return `${get("weekday")} ${get("hour")}:${get("minute")}`;
  }

  private ensureRunning(): void {
    if (!this.running) throw new SchedulerNotReadyError();
  }
}

function isDateTime(ms: number): boolean {
  return Number.isFinite(ms) && Math.abs(ms) <= MAX_DATE_MS;
}

function toInfo(job: JobEntry): ScheduledJobInfo {
  return {
    id: job.id,
    ownerId: job.ownerId,
    chatId: job.chatId,
    kind: job.kind,
    role: job.role,
    createdAt: job.createdAt,
    fireAt: job.fireAt,
    message: job.message
  };
}
