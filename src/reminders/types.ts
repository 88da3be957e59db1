export const TASK_KINDS = ["truck", "build", "research", "train", "ministry", "custom"] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

export type JobRole = "main" | "headsup";

/** Elapsed span in whole minutes; seconds are never represented. */
export type Duration = {
  days: number;
  hours: number;
  minutes: number;
};

export type ReminderRequest = {
  ownerId: string;
  chatId: string;
  kind: TaskKind;
  /** Used as the label only when `kind` is "custom". */
  taskName?: string;
  duration: Duration;
  /** Raw lead-time text, parsed by the scheduler. */
  leadTime?: string;
  webhookUrl?: string;
};

export type ScheduleResult = {
  jobIds: string[];
  label: string;
};

export type ScheduledJobInfo = {
  id: string;
  ownerId: string;
  chatId: string;
  kind: TaskKind;
  role: JobRole;
  createdAt: number;
  fireAt: number;
  message: string;
};

export type ReminderMessage = {
  chatId: string;
  text: string;
  webhookUrl?: string;
};

/** Resolves false (or rejects) when the message could not be delivered. */
export type NotifyFn = (message: ReminderMessage) => Promise<boolean | void>;

export function isTaskKind(value: string): value is TaskKind {
  return TASK_KINDS.some((k) => k === value);
}

export function capitalize(text: string): string {
  return text ? text.charAt(0).toUpperCase() + text.slice(1) : text;
}
