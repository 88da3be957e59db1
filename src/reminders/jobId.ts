import { isTaskKind, type JobRole, type TaskKind } from "./types.js";

export const JOB_ID_PREFIX = "lw";
const SEPARATOR = ":";
const FIELD_COUNT = 6;

/** Raw identifier fields; the codec itself does not interpret them. */
export type JobIdFields = {
  ownerId: string;
  chatId: string;
  kind: string;
  createdAt: string;
  role: string;
};

export type KindTag = { known: true; kind: TaskKind } | { known: false; raw: string };

export type RoleTag = { known: true; role: JobRole } | { known: false; raw: string };

export type JobDescriptor = {
  ownerId: string;
  chatId: string;
  kind: KindTag;
  /** Creation epoch in seconds, or null when the field is not an integer. */
  createdAt: number | null;
  role: RoleTag;
};

export function encodeJobId(fields: JobIdFields): string {
  const values = [fields.ownerId, fields.chatId, fields.kind, fields.createdAt, fields.role];
  for (const v of values) {
    if (!v || v.includes(SEPARATOR)) throw new Error(`Invalid job id field: ${JSON.stringify(v)}`);
  }
  return [JOB_ID_PREFIX, ...values].join(SEPARATOR);
}

export function decodeJobId(jobId: string): JobIdFields | null {
  const parts = String(jobId ?? "").split(SEPARATOR);
  if (parts.length !== FIELD_COUNT || parts[0] !== JOB_ID_PREFIX) return null;
  const [, ownerId, chatId, kind, createdAt, role] = parts;
  return { ownerId, chatId, kind, createdAt, role };
}

export function describeJobId(jobId: string): JobDescriptor | null {
  const f = decodeJobId(jobId);
  if (!f) return null;
  const kind: KindTag = isTaskKind(f.kind) ? { known: true, kind: f.kind } : { known: false, raw: f.kind };
  const role: RoleTag = f.role === "main" || f.role === "headsup" ? { known: true, role: f.role } : { known: false, raw: f.role };
  const createdAt = /^\d+$/.test(f.createdAt) ? Number(f.createdAt) : null;
  return { ownerId: f.ownerId, chatId: f.chatId, kind, createdAt, role };
}
