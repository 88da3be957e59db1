export type ReminderErrorCode =
  | "INVALID_DURATION"
  | "INVALID_SERVER_TIME"
  | "SCHEDULER_NOT_READY"
  | "NOTIFICATION_DELIVERY";

abstract class ReminderError extends Error {
  abstract readonly code: ReminderErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Duration text that none of the accepted grammars could read. */
export class InvalidDurationError extends ReminderError {
  readonly code = "INVALID_DURATION";
}

/** Clock-time or date-time text that is malformed or not in the future. */
export class InvalidServerTimeError extends ReminderError {
  readonly code = "INVALID_SERVER_TIME";
}

export class SchedulerNotReadyError extends ReminderError {
  readonly code = "SCHEDULER_NOT_READY";

  constructor() {
    super("Scheduler not initialized. Call start() first.");
  }
}

export class NotificationDeliveryError extends ReminderError {
  readonly code = "NOTIFICATION_DELIVERY";

  constructor(
    readonly jobId: string,
    message: string
  ) {
    super(message);
  }
}

export function isInputError(e: unknown): e is InvalidDurationError | InvalidServerTimeError {
  return e instanceof InvalidDurationError || e instanceof InvalidServerTimeError;
}
