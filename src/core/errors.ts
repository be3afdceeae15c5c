export const ErrorCode = {
  Usage: "USAGE",
  ConfigFile: "CONFIG_FILE",
  Metadata: "METADATA",
  UndefinedRule: "UNDEFINED_RULE",
  InvalidSchedule: "INVALID_SCHEDULE",
  IdUnparseable: "ID_UNPARSEABLE"
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base for every failure the adapter reports on purpose. The exit status is
 * what the entry scripts hand back to the workflow engine.
 */
export class AdapterError extends Error {
  constructor(
    readonly code: ErrorCode,
    readonly exitStatus: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UsageError extends AdapterError {
  constructor(message: string) {
    super(ErrorCode.Usage, 1, message);
  }
}

export class ConfigFileError extends AdapterError {
  constructor(message: string) {
    super(ErrorCode.ConfigFile, 1, message);
  }
}

export class MetadataError extends AdapterError {
  constructor(message: string) {
    super(ErrorCode.Metadata, 2, message);
  }
}

export class UndefinedJobRule extends AdapterError {
  constructor(message: string) {
    super(ErrorCode.UndefinedRule, 2, message);
  }
}

export class ScheduleConfigError extends AdapterError {
  constructor(message: string) {
    super(ErrorCode.InvalidSchedule, 2, message);
  }
}

// The job may already be queued when this is raised; the raw banner is kept
// so the caller can report it.
export class SubmissionIdUnparseable extends AdapterError {
  constructor(readonly rawOutput: string) {
    super(ErrorCode.IdUnparseable, 2, `Not a submitted job: ${rawOutput.trimEnd()}`);
  }
}
