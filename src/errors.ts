export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Usage: 2,
  Validation: 3,
  Conflict: 4,
  Filesystem: 5
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export const ErrorKinds = {
  SourceMissing: "SourceMissing",
  TargetConflict: "TargetConflict",
  LinkCreationFailed: "LinkCreationFailed",
  BackupFailed: "BackupFailed",
  BlueprintNotFound: "BlueprintNotFound",
  BlueprintMalformed: "BlueprintMalformed",
  Filesystem: "Filesystem",
  Usage: "Usage"
} as const;

export type ErrorKind = (typeof ErrorKinds)[keyof typeof ErrorKinds];

const KIND_EXIT_CODES: Record<ErrorKind, ExitCode> = {
  SourceMissing: ExitCodes.Validation,
  TargetConflict: ExitCodes.Conflict,
  LinkCreationFailed: ExitCodes.Filesystem,
  BackupFailed: ExitCodes.Filesystem,
  BlueprintNotFound: ExitCodes.Validation,
  BlueprintMalformed: ExitCodes.Validation,
  Filesystem: ExitCodes.Filesystem,
  Usage: ExitCodes.Usage
};

export class AicliLinkError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: ExitCode;

  constructor(message: string, kind: ErrorKind) {
    super(message);
    this.name = "AicliLinkError";
    this.kind = kind;
    this.code = KIND_EXIT_CODES[kind];
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
