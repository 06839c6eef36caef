/** Raised when an identifier cannot be resolved to an IANA zone. */
export class UnknownTimezoneError extends Error {
  readonly code = "unknown_timezone";

  constructor(
    readonly timezoneId: string,
    reason?: string,
  ) {
    super(
      `Unknown timezone "${timezoneId}"${reason ? `: ${reason}` : ""}`,
    );
    this.name = "UnknownTimezoneError";
  }
}

export function isUnknownTimezoneError(
  err: unknown,
): err is UnknownTimezoneError {
  return err instanceof UnknownTimezoneError;
}
