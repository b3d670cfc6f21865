/**
 * Error taxonomy for the mail pipeline.
 *
 * Only ConfigIncomplete and Transport failures reach the badge and the
 * notification layer. The other kinds are absorbed where they occur and
 * replaced by a safe default.
 */

export type MailwatchErrorKind =
  | "config_incomplete"
  | "transport"
  | "malformed_response"
  | "decode_failure"
  | "persisted_state_corrupt";

export abstract class MailwatchError extends Error {
  abstract readonly kind: MailwatchErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Whether the failure is shown to the user as an error badge. */
  get surfaced(): boolean {
    return this.kind === "config_incomplete" || this.kind === "transport";
  }
}

/** No credentials configured; every poll short-circuits until fixed. */
export class ConfigIncompleteError extends MailwatchError {
  readonly kind = "config_incomplete";
}

/** Poll, delete or connectivity failure. Retried naturally by the next poll. */
export class TransportError extends MailwatchError {
  readonly kind = "transport";
}

/** The server answered with something other than OK. Treated as a no-op poll. */
export class MalformedResponseError extends MailwatchError {
  readonly kind = "malformed_response";
}

/** A header could not be decoded in any supported charset. */
export class DecodeFailure extends MailwatchError {
  readonly kind = "decode_failure";
}

/** settings.json could not be read or validated. */
export class PersistedStateCorrupt extends MailwatchError {
  readonly kind = "persisted_state_corrupt";
}

export function isMailwatchError(err: unknown): err is MailwatchError {
  return err instanceof MailwatchError;
}

/** Wrap anything that is not already classified as a transport failure. */
export function toMailwatchError(err: unknown, prefix?: string): MailwatchError {
  if (isMailwatchError(err)) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new TransportError(prefix ? `${prefix}: ${detail}` : detail, { cause: err });
}

/**
 * Short, safe message for the error notification.
 * Strips stack traces and anything after the first line.
 */
export function formatUserFacingError(err: unknown): string {
  if (err instanceof ConfigIncompleteError) return err.message;

  const raw = err instanceof Error ? err.message : String(err ?? "");
  const firstLine = raw.split("\n")[0]?.trim() ?? "";
  const lower = firstLine.toLowerCase();

  if (
    lower.includes("authenticationfailed") ||
    lower.includes("invalid credentials") ||
    lower.includes("authentication failed")
  ) {
    return "Login failed. Please check the account name and app password.";
  }

  if (
    lower.includes("enotfound") ||
    lower.includes("econnrefused") ||
    lower.includes("econnreset") ||
    lower.includes("etimedout")
  ) {
    return "Could not reach the mail server. Will retry at the next check.";
  }

  return firstLine || "Unknown error while talking to the mail server.";
}
