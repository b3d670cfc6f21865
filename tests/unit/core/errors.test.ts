import { describe, it, expect } from "vitest";
import {
  ConfigIncompleteError,
  DecodeFailure,
  MalformedResponseError,
  PersistedStateCorrupt,
  TransportError,
  formatUserFacingError,
  isMailwatchError,
  toMailwatchError,
} from "../../../src/core/errors.js";

describe("error taxonomy", () => {
  it("names each error after its class", () => {
    expect(new TransportError("x").name).toBe("TransportError");
    expect(new DecodeFailure("x").kind).toBe("decode_failure");
  });

  it("surfaces only config and transport failures", () => {
    expect(new ConfigIncompleteError("x").surfaced).toBe(true);
    expect(new TransportError("x").surfaced).toBe(true);
    expect(new MalformedResponseError("x").surfaced).toBe(false);
    expect(new DecodeFailure("x").surfaced).toBe(false);
    expect(new PersistedStateCorrupt("x").surfaced).toBe(false);
  });

  it("recognises its own errors", () => {
    expect(isMailwatchError(new TransportError("x"))).toBe(true);
    expect(isMailwatchError(new Error("x"))).toBe(false);
  });
});

describe("toMailwatchError", () => {
  it("passes classified errors through untouched", () => {
    const err = new MalformedResponseError("odd");
    expect(toMailwatchError(err, "prefix")).toBe(err);
  });

  it("wraps anything else as a transport failure with the prefix", () => {
    const cause = new Error("socket hang up");
    const wrapped = toMailwatchError(cause, "Error checking emails");

    expect(wrapped).toBeInstanceOf(TransportError);
    expect(wrapped.message).toBe("Error checking emails: socket hang up");
    expect(wrapped.cause).toBe(cause);
  });

  it("stringifies non-Error values", () => {
    expect(toMailwatchError("nope").message).toBe("nope");
  });
});

describe("formatUserFacingError", () => {
  it("keeps the configuration message", () => {
    expect(formatUserFacingError(new ConfigIncompleteError("Please configure"))).toBe(
      "Please configure"
    );
  });

  it("maps authentication failures", () => {
    expect(formatUserFacingError(new Error("Command failed: AUTHENTICATIONFAILED"))).toBe(
      "Login failed. Please check the account name and app password."
    );
  });

  it("maps network failures", () => {
    expect(formatUserFacingError(new Error("getaddrinfo ENOTFOUND imap.example.com"))).toBe(
      "Could not reach the mail server. Will retry at the next check."
    );
  });

  it("keeps only the first line", () => {
    expect(formatUserFacingError(new Error("Mailbox busy\n    at Socket.<anonymous>"))).toBe(
      "Mailbox busy"
    );
  });

  it("falls back for empty messages", () => {
    expect(formatUserFacingError(new Error(""))).toBe(
      "Unknown error while talking to the mail server."
    );
  });
});
