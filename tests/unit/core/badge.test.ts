import { describe, it, expect } from "vitest";
import { badgeTooltip, deriveBadge } from "../../../src/core/badge.js";

describe("deriveBadge", () => {
  it.each([
    [false, false, false, "none"],
    [true, false, false, "unread"],
    [false, true, false, "snoozed"],
    [true, true, false, "snoozed"],
    [false, false, true, "error"],
    [true, false, true, "error"],
    [false, true, true, "error"],
    [true, true, true, "error"],
  ] as const)("unread=%s snoozed=%s error=%s -> %s", (unread, snoozed, error, expected) => {
    expect(deriveBadge(unread, snoozed, error)).toBe(expected);
  });
});

describe("badgeTooltip", () => {
  it("shows the unread count", () => {
    expect(badgeTooltip("unread", 4, 0)).toBe("mailwatch (4 unread)");
  });

  it("rounds the snooze remainder up to whole minutes", () => {
    expect(badgeTooltip("snoozed", 2, 61)).toBe("mailwatch (snoozed, 2 min left)");
  });

  it("marks errors", () => {
    expect(badgeTooltip("error", 3, 0)).toBe("mailwatch (error)");
  });

  it("is just the app name with nothing to show", () => {
    expect(badgeTooltip("none", 0, 0, "inbox")).toBe("inbox");
  });
});
