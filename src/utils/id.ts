import { randomBytes } from "node:crypto";

/**
 * Compact, time-sortable id for a poll cycle.
 * Format: base36(timestamp) + "-" + 6 hex chars of randomness.
 */
export function generateCycleId(now: number = Date.now()): string {
  const timePart = now.toString(36);
  const randomPart = randomBytes(3).toString("hex");
  return `${timePart}-${randomPart}`;
}
