export type BadgeState = "none" | "unread" | "snoozed" | "error";

/**
 * Precedence, highest first: error > snoozed > unread > none.
 * Snoozed replaces the unread dot instead of stacking with it.
 */
export function deriveBadge(hasUnread: boolean, isSnoozed: boolean, isError: boolean): BadgeState {
  if (isError) return "error";
  if (isSnoozed) return "snoozed";
  if (hasUnread) return "unread";
  return "none";
}

export function badgeTooltip(
  badge: BadgeState,
  unreadCount: number,
  snoozeRemainingSeconds: number,
  appName: string = "mailwatch"
): string {
  switch (badge) {
    case "error":
      return `${appName} (error)`;
    case "snoozed": {
      const minutes = Math.ceil(snoozeRemainingSeconds / 60);
      return `${appName} (snoozed, ${minutes} min left)`;
    }
    case "unread":
      return `${appName} (${unreadCount} unread)`;
    case "none":
      return appName;
  }
}
