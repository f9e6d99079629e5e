import type { NotificationStatus } from "@/types/notification";

// pending -> sent -> delivered -> read, and pending | sent -> failed.
const ALLOWED_SOURCES: Record<NotificationStatus, readonly NotificationStatus[]> = {
  pending: [],
  sent: ["pending"],
  delivered: ["pending", "sent"],
  read: ["sent", "delivered"],
  failed: ["pending", "sent"],
};

export function allowedSources(target: NotificationStatus): readonly NotificationStatus[] {
  return ALLOWED_SOURCES[target];
}

export function canTransition(from: NotificationStatus, to: NotificationStatus): boolean {
  return ALLOWED_SOURCES[to].includes(from);
}

/** Statuses that count as unread when `read_at` is still empty. */
export const READABLE_STATUSES = allowedSources("read");
