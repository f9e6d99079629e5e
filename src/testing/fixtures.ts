import type { NotificationRecord } from "@/types/notification";
import type { User } from "@/types/user";

export const FIXED_NOW = new Date("2024-03-10T12:00:00.000Z");

export function buildRecord(overrides: Partial<NotificationRecord> = {}): NotificationRecord {
  return {
    id: "notif-1",
    userId: "user-1",
    title: "Claim approved",
    message: "Your claim has been approved.",
    channel: "email",
    priority: "normal",
    eventType: null,
    relatedEntityId: null,
    status: "pending",
    scheduledFor: FIXED_NOW,
    sentAt: null,
    deliveredAt: null,
    readAt: null,
    failureReason: null,
    deliveryDetails: null,
    metadata: {},
    leaseExpiresAt: null,
    createdAt: FIXED_NOW,
    ...overrides,
  };
}

export function buildUser(overrides: Partial<User> = {}): User {
  return {
    id: "user-1",
    email: "user@example.com",
    phone: "+15550000001",
    whatsappNumber: null,
    language: "en",
    active: true,
    ...overrides,
  };
}
