import { z } from "zod";

export const CHANNELS = ["email", "sms", "push", "whatsapp", "in_app"] as const;
export const PRIORITIES = ["low", "normal", "high", "urgent"] as const;
export const NOTIFICATION_STATUSES = ["pending", "sent", "delivered", "read", "failed"] as const;

export const channelSchema = z.enum(CHANNELS);
export const prioritySchema = z.enum(PRIORITIES);
export const notificationStatusSchema = z.enum(NOTIFICATION_STATUSES);
export const detailsSchema = z.record(z.string(), z.unknown());

export type Channel = z.infer<typeof channelSchema>;
export type Priority = z.infer<typeof prioritySchema>;
export type NotificationStatus = z.infer<typeof notificationStatusSchema>;
export type DeliveryDetails = z.infer<typeof detailsSchema>;

export function emptyStatusCounts(): Record<NotificationStatus, number> {
  return { pending: 0, sent: 0, delivered: 0, read: 0, failed: 0 };
}

/** Statuses a channel sender can leave a record in. */
export type DeliveryStatus = Extract<NotificationStatus, "sent" | "delivered" | "failed">;

export interface NotificationRecord {
  id: string;
  userId: string;
  title: string;
  message: string;
  channel: Channel;
  priority: Priority;
  eventType: string | null;
  relatedEntityId: string | null;
  status: NotificationStatus;
  scheduledFor: Date;
  sentAt: Date | null;
  deliveredAt: Date | null;
  readAt: Date | null;
  failureReason: string | null;
  deliveryDetails: DeliveryDetails | null;
  metadata: Record<string, unknown>;
  leaseExpiresAt: Date | null;
  createdAt: Date;
}

export const notificationRequestSchema = z.object({
  userId: z.string().trim().min(1),
  title: z.string().min(1),
  message: z.string(),
  channels: z.array(channelSchema).min(1).optional(),
  priority: prioritySchema.default("normal"),
  eventType: z.string().trim().min(1).optional(),
  relatedEntityId: z.string().trim().min(1).optional(),
  scheduledFor: z.coerce.date().optional(),
  metadata: detailsSchema.optional(),
});

export type NotificationRequest = z.input<typeof notificationRequestSchema>;
export type ParsedNotificationRequest = z.output<typeof notificationRequestSchema>;

/**
 * Uniform outcome of a channel sender. Failed outcomes carry the reason that
 * ends up in `failure_reason`; details are stored on the record verbatim.
 */
export type SenderResult =
  | { success: true; status: "sent" | "delivered"; details: DeliveryDetails }
  | { success: false; status: "failed"; error: string; details?: DeliveryDetails };

export interface DeliveryResult {
  success: boolean;
  status: DeliveryStatus | "scheduled";
  notificationId?: string;
  details?: DeliveryDetails;
  error?: string;
}

export type ChannelResults = Partial<Record<Channel, DeliveryResult>>;

export interface SendNotificationSuccess {
  success: true;
  results: ChannelResults;
  suppressed: Channel[];
}

export interface ListNotificationsOptions {
  limit?: number;
  offset?: number;
  unreadOnly?: boolean;
}

export interface NotificationStatistics {
  totalNotifications: number;
  byStatus: Record<NotificationStatus, number>;
  pendingBatches: number;
}
