import { z } from "zod";

import { channelSchema, detailsSchema, prioritySchema, type Channel } from "@/types/notification";

export const BATCH_STATUSES = ["pending", "processing", "completed", "failed"] as const;
export const batchStatusSchema = z.enum(BATCH_STATUSES);
export type BatchStatus = z.infer<typeof batchStatusSchema>;

export const batchRecipientSchema = z.object({
  userId: z.string().trim().min(1).optional(),
  title: z.string().min(1).optional(),
  message: z.string().optional(),
  priority: prioritySchema.optional(),
  metadata: detailsSchema.optional(),
});

export type BatchRecipient = z.infer<typeof batchRecipientSchema>;

export const submitBatchSchema = z.object({
  channel: channelSchema,
  eventType: z.string().trim().min(1).nullish(),
  recipients: z.array(batchRecipientSchema).min(1),
  context: detailsSchema.default({}),
  scheduledFor: z.coerce.date().optional(),
});

export type SubmitBatchInput = z.input<typeof submitBatchSchema>;

export interface QueueBatch {
  id: string;
  channel: Channel;
  eventType: string | null;
  recipients: BatchRecipient[];
  context: Record<string, unknown>;
  status: BatchStatus;
  successCount: number;
  failureCount: number;
  scheduledFor: Date;
  errorMessage: string | null;
  startedAt: Date | null;
  /** While processing, the batch belongs to its worker until this time; after it the batch can be claimed again. */
  leaseExpiresAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
}

export interface BatchTally {
  successCount: number;
  failureCount: number;
}

export interface BatchProgressSnapshot {
  batchId: string;
  status: "processing" | "completed" | "failed";
  processed: number;
  total: number;
  successCount: number;
  failureCount: number;
  error?: string;
  updatedAt: string;
}
