import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import type { ChannelSender, SendContext } from "@/channels/channelSender";
import { ChannelDispatcher } from "@/services/notification/channelDispatcher";
import { NotificationService, type SendNotificationResult } from "@/services/notification/notification.service";
import { PreferenceResolver } from "@/services/preferences/preferenceResolver";
import { FIXED_NOW } from "@/testing/fixtures";
import {
  MemoryNotificationRecordStore,
  MemoryPreferenceStore,
  MemoryQueueBatchStore,
  MemoryUserDirectory,
} from "@/testing/memoryStores";
import type { BatchProgressSnapshot, QueueBatch } from "@/types/batch";
import type { SenderResult } from "@/types/notification";

import { BulkQueueProcessor, buildRecipientRequest } from "./bulkQueue.processor";
import type { BatchProgressInput, BatchProgressStore } from "./progress.service";

function createProgressStore() {
  const snapshots: BatchProgressSnapshot[] = [];
  const save = vi.fn(async (snapshot: BatchProgressInput): Promise<BatchProgressSnapshot> => {
    const stored = { ...snapshot, updatedAt: snapshot.updatedAt ?? FIXED_NOW.toISOString() };
    snapshots.push(stored);
    return stored;
  });
  const read = vi.fn(async (batchId: string) => snapshots.filter((snapshot) => snapshot.batchId === batchId).at(-1) ?? null);
  const store: BatchProgressStore = { save, read };
  return { store, save, read, snapshots };
}

const successfulSend = {
  success: true as const,
  results: { email: { success: true, status: "delivered" as const } },
  suppressed: [],
};

function buildBatch(overrides: Partial<QueueBatch> = {}): QueueBatch {
  return {
    id: "batch-1",
    channel: "email",
    eventType: "claim_updated",
    recipients: [],
    context: {},
    status: "pending",
    successCount: 0,
    failureCount: 0,
    scheduledFor: FIXED_NOW,
    errorMessage: null,
    startedAt: null,
    leaseExpiresAt: null,
    completedAt: null,
    createdAt: FIXED_NOW,
    ...overrides,
  };
}

describe("buildRecipientRequest", () => {
  it("should prefer recipient values over batch context defaults", () => {
    const batch = buildBatch({ context: { title: "Batch title", message: "Batch message", priority: "high" } });

    expect(buildRecipientRequest(batch, { userId: "user-1", title: "Mine", priority: "low" })).toEqual({
      userId: "user-1",
      title: "Mine",
      message: "Batch message",
      channels: ["email"],
      priority: "low",
      eventType: "claim_updated",
      metadata: { title: "Batch title", message: "Batch message", priority: "high" },
    });
  });

  it("should fall back to generic defaults", () => {
    const batch = buildBatch({ eventType: null, context: { priority: "not-a-priority" } });

    expect(buildRecipientRequest(batch, { userId: "user-1" })).toMatchObject({
      title: "Notification",
      message: "",
      priority: "normal",
      eventType: undefined,
    });
  });

  it("should fill placeholders from merged context and recipient metadata", () => {
    const batch = buildBatch({ context: { title: "Hello {name}", message: "Claim {claimNumber} is {state}", name: "team", state: "open" } });

    const request = buildRecipientRequest(batch, { userId: "user-1", metadata: { name: "Ana", claimNumber: 42 } });

    expect(request.title).toBe("Hello Ana");
    expect(request.message).toBe("Claim 42 is open");
    expect(request.metadata).toMatchObject({ name: "Ana", claimNumber: 42, state: "open" });
  });
});

describe("BulkQueueProcessor", () => {
  let users: MemoryUserDirectory;
  let records: MemoryNotificationRecordStore;
  let batches: MemoryQueueBatchStore;
  let progress: ReturnType<typeof createProgressStore>;
  let emailSend: Mock;

  function createService() {
    const preferences = new MemoryPreferenceStore();
    const emailSender: ChannelSender = {
      channel: "email",
      send: (context: SendContext): Promise<SenderResult> => emailSend(context),
    };
    const clock = () => FIXED_NOW;
    const dispatcher = new ChannelDispatcher({ senders: { email: emailSender }, records, preferences, clock });
    return new NotificationService({
      users,
      records,
      batches,
      resolver: new PreferenceResolver(preferences),
      dispatcher,
      leaseMs: 60_000,
      clock,
    });
  }

  beforeEach(() => {
    users = new MemoryUserDirectory();
    records = new MemoryNotificationRecordStore();
    batches = new MemoryQueueBatchStore();
    progress = createProgressStore();
    emailSend = vi.fn().mockResolvedValue({ success: true, status: "delivered", details: {} });
    for (const id of ["user-1", "user-2", "user-3"]) {
      users.add({ id, email: `${id}@example.com` });
    }
  });

  it("should count recipients without a user id as failures and create no record for them", async () => {
    const notifications = createService();
    const processor = new BulkQueueProcessor({ notifications, batches, progress: progress.store, clock: () => FIXED_NOW });
    const batchId = await notifications.submitBatch({
      channel: "email",
      recipients: [{ userId: "user-1" }, {}, { userId: "user-2" }, { title: "orphan" }, { userId: "user-3" }],
      context: { title: "Update" },
    });
    const [batch] = await batches.claimDue({ now: FIXED_NOW, leaseMs: 60_000, limit: 10 });

    await expect(processor.process(batch)).resolves.toEqual({ successCount: 3, failureCount: 2 });

    expect(records.all()).toHaveLength(3);
    expect(batches.batches.get(batchId)).toMatchObject({
      status: "completed",
      successCount: 3,
      failureCount: 2,
      completedAt: FIXED_NOW,
    });
  });

  it("should keep going when one recipient's delivery throws", async () => {
    emailSend.mockImplementation(async ({ user }: SendContext) => {
      if (user.id === "user-2") {
        throw new Error("SMTP connection lost");
      }
      return { success: true, status: "delivered", details: {} };
    });
    const notifications = createService();
    const processor = new BulkQueueProcessor({ notifications, batches, progress: progress.store });
    const batchId = await notifications.submitBatch({
      channel: "email",
      recipients: [{ userId: "user-1" }, { userId: "user-2" }, { userId: "user-3" }],
    });
    const [batch] = await batches.claimDue({ now: FIXED_NOW, leaseMs: 60_000, limit: 10 });

    await expect(processor.process(batch)).resolves.toEqual({ successCount: 2, failureCount: 1 });

    expect(emailSend).toHaveBeenCalledTimes(3);
    expect(batches.batches.get(batchId)).toMatchObject({ status: "completed", successCount: 2, failureCount: 1 });
    expect(records.all().map((record) => record.status)).toEqual(["delivered", "failed", "delivered"]);
  });

  it("should mark a pending batch as processing before fanning out", async () => {
    const markProcessing = vi.spyOn(batches, "markProcessing");
    const notifications = createService();
    const processor = new BulkQueueProcessor({ notifications, batches, progress: progress.store });
    const batchId = await notifications.submitBatch({ channel: "email", recipients: [{ userId: "user-1" }] });
    const batch = batches.batches.get(batchId);
    if (!batch) {
      throw new Error("batch not stored");
    }

    await processor.process({ ...batch });

    expect(markProcessing).toHaveBeenCalledWith(batchId, expect.any(Date), expect.any(Date));
    expect(batches.batches.get(batchId)?.status).toBe("completed");
  });

  it("should skip batches that already finished", async () => {
    const notifications = { sendNotification: vi.fn() };
    const processor = new BulkQueueProcessor({ notifications, batches, progress: progress.store });
    const created = await batches.create({
      channel: "email",
      eventType: null,
      recipients: [{ userId: "user-1" }],
      context: {},
      scheduledFor: FIXED_NOW,
    });
    await batches.markFailed(created.id, "earlier failure", { successCount: 0, failureCount: 0 }, FIXED_NOW);

    await expect(processor.process(created)).resolves.toEqual({ successCount: 0, failureCount: 0 });
    expect(notifications.sendNotification).not.toHaveBeenCalled();
  });

  it("should count recipients whose channels were all suppressed as failures", async () => {
    const notifications = { sendNotification: vi.fn().mockResolvedValue({ success: true, results: {}, suppressed: ["email"] }) };
    const processor = new BulkQueueProcessor({ notifications, batches, progress: progress.store });

    await expect(
      processor.process(buildBatch({ status: "processing", recipients: [{ userId: "user-1" }] })),
    ).resolves.toEqual({ successCount: 0, failureCount: 1 });
  });

  it("should count recipient exceptions and rejected requests as failures", async () => {
    const notifications = {
      sendNotification: vi
        .fn()
        .mockRejectedValueOnce(new Error("boom"))
        .mockResolvedValueOnce({ success: false, error: "User not found", code: "NOT_FOUND" })
        .mockResolvedValueOnce(successfulSend),
    };
    const processor = new BulkQueueProcessor({ notifications, batches, progress: progress.store });

    await expect(
      processor.process(
        buildBatch({ status: "processing", recipients: [{ userId: "user-1" }, { userId: "ghost" }, { userId: "user-3" }] }),
      ),
    ).resolves.toEqual({ successCount: 1, failureCount: 2 });
  });

  it("should write a progress snapshot after each recipient", async () => {
    const notifications = { sendNotification: vi.fn().mockResolvedValue(successfulSend) };
    const processor = new BulkQueueProcessor({ notifications, batches, progress: progress.store, clock: () => FIXED_NOW });
    const created = await batches.create({
      channel: "email",
      eventType: null,
      recipients: [{ userId: "user-1" }, {}],
      context: {},
      scheduledFor: FIXED_NOW,
    });

    await processor.process(created);

    expect(progress.snapshots).toEqual([
      { batchId: created.id, status: "processing", processed: 1, total: 2, successCount: 1, failureCount: 0, updatedAt: FIXED_NOW.toISOString() },
      { batchId: created.id, status: "processing", processed: 2, total: 2, successCount: 1, failureCount: 1, updatedAt: FIXED_NOW.toISOString() },
      { batchId: created.id, status: "completed", processed: 2, total: 2, successCount: 1, failureCount: 1, updatedAt: FIXED_NOW.toISOString() },
    ]);
    await expect(processor.getProgress(created.id)).resolves.toMatchObject({ status: "completed", processed: 2 });
  });

  it("should ignore progress reporting failures", async () => {
    progress.save.mockRejectedValue(new Error("redis down"));
    const notifications = { sendNotification: vi.fn().mockResolvedValue(successfulSend) };
    const processor = new BulkQueueProcessor({ notifications, batches, progress: progress.store });

    await expect(
      processor.process(buildBatch({ status: "processing", recipients: [{ userId: "user-1" }] })),
    ).resolves.toEqual({ successCount: 1, failureCount: 0 });
  });

  it("should renew the batch lease once half of it has elapsed", async () => {
    let now = FIXED_NOW;
    const notifications = {
      sendNotification: vi.fn(async (): Promise<SendNotificationResult> => {
        now = new Date(now.getTime() + 40_000);
        return successfulSend;
      }),
    };
    const processor = new BulkQueueProcessor({
      notifications,
      batches,
      progress: progress.store,
      leaseMs: 60_000,
      clock: () => now,
    });
    const created = await batches.create({
      channel: "email",
      eventType: null,
      recipients: [{ userId: "user-1" }, { userId: "user-2" }],
      context: {},
      scheduledFor: FIXED_NOW,
    });
    const [claimed] = await batches.claimDue({ now: FIXED_NOW, leaseMs: 60_000, limit: 10 });
    const markProcessing = vi.spyOn(batches, "markProcessing");

    await processor.process(claimed);

    const renewedAt = new Date(FIXED_NOW.getTime() + 40_000);
    expect(markProcessing).toHaveBeenCalledTimes(1);
    expect(markProcessing).toHaveBeenCalledWith(created.id, renewedAt, new Date(renewedAt.getTime() + 60_000));
    expect(batches.batches.get(created.id)).toMatchObject({ status: "completed", leaseExpiresAt: null });
  });

  it("should stop fanning out when the batch leaves processing", async () => {
    let now = FIXED_NOW;
    const created = await batches.create({
      channel: "email",
      eventType: null,
      recipients: [{ userId: "user-1" }, { userId: "user-2" }, { userId: "user-3" }],
      context: {},
      scheduledFor: FIXED_NOW,
    });
    const notifications = {
      sendNotification: vi.fn(async (): Promise<SendNotificationResult> => {
        now = new Date(now.getTime() + 40_000);
        await batches.markFailed(created.id, "cancelled", { successCount: 0, failureCount: 0 }, now);
        return successfulSend;
      }),
    };
    const processor = new BulkQueueProcessor({
      notifications,
      batches,
      progress: progress.store,
      leaseMs: 60_000,
      clock: () => now,
    });
    const [claimed] = await batches.claimDue({ now: FIXED_NOW, leaseMs: 60_000, limit: 10 });

    await expect(processor.process(claimed)).resolves.toEqual({ successCount: 1, failureCount: 0 });

    expect(notifications.sendNotification).toHaveBeenCalledTimes(1);
    expect(batches.batches.get(created.id)?.status).toBe("failed");
  });

  it("should finish the batch when progress writes never settle", async () => {
    progress.save.mockImplementation(() => new Promise<BatchProgressSnapshot>(() => undefined));
    const notifications = { sendNotification: vi.fn().mockResolvedValue(successfulSend) };
    const processor = new BulkQueueProcessor({ notifications, batches, progress: progress.store, progressTimeoutMs: 10 });
    const created = await batches.create({
      channel: "email",
      eventType: null,
      recipients: [{ userId: "user-1" }, { userId: "user-2" }],
      context: {},
      scheduledFor: FIXED_NOW,
    });

    await expect(processor.process(created)).resolves.toEqual({ successCount: 2, failureCount: 0 });

    expect(progress.save).toHaveBeenCalledTimes(3);
    expect(batches.batches.get(created.id)?.status).toBe("completed");
  });

  it("should mark the batch failed and rethrow when the loop itself breaks", async () => {
    const notifications = { sendNotification: vi.fn().mockResolvedValue(successfulSend) };
    const processor = new BulkQueueProcessor({ notifications, batches, progress: progress.store, clock: () => FIXED_NOW });
    const created = await batches.create({
      channel: "email",
      eventType: null,
      recipients: [{ userId: "user-1" }],
      context: {},
      scheduledFor: FIXED_NOW,
    });
    vi.spyOn(batches, "markCompleted").mockRejectedValue(new Error("database unavailable"));

    await expect(processor.process(created)).rejects.toThrow("database unavailable");

    expect(batches.batches.get(created.id)).toMatchObject({
      status: "failed",
      errorMessage: "database unavailable",
      successCount: 1,
      failureCount: 0,
    });
    expect(progress.snapshots.at(-1)).toMatchObject({ status: "failed", error: "database unavailable" });
  });
});
