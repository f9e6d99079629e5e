import { z } from "zod";

import { channelSchema, type Channel } from "@/types/notification";

export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

export const eventOverridesSchema = z.record(z.string(), z.record(channelSchema, z.boolean()));

export type EventOverrides = Record<string, Partial<Record<Channel, boolean>>>;

export interface UserChannelPreference {
  userId: string;
  emailEnabled: boolean;
  smsEnabled: boolean;
  pushEnabled: boolean;
  whatsappEnabled: boolean;
  inAppEnabled: boolean;
  quietHoursEnabled: boolean;
  quietHoursStart: string | null;
  quietHoursEnd: string | null;
  pushToken: string | null;
  whatsappPhone: string | null;
  eventOverrides: EventOverrides;
  createdAt: Date;
  updatedAt: Date;
}

const timeOfDaySchema = z.string().regex(TIME_OF_DAY_PATTERN, "Expected HH:MM or HH:MM:SS");

export const preferencePatchSchema = z
  .object({
    emailEnabled: z.boolean(),
    smsEnabled: z.boolean(),
    pushEnabled: z.boolean(),
    whatsappEnabled: z.boolean(),
    inAppEnabled: z.boolean(),
    quietHoursEnabled: z.boolean(),
    quietHoursStart: timeOfDaySchema.nullable(),
    quietHoursEnd: timeOfDaySchema.nullable(),
    pushToken: z.string().min(1).nullable(),
    whatsappPhone: z.string().min(1).nullable(),
    eventOverrides: eventOverridesSchema,
  })
  .partial()
  .strict();

export type PreferencePatch = z.infer<typeof preferencePatchSchema>;
