import { parseJsonObject, runQuery } from "@/database/query";
import {
  eventOverridesSchema,
  type EventOverrides,
  type PreferencePatch,
  type UserChannelPreference,
} from "@/types/preference";
import type { PreferenceStore } from "@/types/stores";
import { ValidationError } from "@/utils/errors";
import { logger } from "@/utils/logger";

type PreferenceRow = {
  user_id: string;
  email_enabled: boolean;
  sms_enabled: boolean;
  push_enabled: boolean;
  whatsapp_enabled: boolean;
  in_app_enabled: boolean;
  quiet_hours_enabled: boolean;
  quiet_hours_start: string | null;
  quiet_hours_end: string | null;
  push_token: string | null;
  whatsapp_phone: string | null;
  event_overrides: unknown;
  created_at: Date;
  updated_at: Date;
};

const PREFERENCE_COLUMNS = `user_id, email_enabled, sms_enabled, push_enabled, whatsapp_enabled, in_app_enabled,
  quiet_hours_enabled, quiet_hours_start::text AS quiet_hours_start, quiet_hours_end::text AS quiet_hours_end,
  push_token, whatsapp_phone, event_overrides, created_at, updated_at`;

const PATCH_COLUMNS: ReadonlyArray<readonly [keyof PreferencePatch, string]> = [
  ["emailEnabled", "email_enabled"],
  ["smsEnabled", "sms_enabled"],
  ["pushEnabled", "push_enabled"],
  ["whatsappEnabled", "whatsapp_enabled"],
  ["inAppEnabled", "in_app_enabled"],
  ["quietHoursEnabled", "quiet_hours_enabled"],
  ["quietHoursStart", "quiet_hours_start"],
  ["quietHoursEnd", "quiet_hours_end"],
  ["pushToken", "push_token"],
  ["whatsappPhone", "whatsapp_phone"],
  ["eventOverrides", "event_overrides"],
];

function parseEventOverrides(userId: string, value: unknown): EventOverrides {
  const raw = parseJsonObject(value);
  if (!raw) {
    return {};
  }

  const parsed = eventOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("Ignoring malformed event overrides", { userId, issues: parsed.error.issues });
    return {};
  }

  return parsed.data;
}

export function mapPreferenceRow(row: PreferenceRow): UserChannelPreference {
  return {
    userId: row.user_id,
    emailEnabled: row.email_enabled,
    smsEnabled: row.sms_enabled,
    pushEnabled: row.push_enabled,
    whatsappEnabled: row.whatsapp_enabled,
    inAppEnabled: row.in_app_enabled,
    quietHoursEnabled: row.quiet_hours_enabled,
    quietHoursStart: row.quiet_hours_start,
    quietHoursEnd: row.quiet_hours_end,
    pushToken: row.push_token,
    whatsappPhone: row.whatsapp_phone,
    eventOverrides: parseEventOverrides(row.user_id, row.event_overrides),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

async function getOrCreate(userId: string): Promise<UserChannelPreference> {
  const result = await runQuery<PreferenceRow>(
    "load notification preferences",
    `INSERT INTO user_channel_preferences (user_id)
     VALUES ($1)
     ON CONFLICT (user_id) DO UPDATE SET user_id = EXCLUDED.user_id
     RETURNING ${PREFERENCE_COLUMNS}`,
    [userId],
  );

  const row = result.rows[0];
  if (!row) {
    throw new Error(`Preference upsert for user ${userId} returned no row`);
  }

  return mapPreferenceRow(row);
}

async function update(userId: string, patch: PreferencePatch): Promise<UserChannelPreference> {
  const columns: string[] = [];
  const values: unknown[] = [userId];

  for (const [key, column] of PATCH_COLUMNS) {
    const value = patch[key];
    if (value === undefined) {
      continue;
    }

    columns.push(column);
    values.push(key === "eventOverrides" ? JSON.stringify(value) : value);
  }

  if (columns.length === 0) {
    throw new ValidationError("No preference fields provided for update");
  }

  const placeholders = columns.map((_, index) => `$${index + 2}`).join(", ");
  const assignments = columns.map((column) => `${column} = EXCLUDED.${column}`).join(", ");

  const result = await runQuery<PreferenceRow>(
    "update notification preferences",
    `INSERT INTO user_channel_preferences (user_id, ${columns.join(", ")})
     VALUES ($1, ${placeholders})
     ON CONFLICT (user_id) DO UPDATE SET ${assignments}, updated_at = NOW()
     RETURNING ${PREFERENCE_COLUMNS}`,
    values,
  );

  const row = result.rows[0];
  if (!row) {
    throw new Error(`Preference update for user ${userId} returned no row`);
  }

  return mapPreferenceRow(row);
}

export const pgPreferenceStore: PreferenceStore = {
  getOrCreate,
  update,
};
