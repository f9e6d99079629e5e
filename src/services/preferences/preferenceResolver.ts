import { isInQuietHours } from "@/services/preferences/quietHours";
import { CHANNELS, type Channel } from "@/types/notification";
import { preferencePatchSchema, type UserChannelPreference } from "@/types/preference";
import type { PreferenceStore } from "@/types/stores";
import { ValidationError } from "@/utils/errors";

const CHANNEL_FLAGS = {
  email: "emailEnabled",
  sms: "smsEnabled",
  push: "pushEnabled",
  whatsapp: "whatsappEnabled",
  in_app: "inAppEnabled",
} as const satisfies Record<Channel, keyof UserChannelPreference>;

export function enabledChannels(preference: UserChannelPreference, eventType?: string | null): Channel[] {
  const enabled = CHANNELS.filter((channel) => preference[CHANNEL_FLAGS[channel]]);

  const overrides = eventType ? preference.eventOverrides[eventType] : undefined;
  if (!overrides) {
    return enabled;
  }

  return enabled.filter((channel) => overrides[channel] !== false);
}

export class PreferenceResolver {
  constructor(
    private readonly store: PreferenceStore,
    private readonly timeZone = "UTC",
  ) {}

  getPreferences(userId: string): Promise<UserChannelPreference> {
    return this.store.getOrCreate(userId);
  }

  async updatePreferences(userId: string, patch: unknown): Promise<UserChannelPreference> {
    const parsed = preferencePatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new ValidationError("Invalid preference update", parsed.error.flatten());
    }

    return this.store.update(userId, parsed.data);
  }

  async resolve(userId: string, eventType?: string | null): Promise<Channel[]> {
    const preference = await this.store.getOrCreate(userId);
    return enabledChannels(preference, eventType);
  }

  isInQuietHours(preference: UserChannelPreference, now: Date): boolean {
    return isInQuietHours(preference, now, this.timeZone);
  }

  shouldSend(preference: UserChannelPreference, channel: Channel, eventType: string | null | undefined, now: Date): boolean {
    return enabledChannels(preference, eventType).includes(channel) && !this.isInQuietHours(preference, now);
  }
}
