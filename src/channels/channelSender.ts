import type { Channel, NotificationRecord, SenderResult } from "@/types/notification";
import type { UserChannelPreference } from "@/types/preference";
import type { User } from "@/types/user";

export interface SendContext {
  record: NotificationRecord;
  user: User;
  getPreference: () => Promise<UserChannelPreference>;
}

/**
 * One implementation per channel. A sender either resolves with a uniform
 * result or throws; unavailability is signalled with ChannelUnavailableError.
 */
export interface ChannelSender {
  readonly channel: Channel;
  send(context: SendContext): Promise<SenderResult>;
}

export type ChannelSenderRegistry = Partial<Record<Channel, ChannelSender>>;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
