import { z } from 'zod';

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

export interface SessionCookie {
  readonly name: string;
  readonly value: string;
}

/** Short-lived login material; valid for exactly one scrape. */
export interface Session {
  readonly sessionCookie: SessionCookie;
  readonly csrfToken: string;
}

export const DownstreamChannelSchema = z.object({
  channelId: z.string(),
  locked: z.boolean(),
  modulation: z.string(),
  frequency: z.string(),
  powerDbmV: z.number(),
  snrDb: z.number(),
  // Counters reset to 0 on modem reboot
  correctedErrors: z.number().nonnegative(),
  uncorrectableErrors: z.number().nonnegative(),
});
export type DownstreamChannel = Readonly<z.infer<typeof DownstreamChannelSchema>>;

export const UpstreamChannelSchema = z.object({
  channel: z.string(),
  channelId: z.string(),
  locked: z.boolean(),
  channelType: z.string(),
  frequency: z.string(),
  width: z.string(),
  powerDbmV: z.number(),
});
export type UpstreamChannel = Readonly<z.infer<typeof UpstreamChannelSchema>>;

export interface DeviceState {
  readonly host: string;
  readonly connected: boolean;
  readonly uptimeSeconds: number;
  readonly hardwareVersion: string;
  readonly softwareVersion: string;
  readonly macAddress: string;
  readonly serialNumber: string;
  readonly downstreamChannels: readonly DownstreamChannel[];
  readonly upstreamChannels: readonly UpstreamChannel[];
}

export type ChannelDirection = 'downstream' | 'upstream';
