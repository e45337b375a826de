import { z } from 'zod';

export const MediaFormatSchema = z
  .object({
    encoding: z.string().optional(),
    sampleRate: z.coerce.number().optional(),
    channels: z.coerce.number().optional(),
  })
  .passthrough();

export type MediaFormat = z.infer<typeof MediaFormatSchema>;

const ConnectedEventSchema = z.object({
  event: z.literal('connected'),
  protocol: z.string().optional(),
  version: z.string().optional(),
});

const StartEventSchema = z.object({
  event: z.literal('start'),
  sequenceNumber: z.string().optional(),
  streamSid: z.string().optional(),
  start: z
    .object({
      streamSid: z.string().min(1),
      callSid: z.string().optional(),
      accountSid: z.string().optional(),
      tracks: z.array(z.string()).optional(),
      customParameters: z.record(z.string()).optional(),
      mediaFormat: MediaFormatSchema.optional(),
    })
    .passthrough(),
});

const MediaEventSchema = z.object({
  event: z.literal('media'),
  sequenceNumber: z.string().optional(),
  streamSid: z.string().optional(),
  media: z
    .object({
      track: z.string().optional(),
      chunk: z.string().optional(),
      timestamp: z.string().optional(),
      payload: z.string(),
    })
    .passthrough(),
});

const MarkEventSchema = z.object({
  event: z.literal('mark'),
  streamSid: z.string().optional(),
  mark: z.object({ name: z.string() }).passthrough().optional(),
});

const StopEventSchema = z.object({
  event: z.literal('stop'),
  streamSid: z.string().optional(),
  stop: z.object({ callSid: z.string().optional() }).passthrough().optional(),
});

export const TelephonyInboundEventSchema = z.discriminatedUnion('event', [
  ConnectedEventSchema,
  StartEventSchema,
  MediaEventSchema,
  MarkEventSchema,
  StopEventSchema,
]);

export type TelephonyInboundEvent = z.infer<typeof TelephonyInboundEventSchema>;
export type TelephonyStartEvent = z.infer<typeof StartEventSchema>;

export type TelephonyMediaMessage = {
  event: 'media';
  streamSid: string;
  media: { payload: string };
};

export type TelephonyClearMessage = {
  event: 'clear';
  streamSid: string;
};

export type TelephonyOutboundMessage = TelephonyMediaMessage | TelephonyClearMessage;

/** Write side of one telephony media socket; rejects when the write fails. */
export interface TelephonyOutbound {
  send(message: TelephonyOutboundMessage): Promise<void>;
}
