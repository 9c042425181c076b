import { z } from 'zod';

export const voiceStateUpdatePacketSchema = z.object({
  t: z.literal('VOICE_STATE_UPDATE'),
  d: z.object({
    guild_id: z.string().min(1),
    channel_id: z.string().nullable(),
    user_id: z.string().min(1),
    session_id: z.string(),
    member: z
      .object({
        user: z.object({
          bot: z.boolean().optional(),
        }),
      })
      .optional(),
  }),
});

export const voiceServerUpdatePacketSchema = z.object({
  t: z.literal('VOICE_SERVER_UPDATE'),
  d: z.object({
    guild_id: z.string().min(1),
    token: z.string().min(1),
    endpoint: z.string().nullable(),
  }),
});

export const guildCreatePacketSchema = z.object({
  t: z.literal('GUILD_CREATE'),
  d: z.object({
    id: z.string().min(1),
    voice_states: z
      .array(
        z.object({
          user_id: z.string().min(1),
          channel_id: z.string().nullable(),
        }),
      )
      .default([]),
    members: z
      .array(
        z.object({
          user: z.object({
            id: z.string().min(1),
            bot: z.boolean().optional(),
          }),
        }),
      )
      .default([]),
  }),
});

export const voicePacketSchema = z.discriminatedUnion('t', [
  voiceStateUpdatePacketSchema,
  voiceServerUpdatePacketSchema,
  guildCreatePacketSchema,
]);

export const voicePacketTypes: ReadonlySet<string> = new Set(voicePacketSchema.options.map((option) => option.shape.t.value));

export type VoiceStateUpdatePacket = z.infer<typeof voiceStateUpdatePacketSchema>;
export type VoiceServerUpdatePacket = z.infer<typeof voiceServerUpdatePacketSchema>;
export type GuildCreatePacket = z.infer<typeof guildCreatePacketSchema>;
export type VoicePacket = z.infer<typeof voicePacketSchema>;
