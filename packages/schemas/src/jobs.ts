import { z } from 'zod';

export const jobBaseSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  idempotencyKey: z.string().min(1),
  createdAt: z.coerce.date(),
});

const commandSourceSchema = z.enum(['interaction', 'prefix']);

const commandRequesterSchema = z.object({
  userId: z.string().min(1),
  username: z.string().min(1),
});

export const loopModeSchema = z.enum(['none', 'track', 'queue', 'random']);

const guildCommandJobBaseSchema = jobBaseSchema.extend({
  guildId: z.string().min(1),
  textChannelId: z.string().min(1),
  requester: commandRequesterSchema,
  source: commandSourceSchema,
  locale: z.string().optional(),
  voiceChannelId: z.string().min(1).optional(),
});

export const musicPlayJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.play'),
  voiceChannelId: z.string().min(1),
  query: z.string().min(1),
});

export const musicSkipJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.skip'),
});

export const musicPreviousJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.previous'),
});

export const musicPauseJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.pause'),
});

export const musicResumeJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.resume'),
});

export const musicSeekJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.seek'),
  positionMs: z.number().int().min(0),
});

export const musicVolumeJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.volume'),
  level: z.number().int().min(0).max(1000).optional(),
});

export const musicLoopJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.loop'),
  mode: loopModeSchema,
});

export const musicShuffleJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.shuffle'),
});

export const musicRemoveJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.remove'),
  position: z.number().int().min(1),
});

export const musicStopJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.stop'),
});

export const musicQueueJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.queue'),
  page: z.number().int().min(1).optional(),
});

export const musicLeaveJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.leave'),
});

export const musicNodesJobSchema = guildCommandJobBaseSchema.extend({
  type: z.literal('music.nodes'),
});

export type JobBase = z.infer<typeof jobBaseSchema>;
export type CommandSource = z.infer<typeof commandSourceSchema>;
export type CommandRequester = z.infer<typeof commandRequesterSchema>;
export type GuildCommandJobBase = z.infer<typeof guildCommandJobBaseSchema>;
export type MusicPlayJob = z.infer<typeof musicPlayJobSchema>;
export type MusicSkipJob = z.infer<typeof musicSkipJobSchema>;
export type MusicPreviousJob = z.infer<typeof musicPreviousJobSchema>;
export type MusicPauseJob = z.infer<typeof musicPauseJobSchema>;
export type MusicResumeJob = z.infer<typeof musicResumeJobSchema>;
export type MusicSeekJob = z.infer<typeof musicSeekJobSchema>;
export type MusicVolumeJob = z.infer<typeof musicVolumeJobSchema>;
export type MusicLoopJob = z.infer<typeof musicLoopJobSchema>;
export type MusicShuffleJob = z.infer<typeof musicShuffleJobSchema>;
export type MusicRemoveJob = z.infer<typeof musicRemoveJobSchema>;
export type MusicStopJob = z.infer<typeof musicStopJobSchema>;
export type MusicQueueJob = z.infer<typeof musicQueueJobSchema>;
export type MusicLeaveJob = z.infer<typeof musicLeaveJobSchema>;
export type MusicNodesJob = z.infer<typeof musicNodesJobSchema>;

export const jobEnvelopeSchema = z.discriminatedUnion('type', [
  musicPlayJobSchema,
  musicSkipJobSchema,
  musicPreviousJobSchema,
  musicPauseJobSchema,
  musicResumeJobSchema,
  musicSeekJobSchema,
  musicVolumeJobSchema,
  musicLoopJobSchema,
  musicShuffleJobSchema,
  musicRemoveJobSchema,
  musicStopJobSchema,
  musicQueueJobSchema,
  musicLeaveJobSchema,
  musicNodesJobSchema,
]);

export type JobEnvelope = z.infer<typeof jobEnvelopeSchema>;
