import { z } from "zod";

// Chat platforms hand out numeric ids; everything downstream keys on strings
const PlatformIdSchema = z
  .union([z.string().trim().min(1), z.number().int()])
  .transform((val) => String(val));

export const CommandEventSchema = z.object({
  name: z.string().trim().min(1).max(64),
  args: z.array(z.string().max(512)).max(32).default([]),
  chatId: PlatformIdSchema,
  responderId: PlatformIdSchema,
});

export type CommandEvent = z.infer<typeof CommandEventSchema>;

export const PollAnswerEventSchema = z.object({
  pollId: z.string().trim().min(1).max(128),
  responderId: PlatformIdSchema,
  optionIds: z.array(z.number().int().nonnegative()).max(16),
});

export type PollAnswerEvent = z.infer<typeof PollAnswerEventSchema>;
