import { z } from "zod";
import { CAROUSEL_MAX_ITEMS, CAROUSEL_MIN_ITEMS } from "../media/orchestrator.ts";
import { MAX_CAPTION_LENGTH } from "../publish/caption.ts";

export const platformSchema = z.enum(["instagram", "linkedin"]);

export const renderRequestSchema = z.object({
  template: z.enum(["caption", "quote", "code"]),
  text: z.string().min(1).max(2000),
  title: z.string().max(200).optional(),
  language: z.string().max(40).optional()
});

export const contentDescriptorSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("url"), url: z.string().url() }),
  z.object({ kind: z.literal("render"), request: renderRequestSchema })
]);

export const publishJobSchema = z
  .object({
    caption: z.string().max(MAX_CAPTION_LENGTH),
    hashtags: z.array(z.string().min(1).max(100)).max(30).default([]),
    linkUrl: z.string().url().nullable().optional(),
    mode: z.enum(["single", "carousel"]),
    content: z.array(contentDescriptorSchema).max(CAROUSEL_MAX_ITEMS)
  })
  .superRefine((job, ctx) => {
    if (job.mode === "carousel" && job.content.length < CAROUSEL_MIN_ITEMS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["content"],
        message: `Carousel requires ${CAROUSEL_MIN_ITEMS}-${CAROUSEL_MAX_ITEMS} items.`
      });
    }

    if (job.mode === "single" && job.content.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["content"],
        message: "Single posts take at most one item."
      });
    }
  });

export const publishRequestSchema = z.object({
  platform: platformSchema,
  job: publishJobSchema,
  deadlineSeconds: z.number().int().min(1).max(600).optional()
});

export type PublishRequestBody = z.infer<typeof publishRequestSchema>;
