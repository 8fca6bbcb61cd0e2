import { z } from "zod";

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "Expected an http(s) link");

/**
 * The subset of an rss-parser item we rely on
 */
export const FeedItemSchema = z.object({
  title: z.string().trim().min(1),
  link: httpUrl,
  pubDate: z.string().optional(),
  isoDate: z.string().optional(),
  contentSnippet: z.string().optional(),
  summary: z.string().optional(),
});

export type FeedItem = z.infer<typeof FeedItemSchema>;
