import { z } from "zod";

const feedConfigSchema = z.union([
  z.string().url(),
  z.object({
    url: z.string().url(),
    name: z.string().min(1).optional(),
  }),
]);

const fileSinkConfigSchema = z.object({
  enabled: z.boolean().default(true),
  directory: z.string().min(1).default("./data"),
  basename: z.string().min(1).default("new_items"),
  scope: z.enum(["new", "all"]).default("new"),
  formats: z
    .array(z.enum(["json", "csv", "html"]))
    .default(["json", "csv", "html"]),
});

const remoteSinkConfigSchema = z.object({
  endpoint: z.string().url(),
  headers: z.record(z.string(), z.string()).default({}),
  timeoutMs: z.number().int().positive().default(15000),
});

export const appConfigSchema = z.object({
  feeds: z.array(feedConfigSchema).min(1),
  fetch: z
    .object({
      timeoutMs: z.number().int().positive().default(15000),
      retries: z.number().int().nonnegative().max(5).default(0),
      retryDelayMs: z.number().int().nonnegative().default(1000),
      maxConcurrency: z.number().int().positive().default(1),
      userAgent: z
        .string()
        .min(1)
        .default("FeedRelay/1.0 (+https://github.com/feed-relay/feed-relay)"),
    })
    .default({}),
  extraction: z
    .object({
      maxItemsPerFeed: z.number().int().positive().default(10),
    })
    .default({}),
  normalize: z
    .object({
      identity: z.enum(["link", "hash"]).default("link"),
      descriptionFormat: z.enum(["text", "markdown"]).default("text"),
    })
    .default({}),
  dedup: z
    .object({
      policy: z.enum(["identity", "identity-and-time"]).default("identity"),
    })
    .default({}),
  state: z
    .object({
      driver: z.enum(["file", "sqlite"]).default("file"),
      path: z.string().min(1).default("./data/run-state.json"),
      defaultWindowHours: z.number().positive().default(24),
    })
    .default({}),
  sinks: z
    .object({
      files: fileSinkConfigSchema.default({}),
      remote: remoteSinkConfigSchema.optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type FeedConfig = z.infer<typeof feedConfigSchema>;
