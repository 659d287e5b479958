import { z } from "zod";

const feedSourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  baseScore: z.number().int(),
});

const keywordListSchema = z
  .array(z.string().min(1))
  .transform((words) => words.map((w) => w.toLowerCase()));

const scoringConfigSchema = z.object({
  positiveKeywords: keywordListSchema.default([
    "kultur",
    "gesellschaft",
    "geschichte",
    "umwelt",
    "europa",
    "kunst",
    "musik",
    "film",
    "literatur",
    "wissenschaft",
  ]),
  negativeKeywords: keywordListSchema.default([
    "tote",
    "krieg",
    "angriff",
    "terror",
    "krise",
    "gewalt",
    "eilmeldung",
    "breaking",
    "live",
  ]),
  breakingKeywords: keywordListSchema.default(["eilmeldung", "breaking", "live"]),
  threshold: z.number().int().default(6),
  shortTitleLength: z.number().int().positive().default(80),
});

export const appConfigSchema = z.object({
  llm: z.object({
    provider: z.enum(["anthropic", "openai", "gemini", "ollama", "lmstudio"]),
    model: z.string().min(1),
  }),
  sources: z.array(feedSourceSchema).min(1),
  scoring: scoringConfigSchema.default({}),
  extraction: z
    .object({
      userAgent: z.string().min(1).default("Mozilla/5.0"),
      timeoutMs: z.number().int().positive().default(10000),
      minParagraphLength: z.number().int().nonnegative().default(30),
      maxLength: z.number().int().positive().default(2000),
      // false skips certificate verification on feed and article requests
      verifyTls: z.boolean().default(false),
    })
    .default({}),
  generation: z
    .object({
      temperature: z.number().min(0).max(2).default(0.3),
      timeoutMs: z.number().int().positive().default(90000),
      articleMaxTokens: z.number().int().positive().default(250),
      sectionMaxTokens: z.number().int().positive().default(120),
      articleMaxLength: z.number().int().positive().default(650),
    })
    .default({}),
  template: z
    .object({
      path: z.string().min(1).default("./templates/newsletter.html"),
    })
    .default({}),
  output: z
    .object({
      dir: z.string().min(1).default("./output"),
      writeJson: z.boolean().default(true),
    })
    .default({}),
  dispatch: z
    .object({
      fromName: z.string().min(1).default("Newsletter Allemand"),
      recipients: z.array(z.string().email()).default([]),
    })
    .default({}),
  schedule: z
    .object({
      cron: z.string().min(1).optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type FeedSource = AppConfig["sources"][number];
export type ScoringConfig = AppConfig["scoring"];
export type ExtractionConfig = AppConfig["extraction"];
export type GenerationConfig = AppConfig["generation"];
