import { z } from "zod";

/**
 * Model output is coerced, not trusted: missing strings collapse to "",
 * missing lists to [], and list entries that fail their schema are dropped.
 */

const text = z.string().catch("");

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter(Boolean),
  );

/** Ids come back as "1" or 1 depending on the model's mood. */
const idString = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .catch("");

function lenientList<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((items) => {
      const out: Array<z.output<T>> = [];
      for (const raw of items) {
        const parsed = item.safeParse(raw);
        if (parsed.success) out.push(parsed.data);
      }
      return out;
    });
}

/** Shared enums */
export const LanguageEnum = z.enum(["English", "Arabic"]);
export type Language = z.infer<typeof LanguageEnum>;

/** Step 1 output: the normalized brief. */
export const BriefSchema = z.object({
  product: text,
  description: text,
  audience: text,
  tone: text,
  language: LanguageEnum.catch("English"),
  objectives: stringList,
  constraints: stringList,
});
export type Brief = z.infer<typeof BriefSchema>;

/** Step 2 output. */
export const MarketInsightsSchema = z.object({
  cultural_moments: stringList,
  local_trends: stringList,
  target_behaviors: stringList,
  competitive_landscape: stringList,
  opportunities: stringList,
  seasonal_relevance: stringList,
});
export type MarketInsights = z.infer<typeof MarketInsightsSchema>;

export const MarketIntelligenceSchema = z.object({
  market_insights: MarketInsightsSchema.catch(() => MarketInsightsSchema.parse({})),
});
export type MarketIntelligence = z.infer<typeof MarketIntelligenceSchema>;

/** Step 3 output. */
export const AngleSchema = z.object({
  id: idString,
  title: text,
  insight: text,
  key_message: text,
  cultural_hook: text,
  timing_consideration: text,
});
export type Angle = z.infer<typeof AngleSchema>;

export const AnglesSchema = z.object({ angles: lenientList(AngleSchema) });

/** Steps 4–7 output. */
export const CaptionsSchema = z.object({
  instagram: text,
  x: text,
});
export type Captions = z.infer<typeof CaptionsSchema>;

export const IdeaSchema = z.object({
  label: text.transform((v) => v.trim().toUpperCase()),
  based_on_angle_id: idString,
  tagline: text,
  script_30s: text,
  captions: CaptionsSchema.catch({ instagram: "", x: "" }),
  cta: text,
  compliance_notes: z.string().optional().catch(undefined),
});
export type Idea = z.infer<typeof IdeaSchema>;

export const IdeasSchema = z.object({ ideas: lenientList(IdeaSchema) });
