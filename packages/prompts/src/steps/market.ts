// Step 2: Market Intelligence Analyst
import type { MarketContext } from "../context.js";
import type { Brief } from "../schemas.js";
import { JSON_ONLY, inputBlock } from "../system.js";

export const role = "Market Intelligence Analyst";
export const temperature = 0.6;

export const INSIGHT_CATEGORIES = [
  "cultural_moments",
  "local_trends",
  "target_behaviors",
  "competitive_landscape",
  "opportunities",
  "seasonal_relevance",
] as const;

export function buildPrompt(input: { brief: Brief; current_context: MarketContext }): string {
  const ctx = input.current_context;
  return [
    `Role: ${role}`,
    "Task: Analyze the KSA market context and provide strategic insights for the campaign brief.",
    `IMPORTANT: Today is ${ctx.context_note}. Current cultural events: ${ctx.cultural_events.join(", ")}.`,
    inputBlock(input),
    "Output JSON schema:",
    "{",
    '  "market_insights": {',
    INSIGHT_CATEGORIES.map((key) => `    "${key}": string[]`).join(",\n"),
    "  }",
    "}",
    "Rules:",
    "- Use the current date and season provided to give timely, relevant insights.",
    "- Focus on Riyadh/KSA market specifically unless different location specified.",
    "- Consider current season, weather, cultural events happening NOW.",
    "- Include seasonal shopping patterns, behavioral changes, cultural moments.",
    "- Identify 3-5 items per category.",
    JSON_ONLY,
  ].join("\n");
}
