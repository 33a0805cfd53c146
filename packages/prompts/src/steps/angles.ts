// Step 3, Creative Strategist: five distinct, timely angles.
import type { MarketContext } from "../context.js";
import type { Brief, MarketInsights } from "../schemas.js";
import { JSON_ONLY, inputBlock } from "../system.js";

export const role = "Creative Strategist";
export const temperature = 0.7;
export const ANGLE_COUNT = 5;

export function buildPrompt(input: {
  brief: Brief;
  market_insights: MarketInsights;
  current_context: MarketContext;
}): string {
  const ctx = input.current_context;
  return [
    `Role: ${role}`,
    `Task: Using the brief and market insights, propose exactly ${ANGLE_COUNT} distinct creative angles for ad campaigns.`,
    `CURRENT TIMING CONTEXT: ${ctx.context_note}. Today is ${ctx.weekday}.`,
    inputBlock(input),
    `Output JSON schema (exactly ${ANGLE_COUNT}):`,
    "{",
    '  "angles": [',
    "    {",
    `      "id": "1".."${ANGLE_COUNT}",`,
    '      "title": string,',
    '      "insight": string,',
    '      "key_message": string,',
    '      "cultural_hook": string,',
    '      "timing_consideration": string',
    "    }",
    "  ]",
    "}",
    "Rules:",
    "- Use the current date/season to create timely, relevant angles.",
    "- Leverage market insights to create culturally resonant angles for Riyadh/KSA.",
    "- Each angle must tap into what's happening NOW - current season, events, behaviors.",
    "- Consider immediate timing opportunities (current weather, seasonal activities, cultural moments).",
    "- Angles must be distinct and non-overlapping.",
    "- Tailor to the audience and tone.",
    JSON_ONLY,
  ].join("\n");
}
