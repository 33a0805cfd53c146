// Step 4, Idea Writer: three campaign ideas (A, B, C) built on the angles.
import type { Angle, Brief } from "../schemas.js";
import { DEFAULT_MARKET, JSON_ONLY, ideaSchemaBlock, inputBlock } from "../system.js";

export const role = "Idea Writer";
export const temperature = 0.85;
export const IDEA_LABELS = ["A", "B", "C"] as const;

export function buildPrompt(input: { brief: Brief; angles: Angle[] }): string {
  return [
    `Role: ${role}`,
    "Task: Using the brief and angles, write exactly 3 campaign ideas (A, B, C) with required fields.",
    inputBlock(input),
    "Output JSON schema (exactly 3):",
    ideaSchemaBlock(),
    "Constraints:",
    `- Scripts and captions must be culturally and locally relevant for the ${DEFAULT_MARKET} market unless a different audience is specified.`,
    "- Longer narrative: ~130–170 words (about 40s), with a clear beginning, middle, and end.",
    "- Captions are punchy; no hashtags unless essential.",
    "- Align with tone and audience.",
    JSON_ONLY,
  ].join("\n");
}
