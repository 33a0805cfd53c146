// Step 1: Brief Normalizer
// Turns the raw form fields into the clean brief every later step reads.
import type { Brief } from "../schemas.js";
import { DEFAULT_MARKET, JSON_ONLY, inputBlock } from "../system.js";

export type RawBrief = Omit<Brief, "objectives" | "constraints">;

export const role = "Brief Normalizer";
export const temperature = 0.4;

export function buildPrompt(input: RawBrief): string {
  return [
    `Role: ${role}`,
    "Task: Given a raw brief, produce a clean, standardized JSON object that will be passed to other steps.",
    inputBlock(input),
    "Output JSON schema (no additional fields):",
    "{",
    '  "product": string,',
    '  "description": string,',
    '  "audience": string,',
    '  "tone": string,',
    '  "language": "English" | "Arabic",',
    '  "objectives": string[],',
    '  "constraints": string[]',
    "}",
    "Rules:",
    `- The default target market is ${DEFAULT_MARKET}. If the input audience is generic or empty, enrich it with this specific context.`,
    "- Correct typos and normalize while preserving meaning.",
    "- Use concise phrasing.",
    "- Do not include nulls; use [] for empty arrays.",
    JSON_ONLY,
  ].join("\n");
}
