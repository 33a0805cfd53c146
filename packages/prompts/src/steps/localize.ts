// Step 7: Localize/Polish
import type { Idea, Language } from "../schemas.js";
import { JSON_ONLY, ideaSchemaBlock, inputBlock } from "../system.js";

export const role = "Localize/Polish";
export const temperature = 0.5;

export const STYLE_GUIDE = [
  '- Use a friendly, conversational second-person voice ("you").',
  "- Prefer short sentences (8–15 words) and simple everyday words.",
  '- Open scripts with a concrete moment or scenario (e.g., "Imagine...", "It\'s 2 PM in Riyadh...").',
  "- Show, not tell: add 1–2 light sensory cues without hype.",
  "- Keep scripts ~120–160 words, split into 3–5 short paragraphs.",
  "- Captions: IG slightly expressive; X concise and punchy. Avoid unnecessary hashtags.",
  "- Do not invent product claims; no health/functional promises.",
];

export function buildPrompt(input: { language: Language; tone: string; ideas: Idea[] }): string {
  return [
    `Role: ${role}`,
    "Task: Refine the ideas to the requested language and tone. If the language is Arabic, fully localize the content to natural Modern Standard Arabic. If the language is English, just polish the existing English text for clarity and impact.",
    "Style Guide (apply strictly):",
    ...STYLE_GUIDE,
    inputBlock(input),
    "Output JSON schema (same as input ideas schema):",
    ideaSchemaBlock(),
    "Rules:",
    "- Perform a final cultural polish to ensure content is appropriate and effective for the target market (defaulting to Riyadh, KSA).",
    "- Preserve meaning while adjusting tone.",
    "- For Arabic, use proper Modern Standard Arabic, not transliteration.",
    "- For English, focus on polishing grammar, style, and flow.",
    JSON_ONLY,
  ].join("\n");
}
