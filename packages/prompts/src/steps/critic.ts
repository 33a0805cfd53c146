// Step 5: Critic & Improve
import type { Brief, Idea } from "../schemas.js";
import { JSON_ONLY, ideaSchemaBlock, inputBlock } from "../system.js";

export const role = "Critic & Improve";
export const temperature = 0.6;

export function buildPrompt(input: { brief: Brief; ideas: Idea[] }): string {
  return [
    `Role: ${role}`,
    "Task: Review the ideas, identify weaknesses, and revise them. Output only the improved versions.",
    inputBlock(input),
    "Output JSON schema:",
    ideaSchemaBlock(),
    "Rules:",
    "- Review for cultural appropriateness for the Riyadh/KSA market. Revise any idea that might not land well.",
    "- Keep original strengths; fix clarity, hook, and CTA strength.",
    "- Ensure each idea is distinct; remove redundancy.",
    JSON_ONLY,
  ].join("\n");
}
