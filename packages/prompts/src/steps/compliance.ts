// Step 6: Compliance & Cultural Reviewer
// Same idea shape as the writer, plus a short note on what changed and why.
import type { Brief, Idea } from "../schemas.js";
import { JSON_ONLY, ideaSchemaBlock, inputBlock } from "../system.js";

export const role = "Compliance & Cultural Reviewer";
export const temperature = 0.4;

export function buildPrompt(input: { brief: Brief; ideas: Idea[] }): string {
  return [
    `Role: ${role}`,
    "Task: Review campaign ideas for compliance with KSA advertising guidelines and cultural appropriateness.",
    inputBlock(input),
    "Output JSON schema:",
    ideaSchemaBlock({ complianceNotes: true }),
    "Rules:",
    "- Ensure compliance with Saudi Arabia advertising regulations and cultural sensitivities.",
    "- Check for appropriate representation, modest imagery suggestions, respectful tone.",
    "- Verify timing considerations (prayer times, cultural events, weekends).",
    "- Remove or revise any potentially problematic content.",
    "- Add brief compliance notes explaining any changes made.",
    JSON_ONLY,
  ].join("\n");
}
