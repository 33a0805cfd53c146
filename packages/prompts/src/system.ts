// System instruction shared by every model-backed chain step.
export const system =
  "Think privately but never reveal reasoning. Output only JSON or final formatted text.";

export const DEFAULT_MARKET = "Riyadh, Saudi Arabia (KSA)";

export const JSON_ONLY = "- Respond ONLY with minified JSON.";

export function inputBlock(payload: unknown): string {
  return ["Input JSON:", JSON.stringify(payload)].join("\n");
}

/** Output contract shared by the idea-shaped steps (writer, critic, localizer). */
export function ideaSchemaBlock(opts: { complianceNotes?: boolean } = {}): string {
  return [
    "{",
    '  "ideas": [',
    "    {",
    '      "label": "A"|"B"|"C",',
    '      "based_on_angle_id": "1".."5",',
    '      "tagline": string,',
    '      "script_30s": string,',
    '      "captions": { "instagram": string, "x": string },',
    opts.complianceNotes ? '      "cta": string,' : '      "cta": string',
    ...(opts.complianceNotes ? ['      "compliance_notes": string'] : []),
    "    }",
    "  ]",
    "}",
  ].join("\n");
}
