import { SOURCE_ORDER, SOURCE_TONE, getSourceMeta } from "../connectors/sources.js";
import type { SourceId } from "../connectors/types.js";
import type { OperatorPreferences } from "../store/types.js";

export const DEFAULT_MAX_RESPONSE_LENGTH = 500;

export const REVISE_SYSTEM_PROMPT =
  "You are an assistant that improves draft replies based on the operator's feedback. " +
  "Make the requested changes while keeping the core message and tone. Reply with the revised text only.";

function toneGuidelines(): string {
  return SOURCE_ORDER.map((id) => `- ${getSourceMeta(id).label}: ${SOURCE_TONE[id]}`).join("\n");
}

function formatPreferences(preferences: OperatorPreferences | undefined): string[] {
  if (!preferences) return [];
  const lines: string[] = [];
  if (preferences.writingStyle) {
    lines.push(`Writing style: ${preferences.writingStyle}`);
  }
  if (preferences.personalityTraits.length > 0) {
    lines.push(`Personality traits: ${preferences.personalityTraits.join(", ")}`);
  }
  if (preferences.interests.length > 0) {
    lines.push(`Interests: ${preferences.interests.join(", ")}`);
  }
  if (preferences.responseRules.length > 0) {
    lines.push(`Response rules:\n${preferences.responseRules.map((rule) => `- ${rule}`).join("\n")}`);
  }
  return lines;
}

export function buildSystemPrompt(params: {
  source: SourceId;
  preferences?: OperatorPreferences;
  maxResponseLength?: number;
}): string {
  const label = getSourceMeta(params.source).label;
  const maxLength = params.maxResponseLength ?? DEFAULT_MAX_RESPONSE_LENGTH;
  const parts = [
    `You draft replies to ${label} messages on behalf of the operator.`,
    [
      "Your replies should be:",
      "- Appropriate for the platform",
      "- Concise and to the point",
      "- Friendly but not overly casual",
      `- At most ${maxLength} characters`,
    ].join("\n"),
    `Platform guidelines:\n${toneGuidelines()}`,
  ];

  const preferenceLines = formatPreferences(params.preferences);
  if (preferenceLines.length > 0) {
    parts.push(preferenceLines.join("\n"));
  }

  return parts.join("\n\n");
}

export function buildUserPrompt(params: { source: SourceId; sender: string; content: string }): string {
  const label = getSourceMeta(params.source).label;
  return [
    `Write a reply to this ${label} message.`,
    "",
    `Sender: ${params.sender}`,
    `Message: ${params.content}`,
    "",
    "Reply naturally and in context. Output only the reply text.",
  ].join("\n");
}

export function buildRevisePrompt(originalText: string, feedback: string): string {
  return `Original reply: ${originalText}\n\nFeedback: ${feedback}\n\nWrite the improved reply.`;
}
