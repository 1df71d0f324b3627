import type { SourceId, SourceMeta } from "./types.js";

export const SOURCE_ORDER: readonly SourceId[] = [
  "linkedin",
  "gmail",
  "telegram",
  "facebook",
  "instagram",
] as const;

const SOURCE_META: Record<SourceId, SourceMeta> = {
  linkedin: { id: "linkedin", label: "LinkedIn" },
  gmail: { id: "gmail", label: "Gmail" },
  telegram: { id: "telegram", label: "Telegram" },
  facebook: { id: "facebook", label: "Facebook" },
  instagram: { id: "instagram", label: "Instagram" },
};

/** Requests per minute each source tolerates before we stop calling it. */
export const DEFAULT_RATE_LIMITS: Record<SourceId, number> = {
  linkedin: 30,
  gmail: 60,
  telegram: 30,
  facebook: 40,
  instagram: 40,
};

/** Tone guidance folded into the drafting prompt. */
export const SOURCE_TONE: Record<SourceId, string> = {
  linkedin: "Professional networking tone",
  gmail: "Professional email tone",
  telegram: "Conversational and friendly",
  facebook: "Social and engaging",
  instagram: "Visual and trendy",
};

export function getSourceMeta(id: SourceId): SourceMeta {
  return SOURCE_META[id];
}

export function isSourceId(value: string): value is SourceId {
  return SOURCE_ORDER.some((source) => source === value);
}
