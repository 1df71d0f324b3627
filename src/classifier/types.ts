/** Categories that take part in scoring, in tie-break order. */
export const SCORED_CATEGORIES = ["business", "personal", "support", "networking", "sales"] as const;

export type ScoredCategory = (typeof SCORED_CATEGORIES)[number];

export type MessageCategory = ScoredCategory | "general";

export type CategoryScores = Record<ScoredCategory, number>;

export type CompiledRules = {
  readonly keywords: Record<ScoredCategory, readonly string[]>;
  readonly patterns: Record<ScoredCategory, readonly RegExp[]>;
  readonly sourceAdjustments: Readonly<Record<string, Partial<CategoryScores>>>;
  readonly businessRoles: readonly string[];
  readonly personalRelations: readonly string[];
};

export function isMessageCategory(value: string): value is MessageCategory {
  return value === "general" || SCORED_CATEGORIES.some((category) => category === value);
}
