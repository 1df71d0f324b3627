import { getDefaultRules } from "./rules.js";
import { SCORED_CATEGORIES, type CategoryScores, type CompiledRules, type MessageCategory } from "./types.js";

const BUSINESS_ROLE_BONUS = 2;
const PERSONAL_RELATION_BONUS = 2;
const CROSS_PENALTY = 1;
const KEYWORD_WEIGHT = 2;
const PATTERN_WEIGHT = 3;

function countMatches(pattern: RegExp, text: string): number {
  // Fresh instance so the shared pattern's lastIndex is never touched.
  return text.match(new RegExp(pattern.source, pattern.flags))?.length ?? 0;
}

/** Per-category scores before the winner is picked. */
export function scoreMessage(
  content: string,
  sender: string,
  source: string,
  rules: CompiledRules = getDefaultRules(),
): CategoryScores {
  const text = content.toLowerCase();
  const from = sender.toLowerCase();
  const scores: CategoryScores = { business: 0, personal: 0, support: 0, networking: 0, sales: 0 };

  for (const category of SCORED_CATEGORIES) {
    for (const keyword of rules.keywords[category]) {
      if (text.includes(keyword)) scores[category] += KEYWORD_WEIGHT;
    }
    for (const pattern of rules.patterns[category]) {
      scores[category] += PATTERN_WEIGHT * countMatches(pattern, content);
    }
    scores[category] += rules.sourceAdjustments[source.toLowerCase()]?.[category] ?? 0;
  }

  if (rules.businessRoles.some((term) => from.includes(term))) {
    scores.business += BUSINESS_ROLE_BONUS;
    scores.personal -= CROSS_PENALTY;
  }
  if (rules.personalRelations.some((term) => from.includes(term))) {
    scores.personal += PERSONAL_RELATION_BONUS;
    scores.business -= CROSS_PENALTY;
  }

  return scores;
}

/**
 * Highest positive score wins; ties go to the earlier category in
 * SCORED_CATEGORIES order. Nothing above zero means "general".
 */
export function pickCategory(scores: CategoryScores): MessageCategory {
  let best: MessageCategory = "general";
  let bestScore = 0;
  for (const category of SCORED_CATEGORIES) {
    if (scores[category] > bestScore) {
      best = category;
      bestScore = scores[category];
    }
  }
  return best;
}

export function classifyMessage(
  content: string,
  sender: string,
  source: string,
  rules: CompiledRules = getDefaultRules(),
): MessageCategory {
  return pickCategory(scoreMessage(content, sender, source, rules));
}
