import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "../infra/errors.js";
import { SCORED_CATEGORIES, type CompiledRules, type ScoredCategory } from "./types.js";

const DEFAULT_RULES_URL = new URL("./rules.json", import.meta.url);

const lowercaseTerms = z.array(z.string().min(1).transform((term) => term.toLowerCase()));

const regexSource = z.string().min(1).refine(
  (source) => {
    try {
      new RegExp(source, "gi");
      return true;
    } catch {
      return false;
    }
  },
  { message: "Invalid regular expression" },
);

function perCategory<T extends z.ZodTypeAny>(schema: T) {
  return z
    .object({
      business: schema,
      personal: schema,
      support: schema,
      networking: schema,
      sales: schema,
    })
    .strict();
}

const adjustment = z
  .object({
    business: z.number().int().optional(),
    personal: z.number().int().optional(),
    support: z.number().int().optional(),
    networking: z.number().int().optional(),
    sales: z.number().int().optional(),
  })
  .strict();

export const ClassifierRulesSchema = z
  .object({
    keywords: perCategory(lowercaseTerms),
    patterns: perCategory(z.array(regexSource)),
    sourceAdjustments: z.record(z.string(), adjustment),
    senderVocabulary: z
      .object({
        businessRoles: lowercaseTerms,
        personalRelations: lowercaseTerms,
      })
      .strict(),
  })
  .strict();

export type ClassifierRules = z.input<typeof ClassifierRulesSchema>;

function mapCategories<T, U>(input: Record<ScoredCategory, T>, fn: (value: T) => U): Record<ScoredCategory, U> {
  return {
    business: fn(input.business),
    personal: fn(input.personal),
    support: fn(input.support),
    networking: fn(input.networking),
    sales: fn(input.sales),
  };
}

/** Validates a rule table and compiles its patterns. Throws ConfigError on bad input. */
export function compileRules(value: unknown): CompiledRules {
  const result = ClassifierRulesSchema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid classifier rules: ${detail}`);
  }
  const rules = result.data;
  return {
    keywords: rules.keywords,
    patterns: mapCategories(rules.patterns, (sources) => sources.map((source) => new RegExp(source, "gi"))),
    sourceAdjustments: rules.sourceAdjustments,
    businessRoles: rules.senderVocabulary.businessRoles,
    personalRelations: rules.senderVocabulary.personalRelations,
  };
}

export function loadRules(path: string | URL = DEFAULT_RULES_URL): CompiledRules {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Failed to read classifier rules from ${String(path)}: ${errorMessage(err)}`);
  }
  return compileRules(raw);
}

let defaultRules: CompiledRules | null = null;

/** The bundled rule table, read once per process. */
export function getDefaultRules(): CompiledRules {
  defaultRules ??= loadRules();
  return defaultRules;
}
