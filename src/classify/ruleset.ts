import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { RISK_TIERS, tierRank, type RiskTier } from '../types/index.js';
import { InvalidConfigError } from '../errors.js';

export const DEFAULT_RULESET_PATH = fileURLToPath(new URL('../../rules/default.yaml', import.meta.url));

export type Predicate =
  | { all: Predicate[] }
  | { any: Predicate[] }
  | { not: Predicate }
  | { categories_any: string[] }
  | { categories_all: string[] }
  | { tier_at_least: RiskTier }
  | { regulation: string }
  | { use_case: string[] }
  | { human_oversight: boolean }
  | { provider: string[] }
  | { model_prefix: string[] }
  | { request_chars_over: number }
  | { response_marker: string[] }
  | { always: boolean };

const tierSchema = z.enum(RISK_TIERS);

export const predicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.union([
    z.object({ all: z.array(predicateSchema).min(1) }).strict(),
    z.object({ any: z.array(predicateSchema).min(1) }).strict(),
    z.object({ not: predicateSchema }).strict(),
    z.object({ categories_any: z.array(z.string().min(1)).min(1) }).strict(),
    z.object({ categories_all: z.array(z.string().min(1)).min(1) }).strict(),
    z.object({ tier_at_least: tierSchema }).strict(),
    z.object({ regulation: z.string().min(1) }).strict(),
    z.object({ use_case: z.array(z.string().min(1)).min(1) }).strict(),
    z.object({ human_oversight: z.boolean() }).strict(),
    z.object({ provider: z.array(z.string().min(1)).min(1) }).strict(),
    z.object({ model_prefix: z.array(z.string().min(1)).min(1) }).strict(),
    z.object({ request_chars_over: z.number().int().nonnegative() }).strict(),
    z.object({ response_marker: z.array(z.string().min(1)).min(1) }).strict(),
    z.object({ always: z.boolean() }).strict()
  ])
);

export const rulesetSchema = z
  .object({
    version: z.string().min(1),
    categories: z.record(tierSchema),
    use_cases: z.record(tierSchema).default({}),
    articles: z.array(
      z.object({
        id: z.string().regex(/^[A-Z0-9_]+$/),
        title: z.string().min(1),
        when: predicateSchema
      })
    )
  })
  .superRefine((rules, ctx) => {
    const seen = new Set<string>();
    rules.articles.forEach((article, i) => {
      if (seen.has(article.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['articles', i, 'id'], message: `duplicate article ${article.id}` });
      }
      seen.add(article.id);
    });
  });

export type RulesetDocument = z.infer<typeof rulesetSchema>;

export interface ClassificationFacts {
  categories: ReadonlySet<string>;
  tier: RiskTier;
  provider: string;
  model: string;
  useCase: string | undefined;
  regulations: ReadonlySet<string>;
  humanOversight: boolean;
  requestChars: number;
  responseMarkers: ReadonlySet<string>;
}

export type CompiledPredicate = (facts: ClassificationFacts) => boolean;

export interface CompiledArticle {
  readonly id: string;
  readonly title: string;
  readonly test: CompiledPredicate;
}

export interface Ruleset {
  readonly version: string;
  readonly categoryTiers: ReadonlyMap<string, RiskTier>;
  readonly useCaseTiers: ReadonlyMap<string, RiskTier>;
  readonly articles: readonly CompiledArticle[];
}

export function compilePredicate(predicate: Predicate): CompiledPredicate {
  if ('all' in predicate) {
    const parts = predicate.all.map(compilePredicate);
    return (facts) => parts.every((part) => part(facts));
  }
  if ('any' in predicate) {
    const parts = predicate.any.map(compilePredicate);
    return (facts) => parts.some((part) => part(facts));
  }
  if ('not' in predicate) {
    const inner = compilePredicate(predicate.not);
    return (facts) => !inner(facts);
  }
  if ('categories_any' in predicate) {
    const wanted = [...predicate.categories_any];
    return (facts) => wanted.some((c) => facts.categories.has(c));
  }
  if ('categories_all' in predicate) {
    const wanted = [...predicate.categories_all];
    return (facts) => wanted.every((c) => facts.categories.has(c));
  }
  if ('tier_at_least' in predicate) {
    const floor = tierRank(predicate.tier_at_least);
    return (facts) => tierRank(facts.tier) >= floor;
  }
  if ('regulation' in predicate) {
    const regulation = predicate.regulation;
    return (facts) => facts.regulations.has(regulation);
  }
  if ('use_case' in predicate) {
    const useCases = new Set(predicate.use_case);
    return (facts) => facts.useCase !== undefined && useCases.has(facts.useCase);
  }
  if ('human_oversight' in predicate) {
    const expected = predicate.human_oversight;
    return (facts) => facts.humanOversight === expected;
  }
  if ('provider' in predicate) {
    const providers = new Set(predicate.provider);
    return (facts) => providers.has(facts.provider);
  }
  if ('model_prefix' in predicate) {
    const prefixes = [...predicate.model_prefix];
    return (facts) => prefixes.some((prefix) => facts.model.startsWith(prefix));
  }
  if ('request_chars_over' in predicate) {
    const limit = predicate.request_chars_over;
    return (facts) => facts.requestChars > limit;
  }
  if ('response_marker' in predicate) {
    const markers = [...predicate.response_marker];
    return (facts) => markers.some((m) => facts.responseMarkers.has(m));
  }
  const constant = predicate.always;
  return () => constant;
}

export function compileRuleset(document: RulesetDocument): Ruleset {
  const articles = document.articles.map((article) =>
    Object.freeze({ id: article.id, title: article.title, test: compilePredicate(article.when) })
  );

  return Object.freeze({
    version: document.version,
    categoryTiers: new Map(Object.entries(document.categories)),
    useCaseTiers: new Map(Object.entries(document.use_cases)),
    articles: Object.freeze(articles)
  });
}

export function parseRuleset(content: string, source: string): Ruleset {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new InvalidConfigError(source, err instanceof Error ? err.message : String(err));
  }

  const result = rulesetSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidConfigError(source, detail);
  }
  return compileRuleset(result.data);
}

export function loadRuleset(path: string = DEFAULT_RULESET_PATH): Ruleset {
  return parseRuleset(readFileSync(path, 'utf-8'), path);
}
