import { maxTier, type Agent, type RiskTier } from '../types/index.js';
import type { ClassificationFacts, Ruleset } from './ruleset.js';

export type AgentProfile = Pick<Agent, 'use_case' | 'risk_level' | 'regulation_scope' | 'human_oversight'>;

// Facts about the call that are not sensitive-data categories
export interface CallSignals {
  requestChars: number;
  responseMarkers: readonly string[];
}

export interface ClassificationInput {
  categories: readonly string[];
  provider: string;
  model: string;
  agent: AgentProfile;
  signals?: CallSignals;
}

export interface Classification {
  risk_tier: RiskTier;
  triggered_flags: string[];
}

export function computeTier(ruleset: Ruleset, categories: ReadonlySet<string>, agent: AgentProfile): RiskTier {
  let tier: RiskTier = 'minimal';

  // Categories the table does not know are carried in the record but do not escalate
  for (const category of categories) {
    const base = ruleset.categoryTiers.get(category);
    if (base) tier = maxTier(tier, base);
  }

  if (agent.use_case) {
    const declared = ruleset.useCaseTiers.get(agent.use_case);
    if (declared) tier = maxTier(tier, declared);
  }

  if (agent.risk_level) {
    tier = maxTier(tier, agent.risk_level);
  }

  return tier;
}

export function classify(ruleset: Ruleset, input: ClassificationInput): Classification {
  const categories = new Set(input.categories);
  const tier = computeTier(ruleset, categories, input.agent);

  const facts: ClassificationFacts = {
    categories,
    tier,
    provider: input.provider,
    model: input.model,
    useCase: input.agent.use_case,
    regulations: new Set(input.agent.regulation_scope),
    humanOversight: input.agent.human_oversight,
    requestChars: input.signals?.requestChars ?? 0,
    responseMarkers: new Set(input.signals?.responseMarkers ?? [])
  };

  return {
    risk_tier: tier,
    triggered_flags: ruleset.articles.filter((article) => article.test(facts)).map((article) => article.id)
  };
}
