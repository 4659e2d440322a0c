export { classify, computeTier, type Classification, type ClassificationInput, type AgentProfile, type CallSignals } from './engine.js';
export {
  loadRuleset,
  parseRuleset,
  DEFAULT_RULESET_PATH,
  type Ruleset,
  type Predicate,
  type CompiledArticle
} from './ruleset.js';
