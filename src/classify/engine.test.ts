import { describe, it, expect } from 'vitest';
import { classify, computeTier, type AgentProfile } from './engine.js';
import { loadRuleset, parseRuleset } from './ruleset.js';
import { InvalidConfigError } from '../errors.js';

const ruleset = loadRuleset();

const unsupervised: AgentProfile = { regulation_scope: [], human_oversight: false };
const supervised: AgentProfile = { regulation_scope: [], human_oversight: true };

function run(categories: string[], agent: AgentProfile = unsupervised) {
  return classify(ruleset, { categories, provider: 'openai', model: 'gpt-4o', agent });
}

describe('classify with the default rule table', () => {
  it('loads the bundled table', () => {
    expect(ruleset.version).toBe('2025.2');
    expect(ruleset.articles.map((a) => a.id)).toContain('EU_AI_ACT_ART_12');
  });

  it('classifies a national identifier as high risk', () => {
    expect(run(['national_id'])).toEqual({
      risk_tier: 'high',
      triggered_flags: ['EU_AI_ACT_ART_6', 'EU_AI_ACT_ART_12', 'EU_AI_ACT_ART_14', 'EU_AI_ACT_ART_50', 'GDPR_ART_5']
    });
  });

  it('drops the oversight flag when a human reviews the agent', () => {
    expect(run(['national_id'], supervised).triggered_flags).toEqual([
      'EU_AI_ACT_ART_6',
      'EU_AI_ACT_ART_12',
      'EU_AI_ACT_ART_50',
      'GDPR_ART_5'
    ]);
  });

  it('is minimal with no flags when nothing was detected', () => {
    expect(run([])).toEqual({ risk_tier: 'minimal', triggered_flags: [] });
  });

  it('gives limited-tier categories the transparency flag only', () => {
    expect(run(['email'])).toEqual({ risk_tier: 'limited', triggered_flags: ['EU_AI_ACT_ART_50', 'GDPR_ART_5'] });
  });

  it('adds sector flags from the agent regulation scope', () => {
    const result = run(['credit_card'], { regulation_scope: ['SOX'], human_oversight: true });

    expect(result).toEqual({
      risk_tier: 'high',
      triggered_flags: ['EU_AI_ACT_ART_6', 'EU_AI_ACT_ART_12', 'EU_AI_ACT_ART_50', 'GDPR_ART_5', 'PCI_DSS_REQ_3', 'SOX_404']
    });
  });

  it('flags HIPAA for health data under HIPAA scope', () => {
    const result = run(['medical_term'], { regulation_scope: ['HIPAA'], human_oversight: false });

    expect(result.triggered_flags).toEqual([
      'EU_AI_ACT_ART_6',
      'EU_AI_ACT_ART_12',
      'EU_AI_ACT_ART_14',
      'EU_AI_ACT_ART_50',
      'GDPR_ART_9',
      'HIPAA_164_502'
    ]);
  });

  it('escalates on the declared use case', () => {
    const result = run([], { use_case: 'social_scoring', regulation_scope: [], human_oversight: true });

    expect(result).toEqual({
      risk_tier: 'unacceptable',
      triggered_flags: ['EU_AI_ACT_ART_5', 'EU_AI_ACT_ART_6', 'EU_AI_ACT_ART_12', 'EU_AI_ACT_ART_50']
    });
  });

  it('ignores categories the table does not know', () => {
    expect(run(['favourite_colour'])).toEqual({ risk_tier: 'minimal', triggered_flags: [] });
  });

  it('treats conversational contexts as limited risk', () => {
    expect(run(['transparency_context'])).toEqual({ risk_tier: 'limited', triggered_flags: ['EU_AI_ACT_ART_50'] });
  });

  it('flags prompts over ten thousand characters', () => {
    const call = { categories: [], provider: 'openai', model: 'gpt-4o', agent: unsupervised };

    expect(classify(ruleset, { ...call, signals: { requestChars: 10_001, responseMarkers: [] } }).triggered_flags).toEqual([
      'LARGE_CONTEXT'
    ]);
    expect(classify(ruleset, { ...call, signals: { requestChars: 10_000, responseMarkers: [] } }).triggered_flags).toEqual([]);
  });

  it('flags responses in which the model discloses it is an AI', () => {
    const result = classify(ruleset, {
      categories: ['email'],
      provider: 'openai',
      model: 'gpt-4o',
      agent: unsupervised,
      signals: { requestChars: 20, responseMarkers: ['ai_disclosure'] }
    });

    expect(result).toEqual({ risk_tier: 'limited', triggered_flags: ['EU_AI_ACT_ART_50', 'GDPR_ART_5', 'AI_DISCLOSURE'] });
  });

  it('is pure', () => {
    const categories = ['medical_term', 'email'];
    const first = run(categories);
    const second = run(categories);

    expect(second).toEqual(first);
    expect(categories).toEqual(['medical_term', 'email']);
  });
});

describe('computeTier', () => {
  it('takes the highest of categories, use case and declared level', () => {
    expect(computeTier(ruleset, new Set(['email']), { ...unsupervised, risk_level: 'high' })).toBe('high');
    expect(computeTier(ruleset, new Set(['prohibited_practice']), { ...unsupervised, risk_level: 'limited' })).toBe(
      'unacceptable'
    );
    expect(computeTier(ruleset, new Set(), { ...unsupervised, use_case: 'chatbot' })).toBe('limited');
  });
});

describe('parseRuleset', () => {
  it('compiles provider, model and negation predicates', () => {
    const custom = parseRuleset(
      [
        'version: "t1"',
        'categories:',
        '  email: limited',
        'articles:',
        '  - id: OPENAI_MODERN',
        '    title: OpenAI outside legacy models',
        '    when:',
        '      all:',
        '        - provider: [openai]',
        '        - not:',
        '            model_prefix: [gpt-3]'
      ].join('\n'),
      'inline'
    );

    const input = { categories: [], provider: 'openai', agent: unsupervised };
    expect(classify(custom, { ...input, model: 'gpt-4o' }).triggered_flags).toEqual(['OPENAI_MODERN']);
    expect(classify(custom, { ...input, model: 'gpt-3.5-turbo' }).triggered_flags).toEqual([]);
  });

  it('rejects unknown tiers', () => {
    expect(() => parseRuleset('version: "x"\ncategories:\n  email: severe\narticles: []', 'inline')).toThrow(
      InvalidConfigError
    );
  });

  it('rejects duplicate article ids', () => {
    const doc = [
      'version: "x"',
      'categories: {}',
      'articles:',
      '  - { id: A, title: first, when: { always: true } }',
      '  - { id: A, title: second, when: { always: false } }'
    ].join('\n');

    expect(() => parseRuleset(doc, 'inline')).toThrow(/duplicate article A/);
  });

  it('rejects malformed YAML', () => {
    expect(() => parseRuleset('version: [unclosed', 'broken.yaml')).toThrow(InvalidConfigError);
  });

  it('rejects unknown predicate keys', () => {
    const doc = 'version: "x"\ncategories: {}\narticles:\n  - { id: A, title: t, when: { sometimes: true } }';

    expect(() => parseRuleset(doc, 'inline')).toThrow(InvalidConfigError);
  });
});
